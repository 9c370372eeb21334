import type { HandlerOutput, WorkflowDefinition } from '@flowpilot/shared';
import { describe, expect, it } from 'vitest';
import { defaultEngineConfig, type EngineConfig } from './config.js';
import { driveRun, executeRun, type EngineEvent } from './engine.js';
import { HandlerError } from './errors.js';
import { createHandlerRegistry, defineDeterministicHandler, type HandlerMap } from './handlerRegistry.js';
import { createRunState } from './runState.js';
import { createInMemoryRunStore } from './runStore.js';
import { createInMemoryTemplateSource } from './templateSource.js';
import { loadWorkflowDefinition } from './workflowLoader.js';

const alwaysOk = defineDeterministicHandler(() => ({ ok: true, note: 'from A' }));
const alwaysFails = defineDeterministicHandler(() => {
  throw new HandlerError('BOOM', 'handler exploded');
});

function workflow(
  nodes: Record<string, unknown>[],
  edges: Record<string, unknown>[],
  templates: Record<string, string> = {},
): WorkflowDefinition {
  return loadWorkflowDefinition(
    { id: 'test-flow', entry: 'A', nodes, edges },
    { templates: createInMemoryTemplateSource(templates) },
  );
}

function config(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return { ...defaultEngineConfig, stepTimeoutMs: null, runTimeoutMs: null, ...overrides };
}

function run(definition: WorkflowDefinition, handlers: HandlerMap, input: Record<string, unknown> = {}, engineConfig = config()) {
  return executeRun(definition, input, { handlers: createHandlerRegistry(handlers), config: engineConfig, runId: 'run-1' });
}

describe('executeRun', () => {
  it('completes A -> B on a default edge with one step and merges the output', async () => {
    const definition = workflow(
      [{ id: 'A', handler: 'always_ok' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    const state = await run(definition, { always_ok: alwaysOk });

    expect(state.status).toBe('completed');
    expect(state.failure).toBeNull();
    expect(state.history).toHaveLength(1);
    expect(state.stepCount).toBe(1);
    expect(state.currentNode).toBe('B');
    expect(state.context).toEqual({ ok: true, note: 'from A' });
    expect(state.completedAt).not.toBeNull();
    expect(state.history[0]).toMatchObject({ sequence: 1, nodeId: 'A', attempt: 1, inputSnapshot: {}, error: null });
  });

  it('fails a self-loop with maxRetries 2 as RetryLimitExceeded after three steps', async () => {
    const definition = workflow(
      [{ id: 'A', handler: 'decide', maxRetries: 2 }],
      [{ from: 'A', to: 'A', when: 'decision == "retry"' }],
    );
    const decide = defineDeterministicHandler(() => ({ decision: 'retry' }));

    const state = await run(definition, { decide });

    expect(state.status).toBe('failed');
    expect(state.failure?.reason).toBe('RetryLimitExceeded');
    expect(state.failure?.nodeId).toBe('A');
    expect(state.history).toHaveLength(3);
    expect(state.history.map(step => step.attempt)).toEqual([1, 2, 3]);
  });

  it.each([
    { maxRetries: 0, onError: 'retry' },
    { maxRetries: 1, onError: 'retry' },
    { maxRetries: 3, onError: 'retry' },
    { maxRetries: 0, onError: undefined },
    { maxRetries: 2, onError: undefined },
  ])('attempts an always-failing node with maxRetries $maxRetries (onError $onError) exactly n + 1 times', async ({
    maxRetries,
    onError,
  }) => {
    const definition = workflow(
      [{ id: 'A', handler: 'fails', maxRetries, onError }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    const state = await run(definition, { fails: alwaysFails });

    expect(state.status).toBe('failed');
    expect(state.failure?.reason).toBe('RetryLimitExceeded');
    expect(state.history).toHaveLength(maxRetries + 1);
    expect(state.history.every(step => step.error?.kind === 'HandlerError' && step.error.code === 'BOOM')).toBe(true);
  });

  it('takes the earlier edge when two conditions hold', async () => {
    const definition = workflow(
      [{ id: 'A', handler: 'always_ok' }, { id: 'first', terminal: true }, { id: 'second', terminal: true }],
      [
        { from: 'A', to: 'first', when: 'ok' },
        { from: 'A', to: 'second', when: 'note == "from A"' },
      ],
    );

    const state = await run(definition, { always_ok: alwaysOk });

    expect(state.currentNode).toBe('first');
  });

  it('completes without a step when the entry node is terminal', async () => {
    const definition = workflow([{ id: 'A', terminal: true }], []);

    const state = await run(definition, {}, { seed: 1 });

    expect(state.status).toBe('completed');
    expect(state.history).toEqual([]);
    expect(state.context).toEqual({ seed: 1 });
  });

  it('stops an unbounded cycle at the step budget', async () => {
    const definition = workflow(
      [{ id: 'A', handler: 'always_ok' }, { id: 'B', handler: 'always_ok' }],
      [{ from: 'A', to: 'B', default: true }, { from: 'B', to: 'A', default: true }],
    );

    const state = await run(definition, { always_ok: alwaysOk }, {}, config({ maxSteps: 5 }));

    expect(state.status).toBe('failed');
    expect(state.failure?.reason).toBe('StepBudgetExceeded');
    expect(state.history).toHaveLength(5);
  });

  it('checks for a terminal node before the step budget', async () => {
    const definition = workflow(
      [{ id: 'A', handler: 'always_ok' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    const state = await run(definition, { always_ok: alwaysOk }, {}, config({ maxSteps: 1 }));

    expect(state.status).toBe('completed');
  });

  it('records a step and fails when the handler is not registered', async () => {
    const definition = workflow(
      [{ id: 'A', handler: 'ghost' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    const state = await run(definition, { always_ok: alwaysOk });

    expect(state.status).toBe('failed');
    expect(state.failure).toEqual({
      reason: 'UnknownHandler',
      message: 'Unknown node handler "ghost". Available handlers: always_ok.',
      nodeId: 'A',
    });
    expect(state.history).toHaveLength(1);
    expect(state.history[0]?.error?.kind).toBe('UnknownHandler');
  });

  it('fails with RenderError when a prompt variable is missing', async () => {
    const definition = workflow(
      [{ id: 'A', handler: 'always_ok', prompt: 'ask' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
      { ask: 'Explain $topic' },
    );

    const state = await run(definition, { always_ok: alwaysOk });

    expect(state.status).toBe('failed');
    expect(state.failure?.reason).toBe('RenderError');
    expect(state.history[0]?.error).toEqual({
      kind: 'RenderError',
      message: 'Prompt variable "topic" is not present in the run context.',
      code: 'MISSING_PROMPT_VARIABLE',
    });
  });

  it('passes the rendered prompt and attempt to the handler', async () => {
    const seen: Array<{ prompt: string | null; attempt: number }> = [];
    const definition = workflow(
      [{ id: 'A', handler: 'capture', prompt: 'ask' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
      { ask: 'Explain $topic' },
    );
    const capture = defineDeterministicHandler(request => {
      seen.push({ prompt: request.prompt, attempt: request.attempt });
      return {};
    });

    await run(definition, { capture }, { topic: 'retries' });

    expect(seen).toEqual([{ prompt: 'Explain retries', attempt: 1 }]);
  });

  it('retries a failing node and continues once it succeeds', async () => {
    let calls = 0;
    const flaky = defineDeterministicHandler(() => {
      calls += 1;
      if (calls === 1) {
        throw new HandlerError('FLAKY', 'first call fails');
      }
      return { calls };
    });
    const definition = workflow(
      [{ id: 'A', handler: 'flaky', maxRetries: 2 }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );
    const events: EngineEvent[] = [];

    const state = await executeRun(definition, {}, {
      handlers: createHandlerRegistry({ flaky }),
      config: config(),
      onEvent: event => {
        events.push(event);
      },
    });

    expect(state.status).toBe('completed');
    expect(state.history.map(step => [step.attempt, step.error?.code ?? null])).toEqual([
      [1, 'FLAKY'],
      [2, null],
    ]);
    expect(state.context).toEqual({ calls: 2 });
    expect(events.map(event => event.type)).toEqual([
      'run_started',
      'step_started',
      'step_failed',
      'step_retrying',
      'step_started',
      'step_completed',
      'transition',
      'run_finished',
    ]);
  });

  it('fails with the error kind when no retry policy is declared', async () => {
    const definition = workflow(
      [{ id: 'A', handler: 'fails' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    const state = await run(definition, { fails: alwaysFails });

    expect(state.failure).toEqual({ reason: 'HandlerError', message: 'handler exploded', nodeId: 'A' });
    expect(state.history).toHaveLength(1);
  });

  it('routes to the error target and exposes the error in context', async () => {
    const definition = workflow(
      [
        { id: 'A', handler: 'fails', onError: 'route', errorTarget: 'recover' },
        { id: 'recover', handler: 'always_ok' },
        { id: 'done', terminal: true },
      ],
      [
        { from: 'A', to: 'done', default: true },
        { from: 'recover', to: 'done', default: true },
      ],
    );

    const state = await run(definition, { fails: alwaysFails, always_ok: alwaysOk });

    expect(state.status).toBe('completed');
    expect(state.history.map(step => step.nodeId)).toEqual(['A', 'recover']);
    expect(state.context.lastError).toEqual({
      nodeId: 'A',
      kind: 'HandlerError',
      message: 'handler exploded',
      code: 'BOOM',
    });
  });

  it('treats no matching edge as completion unless the node fails on dead ends', async () => {
    const nodes = [{ id: 'A', handler: 'always_ok' }, { id: 'B', terminal: true }];
    const edges = [{ from: 'A', to: 'B', when: 'ok == false' }];

    const relaxed = await run(workflow(nodes, edges), { always_ok: alwaysOk });
    expect(relaxed.status).toBe('completed');
    expect(relaxed.currentNode).toBe('A');

    const strict = await run(
      workflow([{ id: 'A', handler: 'always_ok', failOnDeadEnd: true }, { id: 'B', terminal: true }], edges),
      { always_ok: alwaysOk },
    );
    expect(strict.status).toBe('failed');
    expect(strict.failure?.reason).toBe('DeadEnd');
  });

  it('applies output keys and field subsets when merging', async () => {
    const producer = defineDeterministicHandler(() => ({ decision: 'notify', confidence: 0.4, raw: 'x' }));
    const definition = workflow(
      [
        { id: 'A', handler: 'producer', outputKey: 'analysis' },
        { id: 'C', handler: 'producer', outputFields: ['decision'] },
        { id: 'B', terminal: true },
      ],
      [
        { from: 'A', to: 'C', when: 'analysis.decision == notify' },
        { from: 'A', to: 'B', default: true },
        { from: 'C', to: 'B', default: true },
      ],
    );

    const state = await run(definition, { producer });

    expect(state.history.map(step => step.nodeId)).toEqual(['A', 'C']);
    expect(state.context).toEqual({
      analysis: { decision: 'notify', confidence: 0.4, raw: 'x' },
      decision: 'notify',
    });
  });

  it('fails with Timeout when a step exceeds its deadline', async () => {
    let abortedSignal = false;
    const hangs = defineDeterministicHandler(
      request =>
        new Promise<HandlerOutput>(() => {
          request.signal.addEventListener('abort', () => {
            abortedSignal = true;
          });
        }),
    );
    const definition = workflow(
      [{ id: 'A', handler: 'hangs' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    const state = await run(definition, { hangs }, {}, config({ stepTimeoutMs: 20 }));

    expect(state.status).toBe('failed');
    expect(state.failure?.reason).toBe('Timeout');
    expect(state.history[0]?.error).toEqual({
      kind: 'Timeout',
      message: 'Step exceeded its 20 ms deadline.',
      code: 'STEP_TIMEOUT',
    });
    expect(abortedSignal).toBe(true);
  });

  it('fails with Timeout once the run deadline passes', async () => {
    let clock = 0;
    const tick = defineDeterministicHandler(() => {
      clock += 100;
      return {};
    });
    const definition = workflow([{ id: 'A', handler: 'tick' }], [{ from: 'A', to: 'A', default: true }]);

    const state = await executeRun(definition, {}, {
      handlers: createHandlerRegistry({ tick }),
      config: config({ runTimeoutMs: 250 }),
      now: () => clock,
    });

    expect(state.status).toBe('failed');
    expect(state.failure).toEqual({ reason: 'Timeout', message: 'Run exceeded its 250 ms timeout.', nodeId: 'A' });
    expect(state.history).toHaveLength(3);
  });

  it('cancels before the first step when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const definition = workflow(
      [{ id: 'A', handler: 'always_ok' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    const state = await executeRun(definition, {}, {
      handlers: createHandlerRegistry({ always_ok: alwaysOk }),
      config: config(),
      signal: controller.signal,
    });

    expect(state.status).toBe('cancelled');
    expect(state.failure?.reason).toBe('Cancelled');
    expect(state.history).toHaveLength(0);
  });

  it('cancels an in-flight step and keeps the interrupted step record', async () => {
    const controller = new AbortController();
    const waits = defineDeterministicHandler(() => new Promise<HandlerOutput>(() => undefined));
    const definition = workflow(
      [{ id: 'A', handler: 'waits', maxRetries: 3, onError: 'retry' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    const state = await executeRun(definition, {}, {
      handlers: createHandlerRegistry({ waits }),
      config: config(),
      signal: controller.signal,
      onEvent: event => {
        if (event.type === 'step_started') {
          controller.abort();
        }
      },
    });

    expect(state.status).toBe('cancelled');
    expect(state.failure?.reason).toBe('Cancelled');
    expect(state.history).toHaveLength(1);
    expect(state.history[0]?.error?.kind).toBe('Cancelled');
  });

  it('shares one retry budget across nodes when retryScope is run', async () => {
    const definition = workflow(
      [
        { id: 'A', handler: 'always_ok', maxRetries: 2 },
        { id: 'B', handler: 'fails', maxRetries: 2, onError: 'retry' },
        { id: 'C', terminal: true },
      ],
      [{ from: 'A', to: 'B', default: true }, { from: 'B', to: 'C', default: true }],
    );
    const handlers = { always_ok: alwaysOk, fails: alwaysFails };

    const perNode = await run(definition, handlers, {}, config({ retryScope: 'node' }));
    const perRun = await run(definition, handlers, {}, config({ retryScope: 'run' }));

    expect(perNode.failure?.reason).toBe('RetryLimitExceeded');
    expect(perNode.history.map(step => step.nodeId)).toEqual(['A', 'B', 'B', 'B']);
    expect(perRun.failure?.reason).toBe('RetryLimitExceeded');
    expect(perRun.history.map(step => step.nodeId)).toEqual(['A', 'B', 'B']);
  });

  it('freezes step records and the input snapshot handed to handlers', async () => {
    let frozenContext = false;
    const inspect = defineDeterministicHandler(request => {
      frozenContext = Object.isFrozen(request.context);
      return { seen: true };
    });
    const definition = workflow(
      [{ id: 'A', handler: 'inspect' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    const state = await run(definition, { inspect }, { nested: { value: 1 } });

    expect(frozenContext).toBe(true);
    expect(Object.isFrozen(state.history[0])).toBe(true);
    expect(state.history[0]?.inputSnapshot).toEqual({ nested: { value: 1 } });
  });

  it('writes the run, its steps and its outcome to the store', async () => {
    const store = createInMemoryRunStore();
    const definition = workflow(
      [{ id: 'A', handler: 'always_ok' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    await executeRun(definition, {}, {
      handlers: createHandlerRegistry({ always_ok: alwaysOk }),
      config: config(),
      runId: 'stored-run',
      store,
    });

    expect(store.getRun('stored-run')).toMatchObject({ status: 'completed', stepCount: 1, currentNode: 'B' });
    expect(store.listSteps('stored-run')?.map(step => step.nodeId)).toEqual(['A']);
  });
  it('keeps Timeout as the reason when the last retry also times out', async () => {
    const hangs = defineDeterministicHandler(() => new Promise<HandlerOutput>(() => undefined));
    const definition = workflow(
      [{ id: 'A', handler: 'hangs', maxRetries: 1, onError: 'retry' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    const state = await run(definition, { hangs }, {}, config({ stepTimeoutMs: 20 }));

    expect(state.failure).toEqual({ reason: 'Timeout', message: 'Step exceeded its 20 ms deadline.', nodeId: 'A' });
    expect(state.history.map(step => step.error?.kind)).toEqual(['Timeout', 'Timeout']);
  });

  it('records an output that cannot be cloned as a handler error', async () => {
    const callback = defineDeterministicHandler(() => ({ callback: () => 1 }));
    const definition = workflow(
      [{ id: 'A', handler: 'callback' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );

    const state = await run(definition, { callback });

    expect(state.status).toBe('failed');
    expect(state.failure?.reason).toBe('HandlerError');
    expect(state.history).toHaveLength(1);
    expect(state.history[0]?.error).toMatchObject({ kind: 'HandlerError', code: 'INVALID_OUTPUT' });
    expect(state.history[0]?.error?.message).toMatch(/^Handler "callback" returned an output that cannot be cloned: /);
  });

  it('fails the run before rethrowing when an event listener throws', async () => {
    const store = createInMemoryRunStore();
    const definition = workflow(
      [{ id: 'A', handler: 'always_ok' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );
    const state = createRunState({ runId: 'run-1', workflow: definition, input: {}, startedAt: '2026-01-01T00:00:00.000Z' });

    await expect(
      driveRun(definition, state, {
        handlers: createHandlerRegistry({ always_ok: alwaysOk }),
        config: config(),
        store,
        onEvent: event => {
          if (event.type === 'step_completed') {
            throw new Error('sink down');
          }
        },
      }),
    ).rejects.toThrow('sink down');

    expect(state.status).toBe('failed');
    expect(state.failure).toEqual({ reason: 'EngineError', message: 'sink down', nodeId: 'A' });
    expect(state.history).toHaveLength(1);
    expect(store.getRun('run-1')).toMatchObject({
      status: 'failed',
      failure: { reason: 'EngineError', message: 'sink down', nodeId: 'A' },
    });
  });

  it('fails the run before rethrowing when the store rejects a step', async () => {
    const store = {
      ...createInMemoryRunStore(),
      appendStep() {
        throw new Error('disk full');
      },
    };
    const definition = workflow(
      [{ id: 'A', handler: 'always_ok' }, { id: 'B', terminal: true }],
      [{ from: 'A', to: 'B', default: true }],
    );
    const state = createRunState({ runId: 'run-2', workflow: definition, input: {}, startedAt: '2026-01-01T00:00:00.000Z' });

    await expect(
      driveRun(definition, state, { handlers: createHandlerRegistry({ always_ok: alwaysOk }), config: config(), store }),
    ).rejects.toThrow('disk full');

    expect(state.status).toBe('failed');
    expect(state.failure?.reason).toBe('EngineError');
    expect(store.getRun('run-2')?.status).toBe('failed');
  });
});
