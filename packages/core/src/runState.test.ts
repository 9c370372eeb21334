import type { StepRecord } from '@flowpilot/shared';
import { describe, expect, it } from 'vitest';
import { InvalidRunTransitionError } from './errors.js';
import {
  appendStepRecord,
  createRunState,
  mergeStepOutput,
  projectStepOutput,
  toRunSnapshot,
  toRunStatusView,
  transitionRunStatus,
} from './runState.js';
import { loadWorkflowDefinition } from './workflowLoader.js';

const workflow = loadWorkflowDefinition({
  id: 'state-flow',
  version: 3,
  entry: 'start',
  nodes: [{ id: 'start', terminal: true }],
});

function newState() {
  return createRunState({ runId: 'run-7', workflow, input: { ticket: 42 }, startedAt: '2026-01-01T00:00:00.000Z' });
}

function step(sequence: number): StepRecord {
  return {
    sequence,
    nodeId: 'start',
    attempt: 1,
    inputSnapshot: {},
    output: { value: sequence },
    startedAt: '2026-01-01T00:00:00.000Z',
    durationMs: 3,
    error: null,
  };
}

describe('run state', () => {
  it('starts running at the entry node with a copy of the input', () => {
    const input = { ticket: 42 };
    const state = createRunState({ runId: 'run-7', workflow, input, startedAt: '2026-01-01T00:00:00.000Z' });

    expect(state).toMatchObject({
      runId: 'run-7',
      workflowId: 'state-flow',
      workflowVersion: 3,
      status: 'running',
      currentNode: 'start',
      stepCount: 0,
      completedAt: null,
      failure: null,
    });
    state.context.extra = true;
    expect(input).toEqual({ ticket: 42 });
  });

  it('appends frozen records and keeps stepCount in line with history', () => {
    const state = newState();
    appendStepRecord(state, step(1));
    appendStepRecord(state, step(2));

    expect(state.stepCount).toBe(2);
    expect(state.history.map(record => record.sequence)).toEqual([1, 2]);
    expect(Object.isFrozen(state.history[1])).toBe(true);
    expect(() => appendStepRecord(state, step(5))).toThrow('Step sequence 5 does not follow 2.');
  });

  it('projects outputs through field subsets and output keys', () => {
    const output = { decision: 'retry', confidence: 0.9 };
    expect(projectStepOutput(output, { key: null, fields: null })).toEqual(output);
    expect(projectStepOutput(output, { key: null, fields: ['decision', 'missing'] })).toEqual({ decision: 'retry' });
    expect(projectStepOutput(output, { key: 'analysis', fields: ['confidence'] })).toEqual({
      analysis: { confidence: 0.9 },
    });
  });

  it('overwrites context keys with later outputs', () => {
    const state = newState();
    mergeStepOutput(state, { ticket: 43, note: 'x' }, { key: null, fields: null });
    expect(state.context).toEqual({ ticket: 43, note: 'x' });
  });

  it('only moves status forward', () => {
    const state = newState();
    transitionRunStatus(state, 'failed', '2026-01-01T00:00:01.000Z', {
      reason: 'DeadEnd',
      message: 'stuck',
      nodeId: 'start',
    });

    expect(state.status).toBe('failed');
    expect(state.completedAt).toBe('2026-01-01T00:00:01.000Z');
    expect(() => transitionRunStatus(state, 'completed', '2026-01-01T00:00:02.000Z')).toThrow(InvalidRunTransitionError);
  });

  it('exposes detached snapshots and status views', () => {
    const state = newState();
    appendStepRecord(state, step(1));
    const snapshot = toRunSnapshot(state);

    state.context.later = true;
    appendStepRecord(state, step(2));

    expect(snapshot.context).toEqual({ ticket: 42 });
    expect(snapshot.history).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(toRunStatusView(state)).toEqual({
      runId: 'run-7',
      workflowId: 'state-flow',
      workflowVersion: 3,
      status: 'running',
      currentNode: 'start',
      stepCount: 2,
      startedAt: '2026-01-01T00:00:00.000Z',
      completedAt: null,
      failure: null,
    });
  });
});
