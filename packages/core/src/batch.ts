import type { RunContext, RunSnapshot } from '@flowpilot/shared';
import { toErrorMessage } from './errors.js';
import type { WorkflowRuntime } from './runtime.js';

export type BatchItemResult =
  | { index: number; status: 'finished'; runId: string; snapshot: RunSnapshot }
  | { index: number; status: 'error'; runId: string | null; error: string };

export type RunBatchOptions = {
  concurrency?: number;
};

/**
 * Submits one run per input with at most `concurrency` runs in flight. Results keep input order;
 * a failed submission or a crashed run is reported in its slot without stopping the batch.
 */
export async function runBatch(
  runtime: Pick<WorkflowRuntime, 'submit' | 'waitForRun'>,
  workflowId: string,
  inputs: readonly Readonly<RunContext>[],
  options: RunBatchOptions = {},
): Promise<BatchItemResult[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 4));
  const results: BatchItemResult[] = new Array(inputs.length);
  let nextIndex = 0;

  const worker = async () => {
    while (nextIndex < inputs.length) {
      const index = nextIndex;
      nextIndex += 1;

      let runId: string | null = null;
      try {
        runId = runtime.submit(workflowId, inputs[index]);
        results[index] = { index, status: 'finished', runId, snapshot: await runtime.waitForRun(runId) };
      } catch (error) {
        results[index] = { index, status: 'error', runId, error: toErrorMessage(error) };
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, inputs.length) }, () => worker()));
  return results;
}
