import { and, asc, desc, eq } from 'drizzle-orm';
import {
  runFailureReasons,
  runStatuses,
  stepErrorKinds,
  type RunFailure,
  type RunSnapshot,
  type RunStatus,
  type RunStatusView,
  type RunStore,
  type StepError,
  type StepRecord,
} from '@flowpilot/shared';
import type { FlowpilotDatabase } from './connection.js';
import { runSteps, workflowRuns } from './schema.js';

type WorkflowRunRow = typeof workflowRuns.$inferSelect;
type RunStepRow = typeof runSteps.$inferSelect;

export type ListRunsFilter = {
  workflowId?: string;
  limit?: number;
};

export type SqliteRunStore = RunStore & {
  listRuns(filter?: ListRunsFilter): RunStatusView[];
};

function toRunStatus(value: string): RunStatus {
  const status = runStatuses.find(candidate => candidate === value);
  if (!status) {
    throw new Error(`Unknown run status: ${value}`);
  }
  return status;
}

function toRunFailure(row: WorkflowRunRow): RunFailure | null {
  if (row.failureReason === null || row.failureMessage === null) {
    return null;
  }

  const reason = runFailureReasons.find(candidate => candidate === row.failureReason);
  if (!reason) {
    throw new Error(`Unknown run failure reason: ${row.failureReason}`);
  }

  return { reason, message: row.failureMessage, nodeId: row.failureNodeId };
}

function toStepError(row: RunStepRow): StepError | null {
  if (row.errorKind === null) {
    return null;
  }

  const kind = stepErrorKinds.find(candidate => candidate === row.errorKind);
  if (!kind) {
    throw new Error(`Unknown step error kind: ${row.errorKind}`);
  }

  return { kind, message: row.errorMessage ?? '', code: row.errorCode };
}

function toRunStatusView(row: WorkflowRunRow): RunStatusView {
  return {
    runId: row.runId,
    workflowId: row.workflowId,
    workflowVersion: row.workflowVersion,
    status: toRunStatus(row.status),
    currentNode: row.currentNode,
    stepCount: row.stepCount,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
    failure: toRunFailure(row),
  };
}

function toStepRecord(row: RunStepRow): StepRecord {
  return {
    sequence: row.sequence,
    nodeId: row.nodeId,
    attempt: row.attempt,
    inputSnapshot: row.inputSnapshot,
    output: row.output,
    startedAt: row.startedAt,
    durationMs: row.durationMs,
    error: toStepError(row),
  };
}

function toStepValues(runId: string, record: StepRecord): typeof runSteps.$inferInsert {
  return {
    runId,
    sequence: record.sequence,
    nodeId: record.nodeId,
    attempt: record.attempt,
    inputSnapshot: record.inputSnapshot,
    output: record.output,
    startedAt: record.startedAt,
    durationMs: record.durationMs,
    errorKind: record.error?.kind ?? null,
    errorMessage: record.error?.message ?? null,
    errorCode: record.error?.code ?? null,
  };
}

/**
 * RunStore over the workflow_runs and run_steps tables. Expects a migrated database.
 */
export function createSqliteRunStore(db: FlowpilotDatabase): SqliteRunStore {
  return {
    createRun(snapshot: RunSnapshot) {
      db.transaction(tx => {
        tx.insert(workflowRuns)
          .values({
            runId: snapshot.runId,
            workflowId: snapshot.workflowId,
            workflowVersion: snapshot.workflowVersion,
            status: snapshot.status,
            currentNode: snapshot.currentNode,
            stepCount: snapshot.stepCount,
            context: snapshot.context,
            startedAt: snapshot.startedAt,
            completedAt: snapshot.completedAt,
            createdAt: snapshot.startedAt,
            updatedAt: snapshot.startedAt,
          })
          .run();

        for (const record of snapshot.history) {
          tx.insert(runSteps).values(toStepValues(snapshot.runId, record)).run();
        }
      });
    },

    appendStep(runId: string, record: StepRecord) {
      db.transaction(tx => {
        tx.insert(runSteps).values(toStepValues(runId, record)).run();
        const updated = tx
          .update(workflowRuns)
          .set({ stepCount: record.sequence, currentNode: record.nodeId, updatedAt: record.startedAt })
          .where(and(eq(workflowRuns.runId, runId), eq(workflowRuns.status, 'running')))
          .run();

        if (updated.changes !== 1) {
          throw new Error(`Cannot append step ${record.sequence} to run "${runId}"; it is not running.`);
        }
      });
    },

    finishRun(snapshot: RunSnapshot) {
      const updatedAt = snapshot.completedAt ?? new Date().toISOString();
      const updated = db
        .update(workflowRuns)
        .set({
          status: snapshot.status,
          currentNode: snapshot.currentNode,
          stepCount: snapshot.stepCount,
          context: snapshot.context,
          completedAt: snapshot.completedAt,
          failureReason: snapshot.failure?.reason ?? null,
          failureMessage: snapshot.failure?.message ?? null,
          failureNodeId: snapshot.failure?.nodeId ?? null,
          updatedAt,
        })
        .where(and(eq(workflowRuns.runId, snapshot.runId), eq(workflowRuns.status, 'running')))
        .run();

      if (updated.changes !== 1) {
        throw new Error(`Run finish precondition failed for "${snapshot.runId}"; expected status "running".`);
      }
    },

    getRun(runId: string) {
      const row = db.select().from(workflowRuns).where(eq(workflowRuns.runId, runId)).get();
      return row ? toRunStatusView(row) : null;
    },

    listSteps(runId: string) {
      const run = db
        .select({ runId: workflowRuns.runId })
        .from(workflowRuns)
        .where(eq(workflowRuns.runId, runId))
        .get();
      if (!run) {
        return null;
      }

      return db
        .select()
        .from(runSteps)
        .where(eq(runSteps.runId, runId))
        .orderBy(asc(runSteps.sequence))
        .all()
        .map(toStepRecord);
    },

    getSnapshot(runId: string) {
      const row = db.select().from(workflowRuns).where(eq(workflowRuns.runId, runId)).get();
      if (!row) {
        return null;
      }

      const history = db
        .select()
        .from(runSteps)
        .where(eq(runSteps.runId, runId))
        .orderBy(asc(runSteps.sequence))
        .all()
        .map(toStepRecord);
      return { ...toRunStatusView(row), context: row.context, history };
    },

    listRuns(filter: ListRunsFilter = {}) {
      const query = db
        .select()
        .from(workflowRuns)
        .where(filter.workflowId === undefined ? undefined : eq(workflowRuns.workflowId, filter.workflowId))
        .orderBy(desc(workflowRuns.startedAt), asc(workflowRuns.runId));

      const rows = filter.limit === undefined ? query.all() : query.limit(filter.limit).all();
      return rows.map(toRunStatusView);
    },
  };
}
