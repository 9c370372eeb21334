import { sql } from 'drizzle-orm';
import { check, index, integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';
import type { HandlerOutput, RunContext } from '@flowpilot/shared';

const utcNow = sql`(strftime('%Y-%m-%dT%H:%M:%fZ','now'))`;

export const workflowRuns = sqliteTable(
  'workflow_runs',
  {
    runId: text('run_id').primaryKey(),
    workflowId: text('workflow_id').notNull(),
    workflowVersion: integer('workflow_version').notNull(),
    status: text('status').notNull().default('running'),
    currentNode: text('current_node').notNull(),
    stepCount: integer('step_count').notNull().default(0),
    context: text('context', { mode: 'json' }).$type<RunContext>().notNull(),
    startedAt: text('started_at').notNull(),
    completedAt: text('completed_at'),
    failureReason: text('failure_reason'),
    failureMessage: text('failure_message'),
    failureNodeId: text('failure_node_id'),
    createdAt: text('created_at').notNull().default(utcNow),
    updatedAt: text('updated_at').notNull().default(utcNow),
  },
  table => ({
    statusCheck: check(
      'workflow_runs_status_ck',
      sql`${table.status} in ('running', 'completed', 'failed', 'cancelled')`,
    ),
    completionTimestampCheck: check(
      'workflow_runs_completion_timestamp_ck',
      sql`(
        ${table.status} = 'running'
        and ${table.completedAt} is null
      ) or (
        ${table.status} in ('completed', 'failed', 'cancelled')
        and ${table.completedAt} is not null
      )`,
    ),
    failureCheck: check(
      'workflow_runs_failure_ck',
      sql`(${table.failureReason} is null) = (${table.failureMessage} is null)`,
    ),
    stepCountCheck: check('workflow_runs_step_count_ck', sql`${table.stepCount} >= 0`),
    workflowIdx: index('workflow_runs_workflow_id_idx').on(table.workflowId),
    startedAtIdx: index('workflow_runs_started_at_idx').on(table.startedAt),
  }),
);

export const runSteps = sqliteTable(
  'run_steps',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    runId: text('run_id')
      .notNull()
      .references(() => workflowRuns.runId, { onDelete: 'cascade' }),
    sequence: integer('sequence').notNull(),
    nodeId: text('node_id').notNull(),
    attempt: integer('attempt').notNull(),
    inputSnapshot: text('input_snapshot', { mode: 'json' }).$type<RunContext>().notNull(),
    output: text('output', { mode: 'json' }).$type<HandlerOutput>(),
    startedAt: text('started_at').notNull(),
    durationMs: integer('duration_ms').notNull(),
    errorKind: text('error_kind'),
    errorMessage: text('error_message'),
    errorCode: text('error_code'),
  },
  table => ({
    runSequenceUnique: uniqueIndex('run_steps_run_id_sequence_uq').on(table.runId, table.sequence),
    sequenceCheck: check('run_steps_sequence_ck', sql`${table.sequence} >= 1`),
    attemptCheck: check('run_steps_attempt_ck', sql`${table.attempt} >= 1`),
    errorKindCheck: check(
      'run_steps_error_kind_ck',
      sql`${table.errorKind} is null or ${table.errorKind} in ('RenderError', 'HandlerError', 'UnknownHandler', 'Timeout', 'Cancelled')`,
    ),
    outcomeCheck: check(
      'run_steps_outcome_ck',
      sql`(${table.output} is null) or (${table.errorKind} is null)`,
    ),
    nodeIdx: index('run_steps_node_id_idx').on(table.nodeId),
  }),
);
