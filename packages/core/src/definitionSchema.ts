import { z } from 'zod';
import type { GuardExpression } from '@flowpilot/shared';

const guardLiteralSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const guardExpressionSchema: z.ZodType<GuardExpression> = z.lazy(() =>
  z.union([
    z.object({
      field: z.string().min(1),
      operator: z.enum(['==', '!=', '>', '<', '>=', '<=']),
      value: guardLiteralSchema,
    }),
    z.object({
      logic: z.enum(['and', 'or']),
      conditions: z.array(guardExpressionSchema).min(1),
    }),
    z.object({
      not: guardExpressionSchema,
    }),
  ]),
);

export const workflowNodeDocumentSchema = z
  .object({
    id: z.string().min(1),
    handler: z.string().min(1).optional(),
    prompt: z.string().min(1).optional(),
    terminal: z.boolean().default(false),
    config: z.record(z.unknown()).default({}),
    maxRetries: z.number().int().min(0).optional(),
    onError: z.enum(['retry', 'route', 'fail']).optional(),
    errorTarget: z.string().min(1).optional(),
    outputKey: z.string().min(1).optional(),
    outputFields: z.array(z.string().min(1)).optional(),
    failOnDeadEnd: z.boolean().default(false),
  })
  .strict();

export const workflowEdgeDocumentSchema = z
  .object({
    from: z.string().min(1),
    to: z.string().min(1),
    when: z.union([z.string(), guardExpressionSchema]).optional(),
    default: z.boolean().default(false),
  })
  .strict();

export const workflowDocumentSchema = z
  .object({
    id: z.string().min(1),
    version: z.number().int().min(1).default(1),
    description: z.string().optional(),
    entry: z.string().min(1),
    nodes: z.array(workflowNodeDocumentSchema).min(1),
    edges: z.array(workflowEdgeDocumentSchema).default([]),
  })
  .strict();

export type WorkflowDocument = z.input<typeof workflowDocumentSchema>;
export type ParsedWorkflowDocument = z.output<typeof workflowDocumentSchema>;
export type WorkflowNodeDocument = z.output<typeof workflowNodeDocumentSchema>;
export type WorkflowEdgeDocument = z.output<typeof workflowEdgeDocumentSchema>;

export function formatSchemaIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
