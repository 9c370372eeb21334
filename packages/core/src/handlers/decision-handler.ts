import { z } from 'zod';
import { ModelClientError, type HandlerOutput, type ModelCallConfig, type ModelClient } from '@flowpilot/shared';
import { formatSchemaIssues } from '../definitionSchema.js';
import { HandlerError, toErrorMessage } from '../errors.js';
import type { HandlerRequest, NodeHandler } from '../handlerRegistry.js';
import { decodeJsonObject } from './response-parsing.js';

export const decisionOutputSchema = z
  .object({
    decision: z.string().min(1),
    confidence: z.number().min(0).max(1),
    reasoning: z.string(),
  })
  .passthrough();

export type DecisionOutput = z.infer<typeof decisionOutputSchema>;

export const decisionNodeConfigSchema = z
  .object({
    allowedDecisions: z.array(z.string().min(1)).min(1).optional(),
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
    minConfidence: z.number().min(0).max(1).optional(),
    lowConfidenceDecision: z.string().min(1).optional(),
  })
  .passthrough();

export type DecisionNodeConfig = z.infer<typeof decisionNodeConfigSchema>;

export type DecisionHandlerOptions = {
  model: ModelClient;
  // Replaces the default decision/confidence/reasoning contract.
  schema?: z.ZodType<HandlerOutput, z.ZodTypeDef, unknown>;
  // Turns the raw reply into the value the schema validates. Defaults to JSON object extraction.
  parseResponse?: (response: string) => unknown;
};

function parseModelResponse(parse: (response: string) => unknown, response: string): unknown {
  try {
    return parse(response);
  } catch (error) {
    if (error instanceof HandlerError) {
      throw error;
    }
    throw new HandlerError(
      'MALFORMED_RESPONSE',
      `Model response could not be parsed: ${toErrorMessage(error)}`,
      { responsePreview: response.slice(0, 200) },
      error,
    );
  }
}

function readNodeConfig(request: HandlerRequest): DecisionNodeConfig {
  const parsed = decisionNodeConfigSchema.safeParse(request.node.config);
  if (!parsed.success) {
    throw new HandlerError(
      'INVALID_NODE_CONFIG',
      `Node "${request.node.id}" has invalid decision config: ${formatSchemaIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

function toModelCallConfig(config: DecisionNodeConfig, signal: AbortSignal): ModelCallConfig {
  const callConfig: ModelCallConfig = { signal };
  if (config.model !== undefined) callConfig.model = config.model;
  if (config.temperature !== undefined) callConfig.temperature = config.temperature;
  if (config.maxTokens !== undefined) callConfig.maxTokens = config.maxTokens;
  return callConfig;
}

async function completePrompt(model: ModelClient, prompt: string, callConfig: ModelCallConfig): Promise<string> {
  try {
    return await model.complete(prompt, callConfig);
  } catch (error) {
    if (error instanceof ModelClientError) {
      throw new HandlerError(error.code, error.message, { provider: error.provider }, error);
    }
    throw new HandlerError('MODEL_UNAVAILABLE', `Model "${model.name}" failed: ${toErrorMessage(error)}`, {
      provider: model.name,
    }, error);
  }
}

function applyDecisionRules(output: HandlerOutput, config: DecisionNodeConfig, nodeId: string): HandlerOutput {
  const decision = output.decision;
  if (config.allowedDecisions && typeof decision === 'string' && !config.allowedDecisions.includes(decision)) {
    throw new HandlerError(
      'SCHEMA_VIOLATION',
      `Node "${nodeId}" received decision "${decision}"; expected one of ${config.allowedDecisions.join(', ')}.`,
      { decision, allowedDecisions: config.allowedDecisions },
    );
  }

  const confidence = output.confidence;
  if (
    config.minConfidence !== undefined &&
    config.lowConfidenceDecision !== undefined &&
    typeof confidence === 'number' &&
    confidence < config.minConfidence
  ) {
    return { ...output, decision: config.lowConfidenceDecision, originalDecision: decision ?? null, lowConfidence: true };
  }

  return output;
}

/**
 * Model-backed handler: sends the rendered prompt to the model, decodes the reply (the JSON
 * object in it, unless `parseResponse` is given) and validates it against the decision schema.
 * Every decoding problem is a HandlerError.
 */
export function createDecisionHandler(options: DecisionHandlerOptions): NodeHandler {
  const schema: z.ZodType<HandlerOutput, z.ZodTypeDef, unknown> = options.schema ?? decisionOutputSchema;
  const parse = options.parseResponse ?? decodeJsonObject;

  return Object.freeze({
    kind: 'decision' as const,
    async invoke(request: HandlerRequest): Promise<HandlerOutput> {
      if (request.prompt === null) {
        throw new HandlerError('MISSING_PROMPT', `Decision node "${request.node.id}" declares no prompt template.`);
      }

      const config = readNodeConfig(request);
      const response = await completePrompt(options.model, request.prompt, toModelCallConfig(config, request.signal));
      const decoded = parseModelResponse(parse, response);

      const validated = schema.safeParse(decoded);
      if (!validated.success) {
        throw new HandlerError(
          'SCHEMA_VIOLATION',
          `Model response for node "${request.node.id}" violates the decision schema: ${formatSchemaIssues(validated.error)}`,
          { issues: validated.error.issues },
        );
      }

      return applyDecisionRules(validated.data, config, request.node.id);
    },
  });
}
