export type ModelCallConfig = {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeout?: number;
  signal?: AbortSignal;
};

export const modelClientErrorCodes = ['MODEL_UNAVAILABLE', 'MODEL_TIMEOUT'] as const;
export type ModelClientErrorCode = (typeof modelClientErrorCodes)[number];

// Opaque language-model capability consumed by decision handlers.
export interface ModelClient {
  readonly name: string;
  complete(prompt: string, config: ModelCallConfig): Promise<string>;
}

export class ModelClientError extends Error {
  readonly code: ModelClientErrorCode;
  readonly provider: string;
  readonly cause?: unknown;

  constructor(
    code: ModelClientErrorCode,
    message: string,
    options: {
      provider: string;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = 'ModelClientError';
    this.code = code;
    this.provider = options.provider;
    this.cause = options.cause;
  }
}
