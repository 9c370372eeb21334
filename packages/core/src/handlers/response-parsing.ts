import { HandlerError } from '../errors.js';

const fencedBlockPattern = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Finds the JSON payload in a model response: a fenced block when present, otherwise the span
 * from the first `{` to the last `}`.
 */
export function extractJsonPayload(text: string): string | null {
  const fenced = fencedBlockPattern.exec(text);
  if (fenced) {
    return fenced[1].trim();
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }

  return text.slice(start, end + 1);
}

export function decodeJsonObject(text: string): Record<string, unknown> {
  const payload = extractJsonPayload(text);
  if (payload === null) {
    throw new HandlerError('MALFORMED_RESPONSE', 'Model response does not contain a JSON object.', {
      responsePreview: text.slice(0, 200),
    });
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(payload);
  } catch (error) {
    throw new HandlerError(
      'MALFORMED_RESPONSE',
      `Model response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { responsePreview: payload.slice(0, 200) },
      error,
    );
  }

  if (decoded === null || typeof decoded !== 'object' || Array.isArray(decoded)) {
    throw new HandlerError('MALFORMED_RESPONSE', 'Model response JSON must be an object.', {
      responsePreview: payload.slice(0, 200),
    });
  }

  return { ...decoded };
}
