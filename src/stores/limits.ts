export type RequestLimits = {
  maxQuestionLength: number;
  maxContextLength: number;
  maxAgentLength: number;
  maxTaskLength: number;
  maxCommandLength: number;
  maxAnswerLength: number;
  maxPendingRequests: number;
  answeredRetentionMs: number;
};

export const DEFAULT_REQUEST_LIMITS: RequestLimits = {
  maxQuestionLength: 2_000,
  maxContextLength: 5_000,
  maxAgentLength: 100,
  maxTaskLength: 200,
  maxCommandLength: 2_000,
  maxAnswerLength: 10_000,
  maxPendingRequests: 100,
  answeredRetentionMs: 300_000,
};

export const MAX_REQUEST_BODY_BYTES = 64 * 1024;

export const REQUEST_ID_PATTERN = /^[0-9a-f]{12}$/;

export function isValidRequestId(value: string): boolean {
  return REQUEST_ID_PATTERN.test(value);
}

/** Cuts `value` to at most `limit` code points, never splitting a surrogate pair. */
export function truncate(value: string, limit: number): string {
  if (value.length <= limit) return value;
  let end = 0;
  let count = 0;
  for (const char of value) {
    if (count === limit) break;
    end += char.length;
    count += 1;
  }
  return value.slice(0, end);
}

export function truncateOptional(value: string | null | undefined, limit: number): string | null {
  if (value === null || value === undefined) return null;
  return truncate(value, limit);
}
