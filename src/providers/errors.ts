/**
 * Maps OpenAI client failures onto ClipsenseError codes
 */

import { APIConnectionTimeoutError, APIUserAbortError } from 'openai';
import { ErrorCode, ClipsenseError, errorMessage } from '../types/index.js';
import type { CallOptions } from './types.js';

export function toProviderError(
  error: unknown,
  fallback: ErrorCode,
  label: string,
  options: CallOptions = {}
): ClipsenseError {
  if (error instanceof ClipsenseError) return error;

  const cause = error instanceof Error ? error : undefined;

  if (options.signal?.aborted || error instanceof APIUserAbortError) {
    return new ClipsenseError(ErrorCode.CANCELLED, `${label}: request cancelled`, cause);
  }
  if (error instanceof APIConnectionTimeoutError) {
    const after = options.timeoutMs !== undefined ? ` after ${options.timeoutMs}ms` : '';
    return new ClipsenseError(ErrorCode.PROVIDER_TIMEOUT, `${label}: request timed out${after}`, cause);
  }
  return new ClipsenseError(fallback, `${label}: ${errorMessage(error)}`, cause);
}
