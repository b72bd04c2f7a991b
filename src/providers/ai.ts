/**
 * AI Provider - OpenAI chat completions returning schema-validated JSON
 */

import OpenAI from 'openai';
import type { ZodError } from 'zod';
import { ErrorCode, ClipsenseError } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { toProviderError } from './errors.js';
import type { CallOptions, ReasoningRequest, StructuredReasoningProvider } from './types.js';

/**
 * SCHEMA_VIOLATION error listing each failed path
 */
export function schemaViolation(task: string, error: ZodError): ClipsenseError {
  const issues = error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return new ClipsenseError(ErrorCode.SCHEMA_VIOLATION, `invalid ${task} response (${issues})`);
}

export interface AIProviderOptions {
  model?: string;
  temperature?: number;
  maxRetries?: number;
}

export class AIProvider implements StructuredReasoningProvider {
  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(apiKey?: string, options: AIProviderOptions = {}) {
    const key = apiKey || process.env.OPENAI_API_KEY;
    if (!key) {
      throw new ClipsenseError(
        ErrorCode.API_KEY_MISSING,
        'An OpenAI API key is required. Set the OPENAI_API_KEY environment variable.'
      );
    }
    this.client = new OpenAI({ apiKey: key, maxRetries: options.maxRetries ?? 2 });
    this.model = options.model ?? 'gpt-4o-mini';
    this.temperature = options.temperature ?? 0;
  }

  /**
   * Ask for a JSON object and validate it against the request schema
   */
  async generate<T>(request: ReasoningRequest<T>, options: CallOptions = {}): Promise<T> {
    let content: string;
    try {
      logger.debug(`AI request started: ${request.task}`, { model: this.model, length: request.user.length });

      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user },
          ],
          temperature: this.temperature,
          response_format: { type: 'json_object' },
        },
        { signal: options.signal, timeout: options.timeoutMs }
      );

      content = response.choices[0]?.message?.content || '';
    } catch (error) {
      throw toProviderError(error, ErrorCode.PROVIDER_UNAVAILABLE, `${request.task} request failed`, options);
    }

    const result = request.schema.safeParse(this.parseJson(content, request.task));
    if (!result.success) {
      throw schemaViolation(request.task, result.error);
    }

    logger.debug(`AI request finished: ${request.task}`);
    return result.data;
  }

  /**
   * Parse the JSON object in a completion, tolerating surrounding prose
   */
  parseJson(content: string, task: string): unknown {
    const jsonMatch = content.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
      throw new ClipsenseError(ErrorCode.SCHEMA_VIOLATION, `invalid ${task} response (no JSON object found)`);
    }
    try {
      return JSON.parse(jsonMatch[0]);
    } catch {
      throw new ClipsenseError(ErrorCode.SCHEMA_VIOLATION, `invalid ${task} response (malformed JSON)`);
    }
  }
}
