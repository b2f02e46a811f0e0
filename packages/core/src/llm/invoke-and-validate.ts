import type { z } from 'zod';
import type { LlmClient, LlmRequest } from './llm-client.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import { OracleError, toError } from '@ideaweaver/shared/src/utils/errors.js';
import { extractJson } from './json-extraction.js';

const log = createChildLogger('llm:invoke-and-validate');

const DEFAULT_MAX_RETRIES = 1;

export interface InvokeAndValidateOptions<T extends z.ZodTypeAny> {
  readonly llmClient: LlmClient;
  readonly request: LlmRequest;
  readonly schema: T;
  /** Component name used in logs and in the final error message. */
  readonly caller: string;
  readonly maxRetries?: number;
}

function withCorrection(request: LlmRequest, errors: readonly string[]): LlmRequest {
  return {
    ...request,
    userMessage: `${request.userMessage}\n\n[CORRECTION] Your previous response had validation errors. Please fix these issues and respond with valid JSON:\n${errors.map((e) => `- ${e}`).join('\n')}`,
  };
}

/**
 * Invokes the oracle and validates its JSON answer, re-asking with the
 * validation errors appended when the answer does not fit `schema`.
 * Oracle failures propagate untouched; output that never validates becomes a
 * non-transient `OracleError` of kind `malformed`.
 */
export async function invokeAndValidate<T extends z.ZodTypeAny>(
  options: InvokeAndValidateOptions<T>,
): Promise<z.infer<T>> {
  const { llmClient, request, schema, caller, maxRetries = DEFAULT_MAX_RETRIES } = options;

  let errors: string[] = [];

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const response = await llmClient.invoke(attempt === 0 ? request : withCorrection(request, errors));
    if (response.tokenUsage) {
      log.debug({ caller, attempt: attempt + 1, ...response.tokenUsage }, 'Oracle token usage');
    }

    let parsed: unknown;
    try {
      parsed = extractJson(response.content);
    } catch (error) {
      errors = [`Failed to parse JSON: ${toError(error).message}`];
      log.warn({ caller, attempt: attempt + 1, errors }, 'JSON parse failed, retrying with correction');
      continue;
    }

    const result = schema.safeParse(parsed);
    if (result.success) {
      // eslint-disable-next-line @typescript-eslint/no-unsafe-return
      return result.data;
    }

    errors = result.error.errors.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`);
    log.warn({ caller, attempt: attempt + 1, errors }, 'Schema validation failed, retrying with correction');
  }

  throw new OracleError(
    `${caller} returned invalid output after ${String(maxRetries + 1)} attempts: ${errors.join(', ')}`,
    'malformed',
  );
}
