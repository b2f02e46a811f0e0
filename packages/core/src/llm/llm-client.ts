import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import {
  ConfigurationError,
  OracleError,
  toError,
  type OracleFailureKind,
} from '@ideaweaver/shared/src/utils/errors.js';
import { extractJson } from './json-extraction.js';
import { readTaskMarker, type OracleTask } from './task-marker.js';

const log = createChildLogger('llm:client');

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  /** JSON schema of the expected answer, appended to the system prompt by the Vertex client. */
  readonly jsonSchema?: object;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

/** The generative-text oracle. Implementations throw `OracleError` on failure. */
export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

const MOCK_RESPONSES: Record<OracleTask, () => unknown> = {
  'entity-extraction': () => ({
    entities: [
      { label: 'graph neural network', kind: 'method', confidence: 0.8, sentenceIndex: 0 },
      { label: 'molecular property prediction', kind: 'task', confidence: 0.7, sentenceIndex: 0 },
    ],
  }),
  'idea-generation': () => ({
    title: 'Mock research idea',
    hypothesis: 'Combining the anchor concepts yields a measurable improvement.',
    innovationPoints: ['Bridges two previously separate lines of work'],
    experimentSketch: 'Compare against the strongest published baseline on a public benchmark.',
  }),
  'idea-revision': () => ({
    title: 'Mock research idea (revised)',
    hypothesis: 'A narrower variant of the idea addresses the reviewers concerns.',
    innovationPoints: ['Bridges two previously separate lines of work', 'Adds an ablation plan'],
    experimentSketch: 'Run the comparison with three seeds and report variance.',
  }),
  'novelty-review': () => ({
    scores: {
      concept: { score: 8.5, rationale: 'The framing is uncommon in the surveyed work.' },
      method: { score: 8.5, rationale: 'The method combination has not been reported.' },
      application: { score: 8.5, rationale: 'The target setting is new.' },
      evaluation: { score: 8.5, rationale: 'The evaluation protocol is standard but adequate.' },
    },
    rationale: 'Mock novelty review.',
  }),
  'feasibility-review': () => ({
    scores: {
      relevance: { score: 7.5, rationale: 'Directly addresses the identified opportunity.' },
      'resource-requirement': { score: 7.5, rationale: 'Fits a single-GPU budget.' },
      risk: { score: 7.5, rationale: 'Main risk is weak transfer; a fallback exists.' },
    },
    rationale: 'Mock feasibility review.',
  }),
};

function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      const task = readTaskMarker(request.systemPrompt);
      log.debug({ task, systemPromptLength: request.systemPrompt.length }, 'Mock LLM invocation');

      const content = JSON.stringify(task ? MOCK_RESPONSES[task]() : { result: 'Mock LLM response' });

      return Promise.resolve({
        content,
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

const FAILURE_PATTERNS: ReadonlyArray<readonly [OracleFailureKind, readonly string[]]> = [
  ['rate-limit', ['429', 'rate limit', 'too many requests', 'quota']],
  ['timeout', ['timeout', 'timed out', 'etimedout', 'deadline']],
  [
    'unavailable',
    [
      '500', '502', '503', 'internal server error', 'bad gateway', 'service unavailable',
      'econnreset', 'econnrefused', 'socket hang up', 'network',
    ],
  ],
  ['refusal', ['safety', 'blocked', 'refus', 'policy']],
];

function readNumericField(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

/** Maps a provider error onto the oracle failure taxonomy. */
export function classifyOracleFailure(error: unknown): OracleError {
  if (error instanceof OracleError) {
    return error;
  }

  const cause = toError(error);
  const statusCode = readNumericField(error, 'status') ?? readNumericField(error, 'statusCode');

  if (statusCode === 429) {
    return new OracleError(`Oracle rate limited: ${cause.message}`, 'rate-limit', cause);
  }
  if (statusCode === 408 || statusCode === 504) {
    return new OracleError(`Oracle timed out: ${cause.message}`, 'timeout', cause);
  }
  if (typeof statusCode === 'number' && statusCode >= 500) {
    return new OracleError(`Oracle unavailable: ${cause.message}`, 'unavailable', cause);
  }

  const message = cause.message.toLowerCase();
  for (const [kind, patterns] of FAILURE_PATTERNS) {
    if (patterns.some((pattern) => message.includes(pattern))) {
      return new OracleError(`Oracle call failed (${kind}): ${cause.message}`, kind, cause);
    }
  }

  return new OracleError(`Oracle call failed: ${cause.message}`, 'malformed', cause);
}

function withSchema(request: LlmRequest): string {
  if (!request.jsonSchema) {
    return request.systemPrompt;
  }
  return `${request.systemPrompt}\n\nRespond with JSON matching this schema:\n${JSON.stringify(request.jsonSchema)}`;
}

async function createVertexClient(): Promise<LlmClient> {
  const projectId = process.env['IDEAWEAVER_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1';
  const modelName = process.env['IDEAWEAVER_MODEL'] ?? 'gemini-2.0-flash';

  if (!projectId) {
    throw new ConfigurationError(
      'GCP_PROJECT_ID environment variable is required for Vertex AI LLM client',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: modelName,
    location,
    temperature: 0.7,
    authOptions: { projectId },
    responseMimeType: 'application/json',
  });

  log.info({ projectId, location, model: modelName }, 'Using Vertex AI LLM client');

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Vertex AI LLM invocation');

      let response;
      try {
        response = await model.invoke([
          ['system', withSchema(request)],
          ['human', request.userMessage],
        ]);
      } catch (error) {
        throw classifyOracleFailure(error);
      }

      const finishReason: unknown = response.response_metadata['finishReason'];
      if (finishReason === 'SAFETY' || finishReason === 'PROHIBITED_CONTENT') {
        throw new OracleError(`Oracle refused the request (${finishReason})`, 'refusal');
      }

      const rawContent =
        typeof response.content === 'string' ? response.content : JSON.stringify(response.content);

      // Re-serialize so downstream parsing never sees a fenced or chatty answer.
      let content: string;
      try {
        content = JSON.stringify(extractJson(rawContent));
      } catch (error) {
        throw new OracleError(
          `Oracle returned no parseable JSON: ${toError(error).message}`,
          'malformed',
          toError(error),
        );
      }

      return {
        content,
        tokenUsage: response.usage_metadata
          ? {
              input: response.usage_metadata.input_tokens,
              output: response.usage_metadata.output_tokens,
            }
          : undefined,
      };
    },
  };
}

export async function createLlmClient(): Promise<LlmClient> {
  if (process.env['IDEAWEAVER_MOCK_LLM'] === 'true') {
    return createMockClient();
  }

  return createVertexClient();
}
