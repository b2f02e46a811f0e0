import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { classifyOracleFailure, createLlmClient } from './llm-client.js';
import { taskMarker } from './task-marker.js';
import { OracleError } from '@ideaweaver/shared/src/utils/errors.js';

describe('createLlmClient', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('mock mode', () => {
    beforeEach(() => {
      process.env['IDEAWEAVER_MOCK_LLM'] = 'true';
    });

    it('should answer generation prompts with an idea draft', async () => {
      const client = await createLlmClient();
      const response = await client.invoke({
        systemPrompt: `${taskMarker('idea-generation')} You generate research ideas.`,
        userMessage: 'Opportunity context',
      });

      const parsed = JSON.parse(response.content) as Record<string, unknown>;
      expect(parsed).toHaveProperty('hypothesis');
      expect(parsed).toHaveProperty('innovationPoints');
      expect(parsed).toHaveProperty('experimentSketch');
    });

    it('should answer novelty reviews with every novelty dimension', async () => {
      const client = await createLlmClient();
      const response = await client.invoke({
        systemPrompt: `${taskMarker('novelty-review')} You review novelty.`,
        userMessage: 'Candidate',
      });

      const parsed = JSON.parse(response.content) as { scores: Record<string, unknown> };
      expect(Object.keys(parsed.scores)).toEqual(['concept', 'method', 'application', 'evaluation']);
    });

    it('should fall back to a generic answer for untagged prompts', async () => {
      const client = await createLlmClient();
      const response = await client.invoke({ systemPrompt: 'Plain prompt', userMessage: 'x' });

      expect(JSON.parse(response.content)).toEqual({ result: 'Mock LLM response' });
      expect(response.tokenUsage).toEqual({ input: 100, output: 50 });
    });
  });

  describe('vertex mode', () => {
    it('should throw ConfigurationError when GCP_PROJECT_ID is missing', async () => {
      delete process.env['IDEAWEAVER_MOCK_LLM'];
      delete process.env['IDEAWEAVER_GCP_PROJECT_ID'];
      delete process.env['GCP_PROJECT_ID'];

      await expect(createLlmClient()).rejects.toThrow('GCP_PROJECT_ID');
    });
  });
});

describe('classifyOracleFailure', () => {
  function withStatus(message: string, status: number): Error {
    return Object.assign(new Error(message), { status });
  }

  it('should classify HTTP 429 as a transient rate limit', () => {
    const error = classifyOracleFailure(withStatus('Too busy', 429));
    expect(error.kind).toBe('rate-limit');
    expect(error.transient).toBe(true);
  });

  it('should classify 5xx status codes as unavailable', () => {
    expect(classifyOracleFailure(withStatus('oops', 503)).kind).toBe('unavailable');
  });

  it('should classify timeouts by message', () => {
    const error = classifyOracleFailure(new Error('Request timed out after 60s'));
    expect(error.kind).toBe('timeout');
    expect(error.transient).toBe(true);
  });

  it('should classify safety blocks as non-transient refusals', () => {
    const error = classifyOracleFailure(new Error('Response was blocked due to SAFETY'));
    expect(error.kind).toBe('refusal');
    expect(error.transient).toBe(false);
  });

  it('should treat unknown failures as malformed', () => {
    const error = classifyOracleFailure('unexpected token');
    expect(error.kind).toBe('malformed');
    expect(error.message).toBe('Oracle call failed: unexpected token');
  });

  it('should pass existing OracleErrors through', () => {
    const original = new OracleError('already classified', 'timeout');
    expect(classifyOracleFailure(original)).toBe(original);
  });
});
