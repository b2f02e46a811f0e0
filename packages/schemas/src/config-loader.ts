import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError, toError } from '@ideaweaver/shared/src/utils/errors.js';
import { validateIdeationConfig } from './validators.js';
import type { IdeationConfig } from './ideation.schema.js';

export const CONFIG_FILENAME = 'ideation.json';

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${toError(error).message}`,
    );
  }
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, number> {
  const overrides: Record<string, number> = {};
  const numeric: ReadonlyArray<[string, string]> = [
    ['IDEAWEAVER_GENERATION_CONCURRENCY', 'generationConcurrency'],
    ['IDEAWEAVER_EVALUATION_CONCURRENCY', 'evaluationConcurrency'],
    ['IDEAWEAVER_MAX_ROUNDS', 'maxRounds'],
    ['IDEAWEAVER_MAX_INITIAL_IDEAS', 'maxInitialIdeas'],
    ['IDEAWEAVER_RUN_DEADLINE_MS', 'runDeadlineMs'],
  ];

  for (const [variable, key] of numeric) {
    const raw = env[variable];
    if (raw === undefined || raw === '') continue;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${variable} must be a number, got "${raw}"`);
    }
    overrides[key] = value;
  }

  return overrides;
}

export async function loadConfig(
  configDir: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<IdeationConfig> {
  const raw = await readJsonFile(join(configDir, CONFIG_FILENAME));

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigurationError(`${CONFIG_FILENAME} must contain a JSON object`);
  }

  return validateIdeationConfig({ ...raw, ...readEnvOverrides(env) });
}
