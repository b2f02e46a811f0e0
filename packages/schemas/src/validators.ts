import type { ZodError } from 'zod';
import { SchemaValidationError } from '@ideaweaver/shared/src/utils/errors.js';
import { IdeationConfigSchema } from './ideation.schema.js';
import type { IdeationConfig } from './ideation.schema.js';
import { EnrichedOutlineSchema } from './outline.schema.js';
import type { EnrichedOutline } from './outline.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateIdeationConfig(data: unknown): IdeationConfig {
  const result = IdeationConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid ideation configuration', formatZodErrors(result.error));
  }

  return result.data;
}

/** Defaults for every option, overlaid with `overrides`. */
export function createIdeationConfig(overrides: Record<string, unknown> = {}): IdeationConfig {
  return validateIdeationConfig(overrides);
}

export function validateEnrichedOutline(data: unknown): EnrichedOutline {
  const result = EnrichedOutlineSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid enriched outline', formatZodErrors(result.error));
  }

  return result.data;
}
