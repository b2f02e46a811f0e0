import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { IdeationResult } from '@ideaweaver/shared/src/types/ideation.types.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import { IdeationError, toError } from '@ideaweaver/shared/src/utils/errors.js';

const log = createChildLogger('artifacts:writer');

export const IDEAS_FILENAME = 'ideas.json';
export const EVALUATIONS_FILENAME = 'evaluations.json';
export const GRAPH_FILENAME = 'graph.json';

export interface ArtifactPaths {
  readonly ideas: string;
  readonly evaluations: string;
  readonly graph: string;
}

function serialize(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

/** Writes the idea sets, the evaluation archive and the graph snapshot as JSON under `outputDir`. */
export async function writeArtifacts(result: IdeationResult, outputDir: string): Promise<ArtifactPaths> {
  const paths: ArtifactPaths = {
    ideas: join(outputDir, IDEAS_FILENAME),
    evaluations: join(outputDir, EVALUATIONS_FILENAME),
    graph: join(outputDir, GRAPH_FILENAME),
  };

  try {
    await mkdir(outputDir, { recursive: true });
    await Promise.all([
      writeFile(
        paths.ideas,
        serialize({ accepted: result.accepted, rejected: result.rejected, summary: result.summary }),
        'utf-8',
      ),
      writeFile(paths.evaluations, serialize({ reports: result.evaluationArchive }), 'utf-8'),
      writeFile(
        paths.graph,
        serialize({ graph: result.graph, opportunities: result.opportunities }),
        'utf-8',
      ),
    ]);
  } catch (error) {
    const cause = toError(error);
    throw new IdeationError(`Failed to write artifacts to ${outputDir}: ${cause.message}`, 'ARTIFACT_WRITE_ERROR', cause);
  }

  log.info({ outputDir, accepted: result.accepted.length, rejected: result.rejected.length }, 'Artifacts written');
  return paths;
}
