import type { LlmClient } from '../llm/llm-client.js';
import type { BatchExecutor } from '../execution/batch-executor.js';
import type { EntityExtractor, EntityMention, ExtractionInput } from './entity-extractor.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import { taskMarker } from '../llm/task-marker.js';
import {
  EntityExtractionResultJsonSchema,
  EntityExtractionResultSchema,
} from '../llm/oracle-output.schemas.js';

const log = createChildLogger('graph:llm-entity-extractor');

const SYSTEM_PROMPT = `${taskMarker('entity-extraction')}
You extract research entities from one section of a scientific survey.

Entity kinds:
- concept: an abstract idea or phenomenon
- method: a model, algorithm, architecture or technique
- dataset: a dataset, corpus or benchmark
- task: a problem the field tries to solve
- finding: an empirical claim or result

Rules:
- Only extract entities that are named in the given sentences
- sentenceIndex is the number shown in front of the sentence the entity occurs in
- confidence is between 0 and 1

Respond with a JSON object: {"entities": [{"label", "kind", "confidence", "sentenceIndex"}]}`;

/** Asks the generative oracle for the entities of each section. */
export function createLlmEntityExtractor(llmClient: LlmClient, executor: BatchExecutor): EntityExtractor {
  return {
    async extract({ document, section, outlineEntry }: ExtractionInput): Promise<readonly EntityMention[]> {
      if (section.sentences.length === 0) {
        return [];
      }

      const keyPoints = outlineEntry?.keyPoints.length
        ? `\nKey points of this section: ${outlineEntry.keyPoints.join('; ')}`
        : '';
      const numbered = section.sentences.map((s, i) => `[${String(i)}] ${s}`).join('\n');
      const label = `${document.id}#${String(section.index)}`;

      const result = await executor.call(
        () =>
          invokeAndValidate({
            llmClient,
            request: {
              systemPrompt: SYSTEM_PROMPT,
              userMessage: `Survey: ${document.title}\nSection: ${section.heading || '(untitled)'}${keyPoints}\n\n${numbered}`,
              jsonSchema: EntityExtractionResultJsonSchema,
            },
            schema: EntityExtractionResultSchema,
            caller: 'EntityExtractor',
          }),
        { label },
      );

      const mentions = result.entities.filter(
        (entity) => entity.sentenceIndex < section.sentences.length,
      );
      if (mentions.length < result.entities.length) {
        log.warn(
          { section: label, dropped: result.entities.length - mentions.length },
          'Dropped entities pointing past the last sentence',
        );
      }
      return mentions;
    },
  };
}
