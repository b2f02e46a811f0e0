import type { DocumentSection, IngestedDocument, OutlineEntry } from '@ideaweaver/shared/src/types/ingestion.types.js';
import type { NodeKind } from '@ideaweaver/shared/src/types/ideation.types.js';

export interface EntityMention {
  readonly label: string;
  readonly kind: NodeKind;
  readonly confidence: number;
  readonly sentenceIndex: number;
}

export interface ExtractionInput {
  readonly document: IngestedDocument;
  readonly section: DocumentSection;
  readonly outlineEntry: OutlineEntry | undefined;
}

export interface EntityExtractor {
  extract(input: ExtractionInput): Promise<readonly EntityMention[]>;
}
