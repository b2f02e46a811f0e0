/** One entry of an enriched outline: a section title and the key points it should cover. */
export interface OutlineEntry {
  readonly section: string;
  readonly keyPoints: readonly string[];
  readonly weight?: number;
}

/** Parsed document text plus its outline, as supplied by the ingestion collaborator. */
export interface IngestedDocument {
  readonly id: string;
  readonly title: string;
  readonly text: string;
  readonly outline: readonly OutlineEntry[];
  readonly abstract?: string;
  readonly keywords?: readonly string[];
}

export interface DocumentSection {
  readonly index: number;
  readonly heading: string;
  readonly sentences: readonly string[];
}
