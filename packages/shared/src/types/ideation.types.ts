export type NodeKind = 'concept' | 'method' | 'dataset' | 'task' | 'finding';

export type RelationType = 'supports' | 'contradicts' | 'extends' | 'uses' | 'compares';

export interface GraphNode {
  readonly id: string;
  readonly label: string;
  readonly kind: NodeKind;
  readonly salience: number;
  /** Sorted, de-duplicated document-span ids. */
  readonly sourceRefs: readonly string[];
}

export interface GraphEdge {
  readonly from: string;
  readonly to: string;
  readonly relation: RelationType;
  readonly confidence: number;
}

export interface GraphSnapshot {
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
  readonly nodeCount: number;
  readonly edgeCount: number;
}

export type OpportunityKind = 'gap' | 'transfer' | 'combination';

export interface RelationSignature {
  readonly relation: RelationType;
  readonly neighborKind: NodeKind;
}

export interface TransferDetail {
  readonly sourceNode: string;
  readonly pattern: readonly RelationSignature[];
  readonly targetNodes: readonly string[];
}

export interface Opportunity {
  readonly id: string;
  readonly kind: OpportunityKind;
  readonly anchorNodes: readonly string[];
  readonly rationale: string;
  readonly priority: number;
  readonly transfer?: TransferDetail;
}

export type GenerationStrategy = 'transfer' | 'combination' | 'reverse-engineering' | 'cross-domain';

export type CandidateStatus =
  | 'Proposed'
  | 'Evaluated'
  | 'Refining'
  | 'Accepted'
  | 'Rejected'
  | 'Errored';

export type EvaluatorKind = 'novelty' | 'feasibility';

export const NOVELTY_DIMENSIONS = ['concept', 'method', 'application', 'evaluation'] as const;
export const FEASIBILITY_DIMENSIONS = [
  'relevance',
  'resource-requirement',
  'risk',
  'graph-consistency',
] as const;

export type NoveltyDimension = (typeof NOVELTY_DIMENSIONS)[number];
export type FeasibilityDimension = (typeof FEASIBILITY_DIMENSIONS)[number];

export interface EvaluationReport {
  readonly candidateId: string;
  readonly evaluator: EvaluatorKind;
  readonly round: number;
  readonly dimensionScores: Readonly<Record<string, number>>;
  readonly dimensionRationales: Readonly<Record<string, string>>;
  readonly aggregate: number;
  readonly rationale: string;
  readonly graphConsistency: boolean;
}

export interface CandidateEvaluations {
  readonly novelty: EvaluationReport;
  readonly feasibility: EvaluationReport;
}

export interface IdeaDraft {
  readonly title: string;
  readonly hypothesis: string;
  readonly innovationPoints: readonly string[];
  readonly experimentSketch: string;
}

export interface RevisionSnapshot extends IdeaDraft {
  readonly round: number;
  readonly noveltyScore: number;
  readonly feasibilityScore: number;
  readonly evaluations: CandidateEvaluations;
}

export interface CandidateFailure {
  readonly code: string;
  readonly message: string;
}

export interface Candidate extends IdeaDraft {
  readonly id: string;
  readonly opportunityId: string;
  readonly strategy: GenerationStrategy;
  readonly noveltyScore: number | null;
  readonly feasibilityScore: number | null;
  readonly status: CandidateStatus;
  readonly round: number;
  readonly history: readonly RevisionSnapshot[];
  readonly statusTrail: readonly CandidateStatus[];
  readonly evaluations?: CandidateEvaluations;
  readonly error?: CandidateFailure;
}

export interface SkippedDocument {
  readonly documentId: string;
  readonly reason: string;
}

export interface ErroredCandidate {
  readonly candidateId: string;
  readonly opportunityId: string;
  readonly cause: string;
}

export interface RunSummary {
  readonly accepted: number;
  readonly rejected: number;
  readonly errored: number;
  readonly processedDocuments: readonly string[];
  readonly skippedDocuments: readonly SkippedDocument[];
  readonly opportunities: number;
  readonly droppedOpportunities: readonly string[];
  readonly generationFailures: number;
  readonly erroredCandidates: readonly ErroredCandidate[];
  readonly durationMs: number;
}

export interface IdeationResult {
  readonly accepted: readonly Candidate[];
  readonly rejected: readonly Candidate[];
  readonly evaluationArchive: readonly EvaluationReport[];
  readonly graph: GraphSnapshot;
  readonly opportunities: readonly Opportunity[];
  readonly summary: RunSummary;
}
