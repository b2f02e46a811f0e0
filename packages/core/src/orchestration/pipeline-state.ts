import { Annotation } from '@langchain/langgraph';
import type { IngestedDocument } from '@ideaweaver/shared/src/types/ingestion.types.js';
import type {
  Candidate,
  EvaluationReport,
  IdeationResult,
  Opportunity,
  SkippedDocument,
} from '@ideaweaver/shared/src/types/ideation.types.js';
import type { OpportunityGraph } from '../graph/opportunity-graph.js';
import type { GenerationFailure } from '../generation/candidate-generator.js';

export const IdeationGraphAnnotation = Annotation.Root({
  startedAt: Annotation<number>,
  documents: Annotation<readonly IngestedDocument[]>,
  graph: Annotation<OpportunityGraph | undefined>,
  processedDocuments: Annotation<readonly string[]>,
  skippedDocuments: Annotation<readonly SkippedDocument[]>,
  opportunities: Annotation<readonly Opportunity[]>,
  droppedOpportunities: Annotation<readonly string[]>,
  candidates: Annotation<readonly Candidate[]>,
  generationFailures: Annotation<readonly GenerationFailure[]>,
  evaluationArchive: Annotation<readonly EvaluationReport[]>,
  result: Annotation<IdeationResult | undefined>,
});

export type IdeationGraphState = typeof IdeationGraphAnnotation.State;
export type IdeationGraphUpdate = Partial<IdeationGraphState>;
