import { resolve } from 'node:path';
import { loadConfig } from '@ideaweaver/schemas/src/config-loader.js';
import { loadSurveyDocument } from '@ideaweaver/ingestion/src/survey/survey-loader.js';
import { createLlmClient } from '@ideaweaver/core/src/llm/llm-client.js';
import { BatchExecutor } from '@ideaweaver/core/src/execution/batch-executor.js';
import { createGraphBuilder } from '@ideaweaver/core/src/graph/graph-builder.js';
import { createLexicalEntityExtractor } from '@ideaweaver/core/src/graph/lexical-extractor.js';
import { createLlmEntityExtractor } from '@ideaweaver/core/src/graph/llm-entity-extractor.js';
import { createHashingEmbeddingClient } from '@ideaweaver/core/src/embedding/hashing-embedding-client.js';
import {
  createInMemoryPassageStore,
  passagesFromDocuments,
} from '@ideaweaver/core/src/rag/passage-store.js';
import { createIdeationPipeline } from '@ideaweaver/core/src/orchestration/pipeline.js';
import { writeArtifacts } from '@ideaweaver/core/src/artifacts/artifact-writer.js';

async function main(): Promise<void> {
  const surveyPath = process.argv[2];
  if (!surveyPath) {
    console.error('Usage: npm run ideate -- <survey.md> [outline.json] [output-dir]');
    process.exit(1);
  }
  const outlinePath = process.argv[3];
  const configDir = process.env['IDEAWEAVER_CONFIG_DIR'] ?? resolve(process.cwd(), 'config');

  console.log('=== Ideation Runner ===\n');
  console.log(`Survey: ${surveyPath}`);
  console.log(`Outline: ${outlinePath ?? '(derived from title and keywords)'}`);
  console.log(`Config directory: ${configDir}`);
  console.log(`Mock LLM: ${process.env['IDEAWEAVER_MOCK_LLM'] === 'true' ? 'yes' : 'no'}\n`);

  const config = await loadConfig(configDir);
  const document = await loadSurveyDocument({ surveyPath, outlinePath });
  const outputDir = process.argv[4] ?? resolve(process.cwd(), 'ideation-output', document.id);

  const llmClient = await createLlmClient();
  const extractor =
    config.extraction === 'llm'
      ? createLlmEntityExtractor(
          llmClient,
          new BatchExecutor({
            name: 'extraction',
            concurrency: config.generationConcurrency,
            retry: config.retry,
            callTimeoutMs: config.callTimeoutMs,
          }),
        )
      : createLexicalEntityExtractor();

  const passageStore = createInMemoryPassageStore(createHashingEmbeddingClient());
  await passageStore.add(passagesFromDocuments([document]));

  const pipeline = createIdeationPipeline({
    config,
    llmClient,
    graphBuilder: createGraphBuilder({ extractor, config: config.graph }),
    passageStore,
  });

  console.log(`Running pipeline (${config.extraction} extraction, ${String(passageStore.size)} passages)...\n`);
  const result = await pipeline.run([document]);
  const paths = await writeArtifacts(result, outputDir);

  const { summary } = result;
  console.log('--- Summary ---');
  console.log(`  Graph: ${String(result.graph.nodeCount)} nodes, ${String(result.graph.edgeCount)} edges`);
  console.log(`  Opportunities: ${String(summary.opportunities)}`);
  console.log(
    `  Candidates: ${String(summary.accepted)} accepted, ${String(summary.rejected)} rejected, ${String(summary.errored)} errored`,
  );
  console.log(`  Generation failures: ${String(summary.generationFailures)}`);
  for (const skipped of summary.skippedDocuments) {
    console.log(`  Skipped ${skipped.documentId}: ${skipped.reason}`);
  }
  for (const errored of summary.erroredCandidates) {
    console.log(`  Errored ${errored.candidateId}: ${errored.cause}`);
  }

  console.log('\n--- Accepted ideas ---');
  for (const idea of result.accepted) {
    console.log(
      `  [${idea.id}] ${idea.title} (novelty ${String(idea.noveltyScore)}, feasibility ${String(idea.feasibilityScore)})`,
    );
  }

  console.log(`\nArtifacts: ${paths.ideas}, ${paths.evaluations}, ${paths.graph}`);
  console.log(`Completed in ${String(summary.durationMs)}ms`);
}

main().catch((error: unknown) => {
  console.error('Ideation run failed:', error);
  process.exit(1);
});
