import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig } from '@embedlens/schemas/src/config-loader.js';
import { createOllamaEmbeddingClient } from '@embedlens/core/src/embedding/ollama-embedding-client.js';
import { createMockEmbeddingClient } from '@embedlens/core/src/embedding/mock-embedding-client.js';
import {
  createComparisonService,
  DEFAULT_FIRST_TEXT,
  DEFAULT_SECOND_TEXT,
} from '@embedlens/core/src/comparison/comparison-service.js';
import { formatMetric } from '@embedlens/core/src/similarity/similarity-evaluator.js';

function flagValue(name: string): string | undefined {
  const flag = process.argv.find((a) => a.startsWith(`--${name}=`));
  return flag?.slice(name.length + 3);
}

async function main(): Promise<void> {
  const positionalArgs = process.argv.slice(2).filter((a) => !a.startsWith('--'));
  const firstText = positionalArgs[0] ?? DEFAULT_FIRST_TEXT;
  const secondText = positionalArgs[1] ?? DEFAULT_SECOND_TEXT;
  const outPath = resolve(process.cwd(), flagValue('out') ?? 'comparison.svg');
  const useMock = process.env['EMBEDLENS_MOCK_EMBEDDINGS'] === 'true';

  const config = await loadConfig(flagValue('config') ?? process.env['EMBEDLENS_CONFIG']);

  console.log('=== EmbedLens ===\n');
  console.log(`Provider: ${useMock ? 'mock' : config.ollama.baseUrl}`);
  console.log(`Text 1: ${firstText}`);
  console.log(`Text 2: ${secondText}\n`);

  const embeddingClient = useMock
    ? createMockEmbeddingClient()
    : createOllamaEmbeddingClient(config.ollama);

  if (!(await embeddingClient.checkConnection())) {
    console.error(
      `Cannot connect to Ollama server at ${embeddingClient.baseUrl}. Please make sure it's running.`,
    );
    process.exit(1);
  }

  const service = createComparisonService({
    embeddingClient,
    defaultModel: config.embedding.defaultModel,
    renderOptions: config.figure,
  });

  const result = await service.compareTexts({
    model: flagValue('model'),
    firstText,
    secondText,
  });

  console.log(`Model: ${result.model}`);
  console.log(`Dimensions: ${String(result.dimension)}\n`);
  console.log('--- Similarity Metrics ---');
  console.log(`  Cosine Similarity:  ${formatMetric(result.similarity.cosineSimilarity)}`);
  console.log(`  Euclidean Distance: ${formatMetric(result.similarity.euclideanDistance)}`);

  await writeFile(outPath, result.svg, 'utf-8');
  console.log(`\nFigure written to ${outPath}`);
}

main().catch((error: unknown) => {
  console.error('Comparison failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
