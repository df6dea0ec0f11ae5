import { readFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';

import { getSearchServiceConfig } from '../config';
import { createSearchComponents } from '../container';
import { formatEvaluationReport, parseEvaluationCases, runEvaluation } from '../evaluation/run-evaluation';

const DEFAULT_CASES_PATH = 'services/tr-search-svc/evaluation/cases.example.json';

async function main(): Promise<void> {
  const casesPath = path.resolve(process.argv[2] ?? DEFAULT_CASES_PATH);
  const cases = parseEvaluationCases(JSON.parse(await readFile(casesPath, 'utf8')));
  console.log(`Loaded ${cases.length} evaluation queries from ${casesPath}`);

  const config = getSearchServiceConfig();
  const vectorOnly = createSearchComponents(config, { enableRerank: false, disableCache: true });
  const reranked = createSearchComponents(config, { enableRerank: true, disableCache: true });

  try {
    const withoutRerank = await runEvaluation(vectorOnly.service, cases);
    const withRerank = await runEvaluation(reranked.service, cases);

    console.log(formatEvaluationReport('Vector search only', withoutRerank));
    console.log(formatEvaluationReport('Vector search + rerank', withRerank));

    for (const [metric, value] of Object.entries(withRerank.aggregate)) {
      const baseline = withoutRerank.aggregate[metric] ?? 0;
      const delta = baseline > 0 ? ((value - baseline) / baseline) * 100 : 0;
      console.log(`  ${metric.padEnd(14)} ${delta >= 0 ? '+' : ''}${delta.toFixed(1)}%`);
    }
  } finally {
    await Promise.all([vectorOnly.service.close(), reranked.service.close()]);
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
