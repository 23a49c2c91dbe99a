/**
 * Example: running the eval harness from code
 *
 *   OPENAI_API_KEY=... npx tsx examples/programmatic-eval.ts
 */

import { fileURLToPath } from 'url';
import {
  ConfigManager,
  InProcessAgentRunner,
  createOpenAIModel,
  loadCases,
  logger,
  runEvals,
} from '../src/index.js';

async function main() {
  const repo = fileURLToPath(new URL('./report-repo/', import.meta.url));
  const settings = ConfigManager.getInstance().resolveSettings();

  const cases = await loadCases(`${repo}evals/cases.jsonl`);
  const runner = new InProcessAgentRunner({
    model: createOpenAIModel(settings),
    maxSteps: settings.maxSteps,
    contextFiles: ['AGENTS.md'],
  });

  const report = await runEvals(cases, runner, { workdir: repo, skillsDir: 'skills/', concurrency: 2 });

  for (const result of report.results) {
    const failed = result.checks.filter(check => !check.passed).map(check => check.name);
    console.log(`${result.passed ? 'PASS' : 'FAIL'} ${result.id}${failed.length > 0 ? ` (${failed.join(', ')})` : ''}`);
  }
  console.log(`\n${report.passed}/${report.total} passed`);
}

main().catch(error => {
  logger.error('Example failed', error);
  process.exit(1);
});
