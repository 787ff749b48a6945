import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { searchJobs } from '@jobcompass/adzuna';
import { renderFailure } from '@jobcompass/listing-format';
import { validateSearchInput } from '@jobcompass/listing-sdk';
import { describeAppConfig, loadAppConfig, loadEnvFiles, validateAppConfig } from './config.js';
import { createAnthropicGenerator } from './model.js';
import { createAdvisorLogger } from './observability/logger.js';
import { runCareerPipeline } from './pipeline.js';
import { createFileSink } from './sink.js';

const repoRoot = resolve(dirname(fileURLToPath(import.meta.url)), '../../../');

const USAGE = `Usage: npm run advisor -- [--role <title>] [--location <place>] [--num-results <1-50>] [--check-config]`;

function parseNumResults(raw: string | undefined, fallback: number): unknown {
  if (raw === undefined) {
    return fallback;
  }

  const trimmed = raw.trim();
  return trimmed === '' ? raw : Number(trimmed);
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      role: { type: 'string' },
      location: { type: 'string' },
      'num-results': { type: 'string' },
      'check-config': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  loadEnvFiles(repoRoot);
  const config = loadAppConfig();
  const logger = createAdvisorLogger(config.logging);
  const problems = validateAppConfig(config);

  if (values['check-config']) {
    process.stdout.write(`${describeAppConfig(config)}\n`);
    for (const problem of problems) {
      process.stdout.write(`! ${problem}\n`);
    }
    return problems.length > 0 ? 1 : 0;
  }

  const apiKey = config.model.apiKey;
  if (!apiKey || problems.length > 0) {
    logger.error({ event: 'config_invalid', problems }, 'Configuration is incomplete');
    return 1;
  }

  const validation = validateSearchInput({
    role: values.role ?? config.search.role,
    location: values.location ?? config.search.location,
    num_results: parseNumResults(values['num-results'], config.search.numResults),
  });

  if (!validation.valid) {
    process.stderr.write(`${renderFailure('invalid-input', { detail: validation.error })}\n`);
    return 1;
  }

  const generator = createAnthropicGenerator({
    apiKey,
    model: config.model.name,
    maxTokens: config.model.maxTokens,
  });

  const result = await runCareerPipeline(validation.request, {
    search: (input) => searchJobs(input, { config: config.adzuna, logger }),
    generator,
    sink: createFileSink({ outputDir: config.outputDir, logger }),
    logger,
  });

  process.stdout.write(`${result.report}\n`);
  logger.info({ event: 'run_completed', runId: result.runId, outputDir: config.outputDir }, 'Advisory run completed');
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[advisor] Fatal error:', err);
    process.exitCode = 1;
  });
