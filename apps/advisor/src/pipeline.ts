import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { SearchRequest } from '@jobcompass/listing-sdk';
import type { TextGenerator } from './model.js';
import { withStageLogger } from './observability/with-stage-logger.js';
import type { ReportSink } from './sink.js';
import { STAGES, type StageDefinition, type StageId } from './stages.js';

export const REPORT_RECORD_NAME = 'job_search_report';

const FRAME = '='.repeat(80);

export type SearchTool = (input: Record<string, unknown>) => Promise<string>;

export interface PipelineDeps {
  search: SearchTool;
  generator: TextGenerator;
  sink: ReportSink;
  logger: Logger;
  /** Correlates every log line of one run; generated when absent or blank. */
  runId?: string;
  stages?: readonly StageDefinition[];
}

export interface StageResult {
  id: StageId;
  title: string;
  output: string;
}

export interface PipelineResult {
  runId: string;
  listingsText: string;
  stages: StageResult[];
  report: string;
}

export function renderReport(request: SearchRequest, stages: readonly StageResult[]): string {
  const header = [
    'Job Search Report',
    `Role: ${request.role}`,
    `Location: ${request.location}`,
    `Listings requested: ${request.numResults}`,
  ].join('\n');

  const sections = stages.map((stage) => `## ${stage.title}\n\n${stage.output}`);
  return [header, ...sections].join(`\n\n${FRAME}\n\n`);
}

/**
 * Search once, then run each stage in order. Every stage output is recorded before the next
 * stage starts; a failing stage stops the run.
 */
export async function runCareerPipeline(request: SearchRequest, deps: PipelineDeps): Promise<PipelineResult> {
  const { logger, generator, sink } = deps;
  const runId = deps.runId?.trim() || randomUUID();
  const stages = deps.stages ?? STAGES;

  const listingsText = await withStageLogger({
    logger,
    runId,
    stage: 'listing_search',
    context: { role: request.role, location: request.location, numResults: request.numResults },
    summary: (text) => ({ outputLength: text.length }),
    run: () =>
      deps.search({
        role: request.role,
        location: request.location,
        num_results: request.numResults,
      }),
  });

  const results: StageResult[] = [];
  let jobSearchReport: string | undefined;

  for (const stage of stages) {
    const output = await withStageLogger({
      logger,
      runId,
      stage: stage.id,
      summary: (text) => ({ outputLength: text.length }),
      run: async () => {
        const text = await generator.generate({
          system: stage.system,
          prompt: stage.buildPrompt({ request, listingsText, jobSearchReport }),
        });
        await sink.record(stage.id, text);
        return text;
      },
    });

    if (stage.id === 'job_search') {
      jobSearchReport = output;
    }

    results.push({ id: stage.id, title: stage.title, output });
  }

  const report = renderReport(request, results);
  await sink.record(REPORT_RECORD_NAME, report);

  return { runId, listingsText, stages: results, report };
}
