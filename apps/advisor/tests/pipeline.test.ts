import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import type { GenerateRequest, TextGenerator } from '../src/model.js';
import { REPORT_RECORD_NAME, renderReport, runCareerPipeline } from '../src/pipeline.js';
import type { ReportSink } from '../src/sink.js';

const request = { role: 'Data Scientist', location: 'Los Angeles', numResults: 2 };

function createLoggerMock(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

function createMemorySink(): ReportSink & { records: Array<[string, string]> } {
  const records: Array<[string, string]> = [];
  return {
    records,
    async record(name, content) {
      records.push([name, content]);
    },
  };
}

function createScriptedGenerator(outputs: string[]): TextGenerator & { requests: GenerateRequest[] } {
  const requests: GenerateRequest[] = [];
  return {
    requests,
    async generate(req) {
      requests.push(req);
      const output = outputs[requests.length - 1];
      if (output === undefined) {
        throw new Error('no scripted output left');
      }
      return output;
    },
  };
}

describe('runCareerPipeline', () => {
  it('searches once and runs the four stages in order', async () => {
    const search = vi.fn(async () => 'LISTINGS');
    const generator = createScriptedGenerator(['MARKET', 'SKILLS', 'INTERVIEW', 'STRATEGY']);
    const sink = createMemorySink();

    const result = await runCareerPipeline(request, {
      search,
      generator,
      sink,
      logger: createLoggerMock(),
      runId: 'run-1',
    });

    expect(search).toHaveBeenCalledTimes(1);
    expect(search).toHaveBeenCalledWith({ role: 'Data Scientist', location: 'Los Angeles', num_results: 2 });
    expect(result.runId).toBe('run-1');
    expect(result.listingsText).toBe('LISTINGS');
    expect(result.stages.map((stage) => [stage.id, stage.output])).toEqual([
      ['job_search', 'MARKET'],
      ['skills_analysis', 'SKILLS'],
      ['interview_prep', 'INTERVIEW'],
      ['career_advisory', 'STRATEGY'],
    ]);
  });

  it('feeds listings to the first stage and its report to the rest', async () => {
    const generator = createScriptedGenerator(['MARKET', 'SKILLS', 'INTERVIEW', 'STRATEGY']);

    await runCareerPipeline(request, {
      search: async () => 'LISTINGS',
      generator,
      sink: createMemorySink(),
      logger: createLoggerMock(),
    });

    const [first, ...rest] = generator.requests;
    expect(first?.prompt).toContain('<job_listings>\nLISTINGS\n</job_listings>');
    expect(rest).toHaveLength(3);
    for (const req of rest) {
      expect(req.prompt).toContain('<job_search_report>\nMARKET\n</job_search_report>');
    }
  });

  it('records every stage and then the combined report', async () => {
    const sink = createMemorySink();

    const result = await runCareerPipeline(request, {
      search: async () => 'LISTINGS',
      generator: createScriptedGenerator(['MARKET', 'SKILLS', 'INTERVIEW', 'STRATEGY']),
      sink,
      logger: createLoggerMock(),
    });

    expect(sink.records.map(([name]) => name)).toEqual([
      'job_search',
      'skills_analysis',
      'interview_prep',
      'career_advisory',
      REPORT_RECORD_NAME,
    ]);
    expect(sink.records.at(-1)?.[1]).toBe(result.report);
  });

  it('tags every stage log with one generated run id when the given one is blank', async () => {
    const logger = createLoggerMock();

    const result = await runCareerPipeline(request, {
      search: async () => 'LISTINGS',
      generator: createScriptedGenerator(['MARKET', 'SKILLS', 'INTERVIEW', 'STRATEGY']),
      sink: createMemorySink(),
      logger,
      runId: '   ',
    });

    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/i);
    const calls = vi.mocked(logger.info).mock.calls;
    expect(calls).toHaveLength(10);
    for (const [payload] of calls) {
      expect(payload).toMatchObject({ runId: result.runId });
    }
  });

  it('trims a caller-provided run id', async () => {
    const result = await runCareerPipeline(request, {
      search: async () => 'LISTINGS',
      generator: createScriptedGenerator(['MARKET', 'SKILLS', 'INTERVIEW', 'STRATEGY']),
      sink: createMemorySink(),
      logger: createLoggerMock(),
      runId: ' run-3 ',
    });

    expect(result.runId).toBe('run-3');
  });

  it('stops at the first failing stage and logs it', async () => {
    const sink = createMemorySink();
    const logger = createLoggerMock();

    await expect(
      runCareerPipeline(request, {
        search: async () => 'LISTINGS',
        generator: createScriptedGenerator(['MARKET']),
        sink,
        logger,
        runId: 'run-2',
      }),
    ).rejects.toThrow('no scripted output left');

    expect(sink.records.map(([name]) => name)).toEqual(['job_search']);
    const [failurePayload] = vi.mocked(logger.error).mock.calls[0]!;
    expect(failurePayload).toMatchObject({ event: 'stage_failed', stage: 'skills_analysis', runId: 'run-2' });
  });
});

describe('renderReport', () => {
  it('puts a header above titled sections', () => {
    const frame = '='.repeat(80);

    expect(
      renderReport(request, [
        { id: 'job_search', title: 'Job Search', output: 'MARKET' },
        { id: 'skills_analysis', title: 'Skills Analysis', output: 'SKILLS' },
      ]),
    ).toBe(
      [
        'Job Search Report\nRole: Data Scientist\nLocation: Los Angeles\nListings requested: 2',
        '## Job Search\n\nMARKET',
        '## Skills Analysis\n\nSKILLS',
      ].join(`\n\n${frame}\n\n`),
    );
  });
});
