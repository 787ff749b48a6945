import type { Logger } from 'pino';

interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

export interface WithStageLoggerOptions<TResult> {
  logger: Logger;
  runId: string;
  stage: string;
  context?: Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: () => Promise<TResult>;
}

export async function withStageLogger<TResult>({
  logger,
  runId,
  stage,
  context,
  summary,
  run,
}: WithStageLoggerOptions<TResult>): Promise<TResult> {
  const startedAt = Date.now();
  const common = {
    runId,
    stage,
    ...context,
  };

  logger.info(
    {
      event: 'stage_started',
      ...common,
    },
    'Stage started',
  );

  try {
    const result = await run();
    logger.info(
      {
        event: 'stage_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Stage completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'stage_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Stage failed',
    );
    throw error;
  }
}
