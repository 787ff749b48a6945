import pino, { type LevelWithSilent, type Logger } from 'pino';

export interface AdvisorLoggerOptions {
  level: LevelWithSilent;
  service: string;
}

export function createAdvisorLogger({ level, service }: AdvisorLoggerOptions): Logger {
  return pino({
    level,
    base: { service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'message',
  });
}
