import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';

const FRAME = '='.repeat(80);

/**
 * Where stage outputs go. The pipeline calls `record` once per stage.
 */
export interface ReportSink {
  record(name: string, content: string): Promise<void>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYYMMDD_HHMMSS`.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function renderRecord(name: string, timestamp: string, content: string): string {
  return `Task: ${name}\nTimestamp: ${timestamp}\n${FRAME}\n\n${content}\n\n${FRAME}\n`;
}

export interface FileSinkOptions {
  outputDir: string;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Writes each record to `<outputDir>/<name>_<timestamp>.txt`.
 */
export function createFileSink({ outputDir, now = () => new Date(), logger }: FileSinkOptions): ReportSink {
  return {
    async record(name, content) {
      const timestamp = formatTimestamp(now());
      const filePath = join(outputDir, `${name}_${timestamp}.txt`);

      await mkdir(outputDir, { recursive: true });
      await writeFile(filePath, renderRecord(name, timestamp, content), 'utf-8');

      logger?.info({ event: 'report_saved', name, filePath }, `Saved ${name} output`);
    },
  };
}
