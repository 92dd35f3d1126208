import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { inspect } from 'node:util';
import type { LogSink } from '@riffline/shared';

function describeDetail(detail: unknown): string {
  if (detail instanceof Error) {
    return detail.stack ?? `${detail.name}: ${detail.message}`;
  }
  return typeof detail === 'string' ? detail : inspect(detail, { depth: 3, breakLength: Infinity });
}

/**
 * Log sink that appends to a file, for while Ink owns the terminal
 */
export function createFileLogSink(path: string, now: () => Date = () => new Date()): LogSink {
  mkdirSync(dirname(path), { recursive: true });
  return (level, line, details) => {
    const text = [line, ...details.map(describeDetail)].join(' ');
    appendFileSync(path, `${now().toISOString()} ${level.toUpperCase()} ${text}\n`);
  };
}
