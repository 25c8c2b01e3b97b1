import { Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { createLogger, type Logger } from '@xau-signal/logger';

/**
 * JSON logger that collects each line in memory.
 */
export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      for (const line of String(chunk).split('\n')) {
        if (line.length > 0) lines.push(line);
      }
      callback();
    },
  });
  const logger = createLogger({ level: 'debug', json: true, console: false, stream });
  return { logger, lines };
}

export function parseLines(lines: readonly string[]): Array<Record<string, unknown>> {
  return lines.map((line) => {
    const parsed: unknown = JSON.parse(line);
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new Error(`Not a JSON object: ${line}`);
    }
    return Object.fromEntries(Object.entries(parsed));
  });
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}
