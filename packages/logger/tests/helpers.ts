import { Writable } from 'node:stream';

/**
 * Writable that collects each written log line.
 */
export function captureStream(): { stream: Writable; lines: string[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      for (const line of String(chunk).split('\n')) {
        if (line.length > 0) lines.push(line);
      }
      callback();
    },
  });
  return { stream, lines };
}

export function parseLine(line: string | undefined): Record<string, unknown> {
  const parsed: unknown = JSON.parse(line ?? '{}');
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Not a JSON object: ${String(line)}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}
