import { promises as fs } from 'fs';
import { IOError } from '../errors/io-error';

/**
 * Split a newline-delimited JSON stream into event records. Blank and
 * unparseable lines are skipped; the reducer decides what the rest mean.
 */
export function parseTimelineEventLog(text: string): unknown[] {
  const events: unknown[] = [];

  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }

    try {
      const parsed: unknown = JSON.parse(trimmed);
      events.push(parsed);
    } catch {
      // Producers write best-effort lines; a torn line is just skipped.
    }
  }

  return events;
}

export async function loadTimelineEventLog(filePath: string): Promise<unknown[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw IOError.fromReadFailure(`Unable to read event log: ${filePath}`, error, {
      module: 'timeline/event-log',
      data: { filePath },
    });
  }
  return parseTimelineEventLog(raw);
}
