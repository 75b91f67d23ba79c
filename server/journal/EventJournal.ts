import * as fs from 'fs';
import * as path from 'path';

import type { MarginEvent, MarginEventSink } from '../margin/types';
import { jsonReplacer } from '../utils/logger';

export interface EventJournalConfig {
  dir: string;
  filePrefix?: string;
}

function dayKey(timestampMs: number): string {
  return new Date(timestampMs).toISOString().slice(0, 10);
}

/**
 * Appends committed records as JSON lines, one file per UTC day. Callers
 * await `publish` inside the ledger lock so file order matches commit order.
 */
export class EventJournal implements MarginEventSink {
  private readonly prefix: string;
  private written = 0;

  constructor(private readonly config: EventJournalConfig) {
    fs.mkdirSync(config.dir, { recursive: true });
    this.prefix = config.filePrefix || 'margin-events';
  }

  fileFor(timestampMs: number): string {
    return path.join(this.config.dir, `${this.prefix}-${dayKey(timestampMs)}.jsonl`);
  }

  async publish(events: MarginEvent[]): Promise<void> {
    const batches = new Map<string, string[]>();
    for (const event of events) {
      const file = this.fileFor(event.timestampMs);
      const lines = batches.get(file) ?? [];
      lines.push(JSON.stringify(event, jsonReplacer));
      batches.set(file, lines);
    }

    for (const [file, lines] of batches) {
      await fs.promises.appendFile(file, `${lines.join('\n')}\n`, 'utf8');
      this.written += lines.length;
    }
  }

  getWrittenCount(): number {
    return this.written;
  }
}
