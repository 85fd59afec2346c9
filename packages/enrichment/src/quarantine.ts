/**
 * @veil/enrichment - Quarantine sinks
 *
 * Records that fail validation are written here with their error detail;
 * processing continues with the next record.
 */

import { JsonlWriter, type QuarantineEntry } from '@veil/core';

export interface QuarantineSink {
  write(entry: QuarantineEntry): Promise<void>;
}

/** One JSON entry per line in a dedicated file. */
export class JsonlQuarantine implements QuarantineSink {
  private readonly writer: JsonlWriter<QuarantineEntry>;
  private written = 0;

  constructor(readonly path: string) {
    this.writer = new JsonlWriter<QuarantineEntry>(path);
  }

  async write(entry: QuarantineEntry): Promise<void> {
    await this.writer.append(entry);
    this.written++;
  }

  get count(): number {
    return this.written;
  }

  readAll(): Promise<unknown[]> {
    return this.writer.readAll();
  }
}

export class MemoryQuarantine implements QuarantineSink {
  readonly entries: QuarantineEntry[] = [];

  async write(entry: QuarantineEntry): Promise<void> {
    this.entries.push(entry);
  }

  get count(): number {
    return this.entries.length;
  }
}
