/**
 * In-memory record store used by --dry-run, so a rehearsal never touches
 * the real state directory. Seeded from the real records when given.
 */

import type { ResourceRecord, StateStore } from './types.js';

export class MemoryStateStore implements StateStore {
  private readonly records = new Map<number, ResourceRecord>();

  constructor(seed: ResourceRecord[] = []) {
    for (const record of seed) {
      this.records.set(record.id, structuredClone(record));
    }
  }

  async get(id: number): Promise<ResourceRecord | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async put(record: ResourceRecord): Promise<void> {
    this.records.set(record.id, structuredClone(record));
  }

  async remove(id: number): Promise<void> {
    this.records.delete(id);
  }

  async list(): Promise<ResourceRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => a.id - b.id)
      .map((record) => structuredClone(record));
  }
}
