import { ConflictError } from '../errors';
import type { StringStore } from '../contracts/stringStore';
import type { StringId, StringRecord } from '../types';

/**
 * Implements `StringStore` on a process-local Map.
 * Each method completes without yielding, so every operation is atomic on the event loop.
 * Contents are lost when the process exits.
 */
export class InMemoryStringStore implements StringStore {
  private readonly records = new Map<StringId, StringRecord>();

  async put(record: StringRecord): Promise<void> {
    if (this.records.has(record.id)) {
      throw new ConflictError();
    }
    this.records.set(record.id, record);
  }

  async get(id: StringId) {
    return this.records.get(id) ?? null;
  }

  async delete(id: StringId) {
    return this.records.delete(id);
  }

  async list() {
    return Array.from(this.records.values());
  }

  async size() {
    return this.records.size;
  }
}
