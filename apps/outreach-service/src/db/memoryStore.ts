/**
 * In-memory record store
 * Used for leads when Supabase is not configured (development/testing)
 */
export class MemoryStore<T extends { id: string }> {
  private records: Map<string, T> = new Map();

  insert(record: T): T {
    this.records.set(record.id, record);
    return record;
  }

  getById(id: string): T | null {
    return this.records.get(id) ?? null;
  }

  update(id: string, patch: Partial<T>): T | null {
    const existing = this.records.get(id);
    if (!existing) return null;

    const updated = { ...existing, ...patch, id };
    this.records.set(id, updated);
    return updated;
  }

  /**
   * All records, oldest first
   */
  list(): T[] {
    return Array.from(this.records.values());
  }

  clear(): void {
    this.records.clear();
  }

  get size(): number {
    return this.records.size;
  }
}
