import type { StudentInput, StudentRecord } from "../types/recordTypes";

/**
 * CRUD access to student records keyed by numeric id.
 */
export interface RecordStore {
  insert(input: StudentInput): Promise<StudentRecord>;
  fetchAll(): Promise<StudentRecord[]>;
  /** False when no record has that id. */
  update(id: number, input: StudentInput): Promise<boolean>;
  delete(id: number): Promise<boolean>;
}

export class MemoryRecordStore implements RecordStore {
  private records = new Map<number, StudentRecord>();
  private nextId = 1;

  async insert(input: StudentInput) {
    const record = { id: this.nextId++, ...input };
    this.records.set(record.id, record);
    return { ...record };
  }

  async fetchAll() {
    return [...this.records.values()]
      .sort((a, b) => a.id - b.id)
      .map((r) => ({ ...r }));
  }

  async update(id: number, input: StudentInput) {
    if (!this.records.has(id)) return false;
    this.records.set(id, { id, ...input });
    return true;
  }

  async delete(id: number) {
    return this.records.delete(id);
  }
}
