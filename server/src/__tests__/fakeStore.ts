import type { AnnotationStore } from "../datastore";
import { StorageUnavailable } from "../errors";
import type { AnnotationRecord } from "../types";

/** In-memory store whose writes can be made to fail on demand. */
export class MemoryStore implements AnnotationStore {
  readonly records = new Map<string, AnnotationRecord>();
  failWrites = false;
  writes = 0;

  upsert(record: AnnotationRecord): void {
    if (this.failWrites) {
      throw new StorageUnavailable("disk full");
    }
    this.writes += 1;
    this.records.set(record.image_identifier, { ...record });
  }

  get(imageIdentifier: string): AnnotationRecord | undefined {
    const record = this.records.get(imageIdentifier);
    return record ? { ...record } : undefined;
  }

  listAll(): AnnotationRecord[] {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  close(): void {}
}
