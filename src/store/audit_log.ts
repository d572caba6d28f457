import * as fs from "node:fs";
import { dirname } from "node:path";

export interface AuditSink<T> {
  append(record: T): Promise<void>;
}

/**
 * Append-only JSON-lines stream. One record per line, never rewritten.
 */
export class JsonlAuditLog<T> implements AuditSink<T> {
  private readonly path: string;
  private dirReady = false;

  constructor(path: string) {
    this.path = path;
  }

  async append(record: T): Promise<void> {
    if (!this.dirReady) {
      await fs.promises.mkdir(dirname(this.path), { recursive: true });
      this.dirReady = true;
    }
    await fs.promises.appendFile(this.path, `${JSON.stringify(record)}\n`, "utf8");
  }
}

export class MemoryAuditLog<T> implements AuditSink<T> {
  readonly records: T[] = [];

  async append(record: T): Promise<void> {
    this.records.push(record);
  }
}
