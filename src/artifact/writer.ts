import fs from "node:fs";
import path from "node:path";
import zlib from "node:zlib";
import { Compression } from "../config";
import { JsonRecord } from "../transport";

export interface ReopenState {
  recordsWritten: number;
  artifactBytes: number;
}

/**
 * Writes `[`, comma-newline separated records and a final `]` to an artifact file.
 *
 * Every write is fsynced before it returns. With gzip each chunk becomes its own gzip member,
 * so the file stays a valid (multi-member) gzip stream after any number of appends.
 */
export class JsonArrayWriter {
  private fd: number | undefined;
  private recordCount: number;
  private byteCount: number;

  private constructor(
    readonly filePath: string,
    readonly compression: Compression,
    fd: number,
    state: ReopenState,
  ) {
    this.fd = fd;
    this.recordCount = state.recordsWritten;
    this.byteCount = state.artifactBytes;
  }

  static create(filePath: string, compression: Compression): JsonArrayWriter {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    const fd = fs.openSync(filePath, "w");
    const writer = new JsonArrayWriter(filePath, compression, fd, { recordsWritten: 0, artifactBytes: 0 });
    writer.writeChunk("[");
    return writer;
  }

  /** Reopens an in-progress artifact for appending, dropping any bytes written after `state.artifactBytes`. */
  static reopen(filePath: string, compression: Compression, state: ReopenState): JsonArrayWriter {
    const size = fs.statSync(filePath).size;
    if (size < state.artifactBytes) {
      throw new Error(`${filePath} is ${size} bytes, shorter than the ${state.artifactBytes} bytes recorded in its checkpoint`);
    }
    if (size > state.artifactBytes) {
      fs.truncateSync(filePath, state.artifactBytes);
    }
    const fd = fs.openSync(filePath, "a");
    return new JsonArrayWriter(filePath, compression, fd, state);
  }

  get recordsWritten(): number {
    return this.recordCount;
  }

  get artifactBytes(): number {
    return this.byteCount;
  }

  appendRecords(records: readonly JsonRecord[]): void {
    if (records.length === 0) {
      return;
    }
    let text = "";
    records.forEach((record, index) => {
      if (this.recordCount + index > 0) {
        text += ",\n";
      }
      text += JSON.stringify(record);
    });
    this.writeChunk(text);
    this.recordCount += records.length;
  }

  finish(): void {
    this.writeChunk("]");
    this.close();
  }

  close(): void {
    if (this.fd === undefined) {
      return;
    }
    fs.closeSync(this.fd);
    this.fd = undefined;
  }

  private writeChunk(text: string): void {
    if (this.fd === undefined) {
      throw new Error(`${this.filePath} is already closed`);
    }
    const raw = Buffer.from(text, "utf-8");
    const bytes = this.compression === "gzip" ? zlib.gzipSync(raw) : raw;
    let offset = 0;
    while (offset < bytes.length) {
      offset += fs.writeSync(this.fd, bytes, offset, bytes.length - offset);
    }
    fs.fsyncSync(this.fd);
    this.byteCount += bytes.length;
  }
}
