import fs from "node:fs";
import { Readable, Transform, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import zlib from "node:zlib";
import { parser } from "stream-json";
import { Compression } from "../config";
import { FlatRecord, RecordAssembler } from "./records";

export interface ReadJsonArrayOptions {
  compression: Compression;
  /** Text appended after decompression, used to close an in-progress artifact's array. */
  trailer?: string;
}

function appendTrailer(trailer: string): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      callback(null, chunk);
    },
    flush(callback) {
      callback(null, Buffer.from(trailer, "utf-8"));
    },
  });
}

/** Streams a JSON array of records, calling `onRecord` once per element. Resolves with the record count. */
export async function readJsonArray(
  source: Readable,
  options: ReadJsonArrayOptions,
  onRecord: (record: FlatRecord) => void,
): Promise<number> {
  let count = 0;
  const assembler = new RecordAssembler((record) => {
    count += 1;
    onRecord(record);
  });

  const sink = new Writable({
    objectMode: true,
    write(token: unknown, _encoding, callback) {
      try {
        assembler.push(token);
        callback();
      } catch (error) {
        callback(error instanceof Error ? error : new Error(String(error)));
      }
    },
  });

  const stages: Array<NodeJS.ReadableStream | NodeJS.WritableStream | NodeJS.ReadWriteStream> = [source];
  if (options.compression === "gzip") {
    stages.push(zlib.createGunzip());
  }
  if (options.trailer) {
    stages.push(appendTrailer(options.trailer));
  }
  stages.push(parser({ packValues: true, streamValues: false }), sink);

  await pipeline(stages);
  assembler.end();
  return count;
}

/** Counts the complete records in an in-progress artifact, which lacks its closing bracket. */
export async function countArtifactRecords(filePath: string, compression: Compression): Promise<number> {
  return readJsonArray(fs.createReadStream(filePath), { compression, trailer: "]" }, () => undefined);
}
