export type ScalarValue = string | number | boolean | null;
export type FieldValue = ScalarValue | ScalarValue[];

/** A record with nested object keys joined into dotted paths and arrays reduced to their scalar values. */
export type FlatRecord = Record<string, FieldValue>;

interface JsonToken {
  name: string;
  value?: unknown;
}

type Frame =
  | { kind: "root" }
  | { kind: "object"; prefix: string; key: string | undefined; skip: boolean; isRecord: boolean }
  | { kind: "array"; field: string | undefined; values: ScalarValue[] | undefined };

function isJsonToken(value: unknown): value is JsonToken {
  return typeof value === "object" && value !== null && "name" in value && typeof value.name === "string";
}

function toScalar(token: JsonToken): ScalarValue | undefined {
  switch (token.name) {
    case "stringValue":
      return typeof token.value === "string" ? token.value : String(token.value);
    case "numberValue":
      return Number(token.value);
    case "trueValue":
      return true;
    case "falseValue":
      return false;
    case "nullValue":
      return null;
    default:
      return undefined;
  }
}

/**
 * Folds a stream of packed stream-json tokens for a top-level array into one record per element.
 * Only the record under construction is held in memory.
 */
export class RecordAssembler {
  private readonly stack: Frame[] = [];
  private readonly onRecord: (record: FlatRecord) => void;
  private record: FlatRecord | undefined;
  private started = false;
  private finished = false;

  constructor(onRecord: (record: FlatRecord) => void) {
    this.onRecord = onRecord;
  }

  push(value: unknown): void {
    if (!isJsonToken(value)) {
      throw new Error("Unexpected token from JSON parser");
    }

    switch (value.name) {
      case "startArray":
        this.startArray();
        return;
      case "endArray":
        this.endArray();
        return;
      case "startObject":
        this.startObject();
        return;
      case "endObject":
        this.endObject();
        return;
      case "keyValue": {
        const top = this.top();
        if (top?.kind === "object") {
          top.key = String(value.value);
        }
        return;
      }
      default: {
        const scalar = toScalar(value);
        if (scalar !== undefined) {
          this.scalar(scalar);
        }
      }
    }
  }

  end(): void {
    if (!this.started) {
      throw new Error("Input does not contain a JSON array");
    }
    if (!this.finished) {
      throw new Error("JSON array is not terminated");
    }
  }

  private top(): Frame | undefined {
    return this.stack[this.stack.length - 1];
  }

  private startArray(): void {
    const top = this.top();
    if (!top) {
      if (this.started) {
        throw new Error("Input contains more than one top-level value");
      }
      this.started = true;
      this.stack.push({ kind: "root" });
      return;
    }

    switch (top.kind) {
      case "root":
        this.stack.push({ kind: "array", field: undefined, values: undefined });
        return;
      case "object":
        if (top.skip || top.key === undefined) {
          this.stack.push({ kind: "array", field: undefined, values: undefined });
          return;
        }
        this.stack.push({ kind: "array", field: `${top.prefix}${top.key}`, values: [] });
        return;
      case "array":
        // nested arrays contribute their scalars to the enclosing field
        this.stack.push({ kind: "array", field: undefined, values: top.values });
        return;
    }
  }

  private endArray(): void {
    const frame = this.stack.pop();
    if (!frame || frame.kind === "object") {
      throw new Error("Unbalanced JSON array");
    }
    if (frame.kind === "root") {
      this.finished = true;
      return;
    }

    const parent = this.top();
    if (parent?.kind !== "object") {
      return;
    }
    if (frame.field !== undefined && frame.values && !parent.skip && this.record) {
      this.record[frame.field] = frame.values;
    }
    parent.key = undefined;
  }

  private startObject(): void {
    const top = this.top();
    if (!top) {
      throw new Error("Expected a JSON array of records, found an object");
    }

    switch (top.kind) {
      case "root":
        this.record = {};
        this.stack.push({ kind: "object", prefix: "", key: undefined, skip: false, isRecord: true });
        return;
      case "object":
        if (top.skip || top.key === undefined) {
          this.stack.push({ kind: "object", prefix: "", key: undefined, skip: true, isRecord: false });
          return;
        }
        this.stack.push({ kind: "object", prefix: `${top.prefix}${top.key}.`, key: undefined, skip: false, isRecord: false });
        return;
      case "array":
        this.stack.push({ kind: "object", prefix: "", key: undefined, skip: true, isRecord: false });
        return;
    }
  }

  private endObject(): void {
    const frame = this.stack.pop();
    if (!frame || frame.kind !== "object") {
      throw new Error("Unbalanced JSON object");
    }
    if (frame.isRecord) {
      const record = this.record;
      this.record = undefined;
      if (record) {
        this.onRecord(record);
      }
      return;
    }

    const parent = this.top();
    if (parent?.kind === "object") {
      parent.key = undefined;
    }
  }

  private scalar(value: ScalarValue): void {
    const top = this.top();
    if (!top || top.kind === "root") {
      return;
    }
    if (top.kind === "array") {
      top.values?.push(value);
      return;
    }
    if (!top.skip && top.key !== undefined && this.record) {
      this.record[`${top.prefix}${top.key}`] = value;
    }
    top.key = undefined;
  }
}
