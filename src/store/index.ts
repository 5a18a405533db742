import { AppConfig } from "../config";
import { RunStore } from "./types";
import { SqliteRunStore } from "./sqliteStore";

export function createStore(config: AppConfig): RunStore {
  return new SqliteRunStore(config.storePath);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";
