import { setTimeout as delay } from "node:timers/promises";
import { HarvestInterruptedError } from "./errors";

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = async (ms, signal) => {
  if (signal?.aborted) {
    throw new HarvestInterruptedError();
  }
  if (ms <= 0) {
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new HarvestInterruptedError();
    }
    throw error;
  }
};
