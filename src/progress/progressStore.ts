import fs from "node:fs";
import { checkpointPath } from "../artifact";
import { errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { HarvestProgress, harvestProgressSchema } from "./types";

/**
 * Checkpoints live beside the in-progress artifact (`<artifact>.progress.json`) and are removed
 * together with it when the harvest is finalized.
 */
export class ProgressStore {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  load(artifactPath: string): HarvestProgress | undefined {
    const filePath = checkpointPath(artifactPath);
    if (!fs.existsSync(filePath)) {
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (error) {
      this.logger.warn("checkpoint_unreadable", { path: filePath, error: errorMessage(error) });
      return undefined;
    }

    const parsed = harvestProgressSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn("checkpoint_invalid", { path: filePath, error: parsed.error.issues[0]?.message });
      return undefined;
    }
    return parsed.data;
  }

  save(artifactPath: string, progress: HarvestProgress): void {
    const filePath = checkpointPath(artifactPath);
    const tempPath = `${filePath}.tmp`;
    const fd = fs.openSync(tempPath, "w");
    try {
      fs.writeSync(fd, JSON.stringify(progress));
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tempPath, filePath);
  }

  clear(artifactPath: string): void {
    fs.rmSync(checkpointPath(artifactPath), { force: true });
  }
}
