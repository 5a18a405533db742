const IN_PROGRESS_SUFFIX = ".part";
const CHECKPOINT_SUFFIX = ".progress.json";

export function inProgressPath(outputPath: string): string {
  return `${outputPath}${IN_PROGRESS_SUFFIX}`;
}

export function checkpointPath(artifactPath: string): string {
  return `${artifactPath}${CHECKPOINT_SUFFIX}`;
}

export function defaultOutputPath(compressed: boolean): string {
  return compressed ? "output.json.gz" : "output.json";
}
