export type HarvestErrorCode =
  | "EXHAUSTED_RETRIES"
  | "FATAL_RESPONSE"
  | "CANNOT_RESUME"
  | "ALREADY_EXISTS"
  | "INTERRUPTED"
  | "ILLEGAL_TRANSITION";

export class HarvestError extends Error {
  readonly code: HarvestErrorCode;

  constructor(code: HarvestErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ExhaustedRetriesError extends HarvestError {
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, lastFailure: string) {
    super("EXHAUSTED_RETRIES", `Failed to fetch ${url} after ${attempts} consecutive attempts: ${lastFailure}`);
    this.url = url;
    this.attempts = attempts;
  }
}

export class FatalResponseError extends HarvestError {
  readonly url: string;

  constructor(url: string, reason: string) {
    super("FATAL_RESPONSE", `Unusable response from ${url}: ${reason}`);
    this.url = url;
  }
}

export class CannotResumeError extends HarvestError {
  constructor(reason: string) {
    super("CANNOT_RESUME", `Cannot resume: ${reason}`);
  }
}

export class AlreadyExistsError extends HarvestError {
  readonly path: string;

  constructor(filePath: string) {
    super("ALREADY_EXISTS", `Output file already exists: ${filePath}`);
    this.path = filePath;
  }
}

export class HarvestInterruptedError extends HarvestError {
  readonly artifactPath?: string;

  constructor(artifactPath?: string) {
    super(
      "INTERRUPTED",
      artifactPath
        ? `Interrupted. Progress is saved in ${artifactPath}; run again with --resume to continue.`
        : "Interrupted.",
    );
    this.artifactPath = artifactPath;
  }
}

export class IllegalTransitionError extends HarvestError {
  constructor(from: string, to: string) {
    super("ILLEGAL_TRANSITION", `Illegal harvest state transition: ${from} -> ${to}`);
  }
}

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_INTERRUPTED = 130;

export function exitCodeFor(error: unknown): number {
  if (error instanceof HarvestError && error.code === "INTERRUPTED") {
    return EXIT_INTERRUPTED;
  }
  return EXIT_FAILED;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
