export type RunCommand = "harvest" | "track";

export type RunStatus = "running" | "completed" | "failed" | "interrupted";

export interface RunStart {
  runId: string;
  command: RunCommand;
  target: string;
  startedAt: string;
}

export interface RunOutcome {
  status: Exclude<RunStatus, "running">;
  finishedAt: string;
  records?: number;
  pages?: number;
  bytes?: number;
  error?: string;
}

export interface RunRecord extends RunStart {
  status: RunStatus;
  finishedAt?: string;
  records?: number;
  pages?: number;
  bytes?: number;
  error?: string;
}

export interface RunStore {
  startRun(run: RunStart): Promise<void>;
  finishRun(runId: string, outcome: RunOutcome): Promise<void>;
  listRuns(limit: number): Promise<RunRecord[]>;
  close(): Promise<void>;
}
