import { RunOutcome, RunRecord, RunStart, RunStore } from "./types";

export class InMemoryRunStore implements RunStore {
  private readonly runs = new Map<string, RunRecord>();

  async startRun(run: RunStart): Promise<void> {
    this.runs.set(run.runId, { ...run, status: "running" });
  }

  async finishRun(runId: string, outcome: RunOutcome): Promise<void> {
    const existing = this.runs.get(runId);
    if (!existing) {
      return;
    }
    this.runs.set(runId, { ...existing, ...outcome });
  }

  async listRuns(limit: number): Promise<RunRecord[]> {
    return [...this.runs.values()]
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : a.startedAt > b.startedAt ? -1 : 0))
      .slice(0, limit);
  }

  async close(): Promise<void> {
    return;
  }
}
