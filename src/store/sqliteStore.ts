import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { RunCommand, RunOutcome, RunRecord, RunStart, RunStatus, RunStore } from "./types";

const IN_MEMORY = ":memory:";

type RunRow = {
  runId: string;
  command: RunCommand;
  target: string;
  startedAt: string;
  finishedAt: string | null;
  status: RunStatus;
  records: number | null;
  pages: number | null;
  bytes: number | null;
  error: string | null;
};

function fromRow(row: RunRow): RunRecord {
  return {
    runId: row.runId,
    command: row.command,
    target: row.target,
    startedAt: row.startedAt,
    status: row.status,
    finishedAt: row.finishedAt ?? undefined,
    records: row.records ?? undefined,
    pages: row.pages ?? undefined,
    bytes: row.bytes ?? undefined,
    error: row.error ?? undefined,
  };
}

export class SqliteRunStore implements RunStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(run: RunStart): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, command, target, startedAt, finishedAt, status)
        VALUES (@runId, @command, @target, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          command = excluded.command,
          target = excluded.target,
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run(run);
  }

  async finishRun(runId: string, outcome: RunOutcome): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs SET
          status = @status,
          finishedAt = @finishedAt,
          records = @records,
          pages = @pages,
          bytes = @bytes,
          error = @error
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status: outcome.status,
        finishedAt: outcome.finishedAt,
        records: outcome.records ?? null,
        pages: outcome.pages ?? null,
        bytes: outcome.bytes ?? null,
        error: outcome.error ?? null,
      });
  }

  async listRuns(limit: number): Promise<RunRecord[]> {
    const rows = this.db
      .prepare<[number], RunRow>(
        `
        SELECT runId, command, target, startedAt, finishedAt, status, records, pages, bytes, error
        FROM runs
        ORDER BY startedAt DESC, runId DESC
        LIMIT ?
      `,
      )
      .all(limit);
    return rows.map(fromRow);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        command TEXT NOT NULL,
        target TEXT NOT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL,
        records INTEGER NULL,
        pages INTEGER NULL,
        bytes INTEGER NULL,
        error TEXT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(startedAt);
    `);
  }
}
