import type { Queryable } from '../db.js';

export type RunLogLevel = 'info' | 'warn' | 'error';

export type RunStatusLog = {
  createdAt: string;
  level: RunLogLevel;
  message: string;
};

export type RunStatus = {
  id: number;
  status: 'running' | 'completed' | 'failed';
  startedAt: string;
  finishedAt: string | null;
  summary: unknown;
  error: string | null;
  logs: RunStatusLog[];
};

type RunRow = {
  id: number;
  status: RunStatus['status'];
  started_at: Date | string;
  finished_at: Date | string | null;
  summary: unknown;
  error_message: string | null;
};

type RunLogRow = {
  level: RunLogLevel;
  message: string;
  created_at: Date | string;
};

const CONSOLE: Record<RunLogLevel, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function toIso(value: Date | string): string {
  return new Date(value).toISOString();
}

export async function createRun(db: Queryable): Promise<number> {
  const { rows } = await db.query<{ id: number }>(`insert into etl_run default values returning id`);
  const run = rows[0];
  if (!run) {
    throw new Error('etl_run insert returned no id');
  }
  return run.id;
}

export async function appendLog(db: Queryable, runId: number, level: RunLogLevel, message: string): Promise<void> {
  CONSOLE[level](`[etl] run ${runId}: ${message}`);
  await db.query(`insert into etl_run_log (run_id, level, message) values ($1, $2, $3)`, [runId, level, message]);
}

export async function completeRun(db: Queryable, runId: number, summary: unknown): Promise<void> {
  await db.query(
    `update etl_run set status = 'completed', finished_at = now(), summary = $2::jsonb, error_message = null
     where id = $1`,
    [runId, JSON.stringify(summary)]
  );
}

export async function failRun(db: Queryable, runId: number, error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await appendLog(db, runId, 'error', message);
  await db.query(`update etl_run set status = 'failed', finished_at = now(), error_message = $2 where id = $1`, [
    runId,
    message,
  ]);
}

export async function getRunStatus(db: Queryable, runId: number): Promise<RunStatus | null> {
  const { rows } = await db.query<RunRow>(
    `select id, status, started_at, finished_at, summary, error_message from etl_run where id = $1`,
    [runId]
  );
  const record = rows[0];
  if (!record) return null;

  const logRows = await db.query<RunLogRow>(
    `select level, message, created_at from etl_run_log where run_id = $1 order by id`,
    [runId]
  );

  return {
    id: record.id,
    status: record.status,
    startedAt: toIso(record.started_at),
    finishedAt: record.finished_at == null ? null : toIso(record.finished_at),
    summary: record.summary,
    error: record.error_message,
    logs: logRows.rows.map((log) => ({
      level: log.level,
      message: log.message,
      createdAt: toIso(log.created_at),
    })),
  };
}
