import type { Database } from '../db.js';
import type { RecoverableError } from '../errors.js';
import { ensureSchema } from '../schema.js';
import { StreamIdentityResolver } from './identity.js';
import { countTables, loadKnownIdentities, loadPrepared } from './loader.js';
import { normalize } from './normalizer.js';
import { appendLog, completeRun, createRun, failRun } from './run-log.js';
import type { RawSources, TableChanges, TableCounts, TableName } from './types.js';

export type RunOptions = {
  matchIterationId: number;
};

export type Reconciliation = Record<TableName, { prepared: number; stored: number }>;

export type RunResult = {
  runId: number;
  status: 'completed';
  counts: TableCounts;
  changes: Record<TableName, TableChanges>;
  errors: RecoverableError[];
  warnings: string[];
  reconciliation: Reconciliation;
};

const runQueue: Array<() => Promise<void>> = [];
let processing = false;

async function processQueue(): Promise<void> {
  if (processing) return;
  processing = true;
  while (runQueue.length) {
    const job = runQueue.shift();
    if (!job) continue;
    await job();
  }
  processing = false;
}

function enqueue<T>(task: () => Promise<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    runQueue.push(() => task().then(resolve, reject));
    void processQueue();
  });
}

function reconcile(prepared: TableCounts, stored: TableCounts): Reconciliation {
  const entry = (table: TableName) => ({ prepared: prepared[table], stored: stored[table] });
  return {
    disciplines: entry('disciplines'),
    schools: entry('schools'),
    program_streams: entry('program_streams'),
    program_descriptions: entry('program_descriptions'),
    program_description_sections: entry('program_description_sections'),
  };
}

async function executeRun(db: Database, sources: RawSources, options: RunOptions): Promise<RunResult> {
  await ensureSchema(db);
  const runId = await createRun(db);

  try {
    await appendLog(
      db,
      runId,
      'info',
      `Read discipline=${sources.discipline.length} program_master=${sources.programMaster.length} x_section=${sources.xSection.length}`
    );

    // Identities are read under the load lock, so a run committed meanwhile by
    // another process is seen before new ids are handed out.
    const {
      prepared: { batch, errors, warnings },
      summary: { counts, changes },
    } = await loadPrepared(db, async (tx) => {
      const resolver = new StreamIdentityResolver(await loadKnownIdentities(tx));
      return normalize(sources, { matchIterationId: options.matchIterationId, resolver });
    });

    for (const warning of warnings) {
      await appendLog(db, runId, 'warn', warning);
    }
    for (const error of errors) {
      await appendLog(db, runId, 'warn', error.message);
    }
    await appendLog(
      db,
      runId,
      'info',
      `Prepared disciplines=${batch.disciplines.length} schools=${batch.schools.length} ` +
        `program_streams=${batch.programStreams.length} program_descriptions=${batch.programDescriptions.length} ` +
        `sections=${batch.sections.length}`
    );
    await appendLog(db, runId, 'info', 'Load committed');

    const reconciliation = reconcile(counts, await countTables(db));
    const result: RunResult = { runId, status: 'completed', counts, changes, errors, warnings, reconciliation };
    await completeRun(db, runId, result);
    return result;
  } catch (error) {
    await failRun(db, runId, error);
    throw error;
  }
}

/**
 * Normalizes and loads one set of raw extracts. Runs started in the same
 * process execute one after another.
 */
export function runEtl(db: Database, sources: RawSources, options: RunOptions): Promise<RunResult> {
  return enqueue(() => executeRun(db, sources, options));
}
