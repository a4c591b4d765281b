import 'dotenv/config';
import path from 'node:path';
import { Command } from 'commander';
import { loadConfig } from '../src/config.js';
import { createDatabase } from '../src/db.js';
import { EtlError } from '../src/errors.js';
import { locateRawFiles, readRawSources, type RawFilePaths } from '../src/etl/raw-reader.js';
import { runEtl } from '../src/etl/pipeline.js';
import { getRunStatus } from '../src/etl/run-log.js';
import { parseId } from '../src/services/params.js';
import { ensureSchema } from '../src/schema.js';

type RunCommandOptions = {
  dir?: string;
  discipline?: string;
  master?: string;
  sections?: string;
};

async function resolvePaths(options: RunCommandOptions, rawDataDir: string): Promise<RawFilePaths> {
  const { discipline, master, sections } = options;
  if (discipline && master && sections) {
    return {
      discipline: path.resolve(discipline),
      program_master: path.resolve(master),
      x_section: path.resolve(sections),
    };
  }
  const located = await locateRawFiles(path.resolve(options.dir ?? rawDataDir));
  return {
    discipline: path.resolve(discipline ?? located.discipline),
    program_master: path.resolve(master ?? located.program_master),
    x_section: path.resolve(sections ?? located.x_section),
  };
}

const program = new Command();

program
  .name('etl')
  .description('Normalize residency program extracts and load them into the catalog database')
  .version('0.1.0');

program
  .command('run')
  .description('Read the three raw extracts and load them in one transaction')
  .option('-d, --dir <path>', 'Directory holding the extracts (defaults to RAW_DATA_DIR)')
  .option('--discipline <file>', 'Discipline extract (CSV)')
  .option('--master <file>', 'Program master extract (CSV)')
  .option('--sections <file>', 'Program description sections extract (CSV or ZIP)')
  .action(async (options: RunCommandOptions) => {
    const config = loadConfig();
    const db = createDatabase(config.database);
    try {
      const paths = await resolvePaths(options, config.rawDataDir);
      console.log(`[etl] reading ${paths.discipline}, ${paths.program_master}, ${paths.x_section}`);
      const sources = await readRawSources(paths);
      const result = await runEtl(db, sources, { matchIterationId: config.matchIterationId });
      console.log(JSON.stringify(result, null, 2));
    } catch (error) {
      if (error instanceof EtlError) {
        console.error(JSON.stringify(error, null, 2));
      }
      throw error;
    } finally {
      await db.close();
    }
  });

program
  .command('status')
  .description('Print the status and log of a pipeline run')
  .argument('<runId>', 'Run id', (value: string) => parseId('runId', value))
  .action(async (runId: number) => {
    const config = loadConfig();
    const db = createDatabase(config.database);
    try {
      await ensureSchema(db);
      const status = await getRunStatus(db, runId);
      if (!status) {
        console.error(`[etl] run ${runId} not found`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(status, null, 2));
    } finally {
      await db.close();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`[etl] ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
