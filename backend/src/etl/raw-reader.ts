import path from 'node:path';
import os from 'node:os';
import { promises as fsp } from 'node:fs';
import extract from 'extract-zip';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { MissingColumnError } from '../errors.js';
import type { RawRecord, RawSources } from './types.js';

export type SourceName = 'discipline' | 'program_master' | 'x_section';

export type RawFilePaths = Record<SourceName, string>;

export const REQUIRED_COLUMNS: Record<SourceName, readonly string[]> = {
  discipline: ['discipline_id', 'discipline'],
  program_master: [
    'discipline_id',
    'discipline_name',
    'school_id',
    'school_name',
    'program_stream_id',
    'program_stream_name',
    'program_site',
    'program_stream',
    'program_name',
    'program_url',
  ],
  x_section: [
    'document_id',
    'source',
    'n_program_description_sections',
    'program_name',
    'match_iteration_name',
    'match_iteration_id',
    'program_description_id',
  ],
};

// Row-number column left behind by spreadsheet exports.
const INDEX_COLUMNS = new Set(['', 'Unnamed: 0']);

const FILE_PATTERNS: Record<SourceName, RegExp> = {
  discipline: /discipline.*\.csv$/i,
  program_master: /program_master.*\.csv$/i,
  x_section: /x_section.*\.(csv|zip)$/i,
};

const SPREADSHEET_FILE = /\.xlsx?$/i;

const csvRowsSchema = z.array(z.record(z.string(), z.string()));

export function parseRawCsv(content: string, source: SourceName): RawRecord[] {
  let header: string[] = [];
  const parsed: unknown = parse(content, {
    bom: true,
    columns: (names: string[]) => {
      header = names.map((name) => name.trim());
      return header.map((name) => (INDEX_COLUMNS.has(name) ? false : name));
    },
    skip_empty_lines: true,
    relax_column_count: true,
  });
  const rows = csvRowsSchema.parse(parsed);

  for (const column of REQUIRED_COLUMNS[source]) {
    if (!header.includes(column)) {
      throw new MissingColumnError(source, column);
    }
  }

  return rows.map((row) => {
    const record: RawRecord = {};
    for (const [column, value] of Object.entries(row)) {
      record[column] = value.length ? value : null;
    }
    return record;
  });
}

async function readDirectoryRecursive(root: string): Promise<string[]> {
  const entries = await fsp.readdir(root, { withFileTypes: true });
  const results: string[] = [];
  for (const entry of entries) {
    const resolved = path.join(root, entry.name);
    if (entry.isDirectory()) {
      results.push(...(await readDirectoryRecursive(resolved)));
    } else {
      results.push(resolved);
    }
  }
  return results;
}

async function readZippedCsv(file: string): Promise<string> {
  const extractDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'residency-extract-'));
  try {
    await extract(path.resolve(file), { dir: extractDir });
    const extracted = (await readDirectoryRecursive(extractDir))
      .filter((entry) => path.extname(entry).toLowerCase() === '.csv')
      .sort();
    const first = extracted[0];
    if (!first) {
      throw new Error(`No CSV found inside ${file}`);
    }
    return await fsp.readFile(first, 'utf8');
  } finally {
    await fsp.rm(extractDir, { recursive: true, force: true });
  }
}

export async function readRawFile(file: string, source: SourceName): Promise<RawRecord[]> {
  const content =
    path.extname(file).toLowerCase() === '.zip' ? await readZippedCsv(file) : await fsp.readFile(file, 'utf8');
  return parseRawCsv(content, source);
}

/**
 * Finds the three extracts under `dir` by file name. The sections extract may
 * be shipped zipped.
 */
export async function locateRawFiles(dir: string): Promise<RawFilePaths> {
  const files = (await readDirectoryRecursive(dir)).sort();
  const find = (source: SourceName): string => {
    const match = files.find((file) => FILE_PATTERNS[source].test(path.basename(file)));
    if (!match) {
      const spreadsheet = files.find(
        (file) => SPREADSHEET_FILE.test(file) && path.basename(file).toLowerCase().includes(source)
      );
      if (spreadsheet) {
        throw new Error(`${source} extract ${spreadsheet} is a spreadsheet; export it to CSV first`);
      }
      throw new Error(`No ${source} extract found in ${dir}`);
    }
    return match;
  };
  return {
    discipline: find('discipline'),
    program_master: find('program_master'),
    x_section: find('x_section'),
  };
}

export async function readRawSources(paths: RawFilePaths): Promise<RawSources> {
  const [discipline, programMaster, xSection] = await Promise.all([
    readRawFile(paths.discipline, 'discipline'),
    readRawFile(paths.program_master, 'program_master'),
    readRawFile(paths.x_section, 'x_section'),
  ]);
  return { discipline, programMaster, xSection };
}
