import {
  ConflictingReferenceError,
  InvalidRecordError,
  MissingForeignKeyError,
  UnjoinedSectionError,
  type RecoverableError,
} from '../errors.js';
import { cleanText, parseInteger } from '../utils/text.js';
import { normalizeUrl, StreamIdentityResolver, type IdentityCandidate } from './identity.js';
import { compareSectionNames, isSectionName, SECTION_NAMES } from './sections.js';
import type {
  DisciplineRecord,
  NormalizedBatch,
  ProgramDescriptionRecord,
  ProgramDescriptionSectionRecord,
  ProgramStreamRecord,
  RawRecord,
  RawSources,
  SchoolRecord,
} from './types.js';

export type NormalizeOptions = {
  matchIterationId: number;
  /** Seeded with the identities already persisted; a fresh resolver starts from id 1. */
  resolver?: StreamIdentityResolver;
};

export type NormalizeResult = {
  batch: NormalizedBatch;
  errors: RecoverableError[];
  warnings: string[];
};

const X_SECTION_META_COLUMNS = new Set([
  'document_id',
  'source',
  'n_program_description_sections',
  'program_name',
  'match_iteration_name',
  'match_iteration_id',
  'program_description_id',
]);

type MasterRow = {
  row: number;
  programUrl: string;
  programStreamId: number | null;
  disciplineId: number | null;
  disciplineName: string | null;
  schoolId: number | null;
  schoolName: string | null;
  streamName: string | null;
  site: string | null;
  streamLabel: string | null;
  programName: string | null;
};

function integerCell(record: RawRecord, column: string, source: string, row: number): number | null {
  const parsed = parseInteger(record[column]);
  if (!parsed.ok) {
    throw new InvalidRecordError(source, row, column, record[column] ?? null);
  }
  return parsed.value;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Collects id → name pairs, failing when one id carries two different names.
 */
class ReferenceLookup {
  private readonly names = new Map<number, string>();

  constructor(private readonly entity: string) {}

  add(id: number | null, name: string | null): void {
    if (id == null || name == null) return;
    const existing = this.names.get(id);
    if (existing !== undefined && existing !== name) {
      throw new ConflictingReferenceError(this.entity, id, [existing, name].sort(compareText));
    }
    this.names.set(id, name);
  }

  has(id: number): boolean {
    return this.names.has(id);
  }

  records(): Array<{ id: number; name: string }> {
    return [...this.names.entries()].sort(([a], [b]) => a - b).map(([id, name]) => ({ id, name }));
  }
}

function readMasterRows(records: RawRecord[]): MasterRow[] {
  return records.map((record, index) => {
    const row = index + 1;
    const programUrl = normalizeUrl(cleanText(record.program_url));
    if (programUrl == null) {
      throw new InvalidRecordError('program_master', row, 'program_url', record.program_url ?? null, 'a non-blank URL');
    }
    return {
      row,
      programUrl,
      programStreamId: integerCell(record, 'program_stream_id', 'program_master', row),
      disciplineId: integerCell(record, 'discipline_id', 'program_master', row),
      disciplineName: cleanText(record.discipline_name),
      schoolId: integerCell(record, 'school_id', 'program_master', row),
      schoolName: cleanText(record.school_name),
      streamName: cleanText(record.program_stream_name),
      site: cleanText(record.program_site),
      streamLabel: cleanText(record.program_stream),
      programName: cleanText(record.program_name),
    };
  });
}

function fingerprint(row: MasterRow): string {
  return JSON.stringify([
    row.programStreamId,
    row.disciplineId,
    row.schoolId,
    row.streamName,
    row.site,
    row.streamLabel,
    row.programName,
  ]);
}

function buildLookups(sources: RawSources, masterRows: MasterRow[]): { disciplines: ReferenceLookup; schools: ReferenceLookup } {
  const disciplines = new ReferenceLookup('discipline');
  sources.discipline.forEach((record, index) => {
    disciplines.add(integerCell(record, 'discipline_id', 'discipline', index + 1), cleanText(record.discipline));
  });

  const schools = new ReferenceLookup('school');
  for (const row of masterRows) {
    disciplines.add(row.disciplineId, row.disciplineName);
    schools.add(row.schoolId, row.schoolName);
  }
  return { disciplines, schools };
}

function buildProgramStreams(
  masterRows: MasterRow[],
  lookups: { disciplines: ReferenceLookup; schools: ReferenceLookup },
  resolver: StreamIdentityResolver,
  matchIterationId: number
): { programStreams: ProgramStreamRecord[]; rejected: RecoverableError[] } {
  for (const row of masterRows) {
    if (row.disciplineId == null || !lookups.disciplines.has(row.disciplineId)) {
      throw new MissingForeignKeyError(row.programUrl, 'discipline_id', row.disciplineId);
    }
    if (row.schoolId == null || !lookups.schools.has(row.schoolId)) {
      throw new MissingForeignKeyError(row.programUrl, 'school_id', row.schoolId);
    }
  }

  const candidates: IdentityCandidate[] = masterRows.map((row) => ({
    url: row.programUrl,
    preferredId: row.programStreamId,
    fingerprint: fingerprint(row),
  }));
  const { ids, rejected } = resolver.resolveBatch(candidates);

  const byUrl = new Map<string, ProgramStreamRecord>();
  for (const row of masterRows) {
    const id = ids.get(row.programUrl);
    if (id === undefined || byUrl.has(row.programUrl)) continue;
    if (row.disciplineId == null || row.schoolId == null) continue;
    byUrl.set(row.programUrl, {
      program_stream_id: id,
      discipline_id: row.disciplineId,
      school_id: row.schoolId,
      stream_name: row.streamName,
      site: row.site,
      stream_label: row.streamLabel,
      program_name: row.programName,
      program_url: row.programUrl,
      match_iteration_id: matchIterationId,
    });
  }

  const programStreams = [...byUrl.values()].sort((a, b) => compareText(a.program_url, b.program_url));
  return { programStreams, rejected };
}

/** Wide → narrow: one section row per known, non-blank section column. */
export function pivotSections(programDescriptionId: number, record: RawRecord): ProgramDescriptionSectionRecord[] {
  const sections: ProgramDescriptionSectionRecord[] = [];
  for (const sectionName of SECTION_NAMES) {
    const text = cleanText(record[sectionName]);
    if (text == null) continue;
    sections.push({ program_description_id: programDescriptionId, section_name: sectionName, section_text: text });
  }
  return sections;
}

function buildDescriptions(
  records: RawRecord[],
  streamIds: ReadonlyMap<string, number>
): {
  programDescriptions: ProgramDescriptionRecord[];
  sections: ProgramDescriptionSectionRecord[];
  unjoined: UnjoinedSectionError[];
} {
  const bySource = new Map<string, { description: ProgramDescriptionRecord; sections: ProgramDescriptionSectionRecord[]; key: string }>();
  const sourceById = new Map<number, string>();
  const unjoined: UnjoinedSectionError[] = [];

  records.forEach((record, index) => {
    const row = index + 1;
    const sourceUrl = normalizeUrl(cleanText(record.source));
    const programStreamId = sourceUrl == null ? undefined : streamIds.get(sourceUrl);
    if (sourceUrl == null || programStreamId === undefined) {
      // Excluded rows are only reported; a malformed id on them is not fatal.
      const parsedId = parseInteger(record.program_description_id);
      unjoined.push(new UnjoinedSectionError(sourceUrl, parsedId.ok ? parsedId.value : null, row));
      return;
    }
    const programDescriptionId = integerCell(record, 'program_description_id', 'x_section', row);
    if (programDescriptionId == null) {
      throw new InvalidRecordError('x_section', row, 'program_description_id', null);
    }

    const sections = pivotSections(programDescriptionId, record);
    const description: ProgramDescriptionRecord = {
      program_description_id: programDescriptionId,
      program_stream_id: programStreamId,
      source_url: sourceUrl,
      document_id: cleanText(record.document_id),
      match_iteration_id: integerCell(record, 'match_iteration_id', 'x_section', row),
      match_iteration_name: cleanText(record.match_iteration_name),
      program_name: cleanText(record.program_name),
      section_count: integerCell(record, 'n_program_description_sections', 'x_section', row) ?? sections.length,
    };
    const key = JSON.stringify([description, sections]);

    const previous = bySource.get(sourceUrl);
    if (previous) {
      if (previous.key === key) return;
      throw new ConflictingReferenceError(
        'program description source',
        sourceUrl,
        [previous.description.program_description_id, programDescriptionId].sort((a, b) => a - b)
      );
    }
    const otherSource = sourceById.get(programDescriptionId);
    if (otherSource !== undefined) {
      throw new ConflictingReferenceError(
        'program_description_id',
        programDescriptionId,
        [otherSource, sourceUrl].sort(compareText)
      );
    }

    bySource.set(sourceUrl, { description, sections, key });
    sourceById.set(programDescriptionId, sourceUrl);
  });

  const entries = [...bySource.values()].sort((a, b) => compareText(a.description.source_url, b.description.source_url));
  const sections = entries
    .flatMap((entry) => entry.sections)
    .sort(
      (a, b) =>
        a.program_description_id - b.program_description_id || compareSectionNames(a.section_name, b.section_name)
    );
  return { programDescriptions: entries.map((entry) => entry.description), sections, unjoined };
}

function unknownColumnWarnings(records: RawRecord[]): string[] {
  const unknown = new Set<string>();
  for (const record of records) {
    for (const column of Object.keys(record)) {
      if (!X_SECTION_META_COLUMNS.has(column) && !isSectionName(column)) {
        unknown.add(column);
      }
    }
  }
  return [...unknown].sort(compareText).map((column) => `x_section column ${column} is not a known section; ignored`);
}

/**
 * Turns the three raw extracts into the five normalized record streams.
 * Fatal data-quality problems throw; rows that cannot be joined are reported
 * in `errors` and left out.
 */
export function normalize(sources: RawSources, options: NormalizeOptions): NormalizeResult {
  const resolver = options.resolver ?? new StreamIdentityResolver();
  const masterRows = readMasterRows(sources.programMaster);
  const lookups = buildLookups(sources, masterRows);

  const { programStreams, rejected } = buildProgramStreams(masterRows, lookups, resolver, options.matchIterationId);
  const streamIds = new Map(programStreams.map((stream) => [stream.program_url, stream.program_stream_id]));
  const { programDescriptions, sections, unjoined } = buildDescriptions(sources.xSection, streamIds);

  const disciplines: DisciplineRecord[] = lookups.disciplines
    .records()
    .map(({ id, name }) => ({ discipline_id: id, name }));
  const schools: SchoolRecord[] = lookups.schools.records().map(({ id, name }) => ({ school_id: id, name }));

  return {
    batch: { disciplines, schools, programStreams, programDescriptions, sections },
    errors: [...rejected, ...unjoined],
    warnings: unknownColumnWarnings(sources.xSection),
  };
}
