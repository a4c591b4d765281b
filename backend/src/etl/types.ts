/** A raw extract row: named cells, blank cells already turned into `null`. */
export type RawRecord = Record<string, string | null>;

export type RawSources = {
  discipline: RawRecord[];
  programMaster: RawRecord[];
  xSection: RawRecord[];
};

export type DisciplineRecord = {
  discipline_id: number;
  name: string;
};

export type SchoolRecord = {
  school_id: number;
  name: string;
};

export type ProgramStreamRecord = {
  program_stream_id: number;
  discipline_id: number;
  school_id: number;
  stream_name: string | null;
  site: string | null;
  stream_label: string | null;
  program_name: string | null;
  program_url: string;
  match_iteration_id: number;
};

export type ProgramDescriptionRecord = {
  program_description_id: number;
  program_stream_id: number;
  source_url: string;
  document_id: string | null;
  match_iteration_id: number | null;
  match_iteration_name: string | null;
  program_name: string | null;
  section_count: number;
};

export type ProgramDescriptionSectionRecord = {
  program_description_id: number;
  section_name: string;
  section_text: string;
};

export type NormalizedBatch = {
  disciplines: DisciplineRecord[];
  schools: SchoolRecord[];
  programStreams: ProgramStreamRecord[];
  programDescriptions: ProgramDescriptionRecord[];
  sections: ProgramDescriptionSectionRecord[];
};

export const TABLES = [
  'disciplines',
  'schools',
  'program_streams',
  'program_descriptions',
  'program_description_sections',
] as const;

export type TableName = (typeof TABLES)[number];

export type TableCounts = Record<TableName, number>;

export type TableChanges = {
  inserted: number;
  updated: number;
  deleted: number;
};

export function batchCounts(batch: NormalizedBatch): TableCounts {
  return {
    disciplines: batch.disciplines.length,
    schools: batch.schools.length,
    program_streams: batch.programStreams.length,
    program_descriptions: batch.programDescriptions.length,
    program_description_sections: batch.sections.length,
  };
}
