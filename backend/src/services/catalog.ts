import { z } from 'zod';
import type { Queryable } from '../db.js';
import type { QueryLimits } from '../config.js';
import { notFound } from '../errors.js';
import { compareSectionNames } from '../etl/sections.js';
import { escapeLike } from '../utils/text.js';
import { optionalId, optionalText, paginationShape, parseId, parseParams } from './params.js';

export type Discipline = {
  discipline_id: number;
  name: string;
};

export type ProgramStream = {
  program_stream_id: number;
  program_name: string | null;
  stream_name: string | null;
  stream_label: string | null;
  site: string | null;
  program_url: string;
  match_iteration_id: number;
  discipline_id: number;
  discipline_name: string;
  school_id: number;
  school_name: string;
};

export type ProgramDescription = {
  program_description_id: number;
  source_url: string;
  document_id: string | null;
  match_iteration_id: number | null;
  match_iteration_name: string | null;
  program_name: string | null;
  section_count: number;
};

export type ProgramSection = {
  id: number;
  section_name: string;
  section_text: string | null;
};

export type ProgramDetail = {
  program: ProgramStream;
  description: ProgramDescription;
  sections: ProgramSection[];
};

export type ListProgramsParams = {
  discipline_id?: number | string;
  school_id?: number | string;
  q?: string;
  limit?: number | string;
  offset?: number | string;
};

const PROGRAM_COLUMNS = `
  ps.program_stream_id, ps.program_name, ps.stream_name, ps.stream_label, ps.site,
  ps.program_url, ps.match_iteration_id,
  ps.discipline_id, d.name as discipline_name,
  ps.school_id, s.name as school_name
`;

const PROGRAM_FROM = `
  from program_streams ps
  join disciplines d on d.discipline_id = ps.discipline_id
  join schools s on s.school_id = ps.school_id
`;

export class CatalogService {
  private readonly listProgramsSchema;

  constructor(
    private readonly db: Queryable,
    limits: QueryLimits
  ) {
    this.listProgramsSchema = z.object({
      discipline_id: optionalId,
      school_id: optionalId,
      q: optionalText,
      ...paginationShape(limits),
    });
  }

  async listDisciplines(): Promise<Discipline[]> {
    const { rows } = await this.db.query<Discipline>(
      'select discipline_id, name from disciplines order by discipline_id asc'
    );
    return rows;
  }

  async listPrograms(input: ListProgramsParams = {}): Promise<ProgramStream[]> {
    const { discipline_id, school_id, q, limit, offset } = parseParams(this.listProgramsSchema, input);
    const params: unknown[] = [];
    const where: string[] = [];

    if (discipline_id !== undefined) {
      params.push(discipline_id);
      where.push(`ps.discipline_id = $${params.length}`);
    }
    if (school_id !== undefined) {
      params.push(school_id);
      where.push(`ps.school_id = $${params.length}`);
    }
    if (q) {
      params.push(`%${escapeLike(q)}%`);
      const likeParam = `$${params.length}`;
      where.push(
        `(ps.program_name ilike ${likeParam} or ps.stream_name ilike ${likeParam} or s.name ilike ${likeParam} or ps.site ilike ${likeParam})`
      );
    }

    params.push(limit, offset);
    const whereClause = where.length ? `where ${where.join(' and ')}` : '';

    const { rows } = await this.db.query<ProgramStream>(
      `select ${PROGRAM_COLUMNS}
       ${PROGRAM_FROM}
       ${whereClause}
       order by ps.program_name asc nulls last, ps.program_stream_id asc
       limit $${params.length - 1} offset $${params.length}`,
      params
    );
    return rows;
  }

  async getProgram(programStreamId: number | string): Promise<ProgramDetail> {
    const id = parseId('program_stream_id', programStreamId);

    const programResult = await this.db.query<ProgramStream>(
      `select ${PROGRAM_COLUMNS}
       ${PROGRAM_FROM}
       where ps.program_stream_id = $1`,
      [id]
    );
    const program = programResult.rows[0];
    if (!program) {
      throw notFound(`program stream ${id} not found`);
    }

    const descriptionResult = await this.db.query<ProgramDescription>(
      `select program_description_id, source_url, document_id, match_iteration_id,
              match_iteration_name, program_name, section_count
       from program_descriptions
       where program_stream_id = $1`,
      [id]
    );
    const description = descriptionResult.rows[0];
    if (!description) {
      throw notFound(`program stream ${id} has no description`);
    }

    const sectionResult = await this.db.query<ProgramSection>(
      `select id, section_name, section_text
       from program_description_sections
       where program_description_id = $1`,
      [description.program_description_id]
    );
    const sections = [...sectionResult.rows].sort(
      (a, b) => compareSectionNames(a.section_name, b.section_name) || a.id - b.id
    );

    return { program, description, sections };
  }
}
