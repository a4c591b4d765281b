import { z } from 'zod';
import type { Queryable } from '../db.js';
import type { QueryLimits } from '../config.js';
import { paginationShape, parseParams } from './params.js';

export type RankedSection = {
  section_id: number;
  program_description_id: number;
  program_stream_id: number;
  program_name: string | null;
  school_name: string;
  discipline_name: string;
  section_name: string;
  rank: number;
  snippet: string;
};

export type SearchParams = {
  query?: string;
  limit?: number | string;
  offset?: number | string;
};

/**
 * Full-text search over section text using the `english` configuration
 * (stemming, stop words). Ranked by term frequency, ties by section id.
 */
export class SearchService {
  private readonly schema;

  constructor(
    private readonly db: Queryable,
    limits: QueryLimits
  ) {
    this.schema = z.object({
      query: z
        .string({ required_error: 'query is required' })
        .transform((value) => value.trim())
        .pipe(z.string().min(1, 'query must not be blank')),
      ...paginationShape(limits),
    });
  }

  async search(input: SearchParams): Promise<RankedSection[]> {
    const { query, limit, offset } = parseParams(this.schema, input);
    const { rows } = await this.db.query<RankedSection>(
      `select
         sec.id as section_id,
         sec.program_description_id,
         ps.program_stream_id,
         ps.program_name,
         sc.name as school_name,
         d.name as discipline_name,
         sec.section_name,
         ts_rank(to_tsvector('english', coalesce(sec.section_text, '')), q) as rank,
         ts_headline('english', coalesce(sec.section_text, ''), q) as snippet
       from program_description_sections sec
       join program_descriptions pd on pd.program_description_id = sec.program_description_id
       join program_streams ps on ps.program_stream_id = pd.program_stream_id
       join schools sc on sc.school_id = ps.school_id
       join disciplines d on d.discipline_id = ps.discipline_id
       cross join websearch_to_tsquery('english', $1) as q
       where to_tsvector('english', coalesce(sec.section_text, '')) @@ q
       order by rank desc, sec.id asc
       limit $2 offset $3`,
      [query, limit, offset]
    );
    return rows;
  }
}
