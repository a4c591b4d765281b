import type { Queryable } from './db.js';

async function ensureCoreTables(db: Queryable): Promise<void> {
  await db.query(`
    create table if not exists disciplines (
      discipline_id integer primary key,
      name text not null
    )
  `);

  await db.query(`
    create table if not exists schools (
      school_id integer primary key,
      name text not null
    )
  `);

  await db.query(`
    create table if not exists program_streams (
      program_stream_id integer primary key,
      discipline_id integer not null references disciplines(discipline_id),
      school_id integer not null references schools(school_id),
      stream_name text,
      site text,
      stream_label text,
      program_name text,
      program_url text not null unique,
      match_iteration_id integer not null
    )
  `);

  await db.query(`
    create table if not exists program_descriptions (
      program_description_id integer primary key,
      program_stream_id integer not null unique references program_streams(program_stream_id),
      source_url text not null unique,
      document_id text,
      match_iteration_id integer,
      match_iteration_name text,
      program_name text,
      section_count integer not null default 0
    )
  `);

  await db.query(`
    create table if not exists program_description_sections (
      id serial primary key,
      program_description_id integer not null references program_descriptions(program_description_id) on delete cascade,
      section_name text not null,
      section_text text,
      unique (program_description_id, section_name)
    )
  `);

  await db.query(`create index if not exists idx_program_streams_discipline on program_streams(discipline_id)`);
  await db.query(`create index if not exists idx_program_streams_school on program_streams(school_id)`);
  await db.query(`create index if not exists idx_sections_name on program_description_sections(section_name)`);
  await db.query(`
    create index if not exists idx_sections_fts
    on program_description_sections
    using gin (to_tsvector('english', coalesce(section_text, '')))
  `);
}

async function ensureRunTables(db: Queryable): Promise<void> {
  await db.query(`
    create table if not exists etl_run (
      id serial primary key,
      status text not null default 'running' check (status in ('running', 'completed', 'failed')),
      started_at timestamptz not null default now(),
      finished_at timestamptz,
      summary jsonb,
      error_message text
    )
  `);

  await db.query(`
    create table if not exists etl_run_log (
      id serial primary key,
      run_id integer not null references etl_run(id) on delete cascade,
      level text not null default 'info' check (level in ('info', 'warn', 'error')),
      message text not null,
      created_at timestamptz not null default now()
    )
  `);

  await db.query(`create index if not exists idx_etl_run_log_run on etl_run_log(run_id, id)`);
}

export async function ensureSchema(db: Queryable): Promise<void> {
  await ensureCoreTables(db);
  await ensureRunTables(db);
}
