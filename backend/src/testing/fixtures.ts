import type { RawRecord, RawSources } from '../etl/types.js';

export const URL_LAKESIDE = 'https://programs.example.test/1503/27447';
export const URL_HARBOUR = 'https://programs.example.test/1503/27450';
export const URL_RURAL = 'https://programs.example.test/1503/27452';
export const URL_PEDIATRICS = 'https://programs.example.test/1503/27460';
export const URL_UNKNOWN = 'https://programs.example.test/1503/99999';

export function disciplineRow(id: string, name: string): RawRecord {
  return { discipline_id: id, discipline: name };
}

export function masterRow(overrides: RawRecord = {}): RawRecord {
  return {
    discipline_id: '1',
    discipline_name: 'Family Medicine',
    school_id: '10',
    school_name: 'Northfield University',
    program_stream_id: '27447',
    program_stream_name: 'Family Medicine - Lakeside',
    program_site: 'Lakeside',
    program_stream: 'CMG Stream',
    program_name: 'Family Medicine - Lakeside',
    program_url: URL_LAKESIDE,
    ...overrides,
  };
}

export function sectionRow(overrides: RawRecord = {}): RawRecord {
  return {
    document_id: '1503-27447',
    source: URL_LAKESIDE,
    n_program_description_sections: null,
    program_name: 'Family Medicine - Lakeside',
    match_iteration_name: 'R-1 Main Residency Match',
    match_iteration_id: '1503',
    program_description_id: '9001',
    ...overrides,
  };
}

/**
 * Four program streams over three disciplines and two schools. Three have a
 * description; one extra description row points at an unknown program.
 */
export function sampleSources(): RawSources {
  return {
    discipline: [
      disciplineRow('1', 'Family Medicine'),
      disciplineRow('2', 'Internal Medicine'),
      disciplineRow('3', 'Pediatrics'),
    ],
    programMaster: [
      masterRow(),
      masterRow({
        discipline_id: '2',
        discipline_name: 'Internal Medicine',
        school_id: '11',
        school_name: 'Southbay College of Medicine',
        program_stream_id: '27450',
        program_stream_name: 'Internal Medicine - Harbour',
        program_site: 'Harbour',
        program_name: 'Internal Medicine - Harbour',
        program_url: URL_HARBOUR,
      }),
      masterRow({
        school_id: '11',
        school_name: 'Southbay College of Medicine',
        program_stream_id: '27452',
        program_stream_name: 'Family Medicine - Harbour Rural',
        program_site: 'Rural Harbour',
        program_name: 'Family Medicine - Harbour Rural',
        program_url: URL_RURAL,
      }),
      masterRow({
        discipline_id: '3',
        discipline_name: 'Pediatrics',
        program_stream_id: '27460',
        program_stream_name: 'Pediatrics - Northfield',
        program_site: 'Northfield',
        program_name: 'Pediatrics - Northfield',
        program_url: URL_PEDIATRICS,
      }),
    ],
    xSection: [
      sectionRow({
        n_program_description_sections: '3',
        interviews: 'Interviews are held virtually. Each interview lasts 20 minutes.',
        selection_criteria: 'We value community engagement.',
        program_highlights: 'Strong rural exposure and mentorship.',
        faq: '   ',
      }),
      sectionRow({
        document_id: '1503-27450',
        source: URL_HARBOUR,
        program_name: 'Internal Medicine - Harbour',
        program_description_id: '9002',
        interviews: 'One interview day with faculty.',
        program_curriculum: 'Rotations through general internal medicine.',
      }),
      sectionRow({
        document_id: '1503-27452',
        source: URL_RURAL,
        program_name: 'Family Medicine - Harbour Rural',
        program_description_id: '9003',
        program_highlights: 'Rural practice focus.',
      }),
      sectionRow({
        document_id: '1503-99999',
        source: URL_UNKNOWN,
        program_name: 'Retired Program',
        program_description_id: '9999',
        interviews: 'No longer offered.',
      }),
    ],
  };
}
