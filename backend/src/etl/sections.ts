/**
 * Known section columns of the x_section extract, in display precedence.
 * Each column name is stored verbatim as `section_name`.
 */
export const SECTION_NAMES = [
  'program_highlights',
  'program_overview',
  'program_curriculum',
  'training_sites',
  'electives',
  'call_schedule',
  'research',
  'resident_wellness',
  'evaluation_process',
  'additional_information',
  'selection_criteria',
  'general_instructions',
  'supporting_documentation_information',
  'review_process',
  'interviews',
  'return_of_service',
  'program_contracts',
  'salary_and_benefits',
  'contact_information',
  'faq',
  'summary_of_changes',
] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

const SECTION_RANK: ReadonlyMap<string, number> = new Map(SECTION_NAMES.map((name, index) => [name, index]));

export function isSectionName(column: string): column is SectionName {
  return SECTION_RANK.has(column);
}

/** Unknown names sort after every known one, alphabetically among themselves. */
export function compareSectionNames(a: string, b: string): number {
  const rankA = SECTION_RANK.get(a) ?? SECTION_NAMES.length;
  const rankB = SECTION_RANK.get(b) ?? SECTION_NAMES.length;
  if (rankA !== rankB) return rankA - rankB;
  return a < b ? -1 : a > b ? 1 : 0;
}
