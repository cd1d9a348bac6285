/**
 * Metadata Pattern Rules
 *
 * Ordered rule tables for case metadata extraction. Within each table the
 * first matching rule wins, except judges where every rule contributes.
 */

import type { PatternRule } from './types.js';

const CASE_NUMBER_SUFFIX = String.raw`No[.\s]+(\d+)\s+of\s+(\d+)`;

function caseNumberRule(label: string): PatternRule {
  return { label, pattern: new RegExp(`${label} ${CASE_NUMBER_SUFFIX}`, 'i'), group: 0 };
}

/**
 * Case type labels in priority order
 */
export const CASE_TYPES: readonly string[] = [
  'Death Reference',
  'Criminal Appeal',
  'Civil Appeal',
  'Criminal Revision',
  'Civil Revision',
  'Writ Petition',
];

export const CASE_NUMBER_RULES: readonly PatternRule[] = [
  ...CASE_TYPES.map(caseNumberRule),
  { label: 'Case No.', pattern: /Case No[.\s]+(\d+)[/\s]+(\d+)/i, group: 0 },
];

/**
 * Fallback case number taken from the file stem, e.g. "123_Smith_case"
 */
export const FILENAME_CASE_NUMBER_RULE: PatternRule = {
  label: 'filename',
  pattern: /(\d+)_([A-Za-z]+)_/,
  group: 0,
};

export const COURT_RULES: readonly PatternRule[] = [
  { label: 'Supreme Court', pattern: /(Supreme Court of Bangladesh[^\n]*)/, group: 1 },
  { label: 'High Court Division', pattern: /(High Court Division[^\n]*)/, group: 1 },
  { label: 'Appellate Division', pattern: /(Appellate Division[^\n]*)/, group: 1 },
];

export const DISTRICT_RULE: PatternRule = {
  label: 'District',
  pattern: /District:[ \t]*([A-Za-z \t]+)\./,
  group: 1,
};

/**
 * Judges are listed in the head of a judgment
 */
export const JUDGE_SEARCH_WINDOW = 3000;

export const JUDGE_RULES: readonly PatternRule[] = [
  { label: 'Mr. Justice', pattern: /Mr\.\s*Justice\s+([A-Za-z\s.]+?)(?:\n|And|$)/g, group: 1 },
  { label: 'Justice', pattern: /Justice\s+([A-Za-z\s.]+?)(?:\n|And|$)/g, group: 1 },
  { label: "Hon'ble Mr. Justice", pattern: /Hon'ble\s+Mr\.\s*Justice\s+([A-Za-z\s.]+?)(?:\n|$)/g, group: 1 },
];

/**
 * "Appellant -Versus- Respondent"; group 1 is the plaintiff, group 2 the defendant
 */
export const PARTIES_RULE: PatternRule = {
  label: 'Versus',
  pattern: /([A-Za-z\s.]+?)\s+-?\s*Versus\s*-?\s*([A-Za-z\s.]+?)(?:\n|$)/i,
  group: 1,
};

export const HEARING_DATE_RULES: readonly PatternRule[] = [
  {
    label: 'Heard On',
    pattern: /Heard On:\s*([0-9]{2}\.[0-9]{2}\.[0-9]{4}(?:\s+and\s+[0-9]{2}\.[0-9]{2}\.[0-9]{4})?)/,
    group: 1,
  },
  {
    label: 'Date of Hearing',
    pattern: /Date of Hearing:\s*([0-9]{2}[/-][0-9]{2}[/-][0-9]{4})/,
    group: 1,
  },
];

export const JUDGMENT_DATE_RULES: readonly PatternRule[] = [
  {
    label: 'Judgment Delivered On',
    pattern: /Judgment Delivered On:\s*([0-9]{2}\.[0-9]{2}\.[0-9]{4})/,
    group: 1,
  },
  {
    label: 'Date of Judgment',
    pattern: /Date of Judgment:\s*([0-9]{2}[/-][0-9]{2}[/-][0-9]{4})/,
    group: 1,
  },
];
