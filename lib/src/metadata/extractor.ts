/**
 * Case Metadata Extraction
 *
 * Applies the ordered rule tables in `rules.ts` to the raw (pre-conversion)
 * text of a case. A rule that does not match leaves its field unset; that is
 * never an error.
 */

import path from 'node:path';
import { type ScriptClassification, classifyScript } from '../bengali/index.js';
import {
  type CaseMetadata,
  type PatternRule,
  MAX_JUDGES,
  createEmptyMetadata,
} from './types.js';
import {
  CASE_NUMBER_RULES,
  CASE_TYPES,
  COURT_RULES,
  DISTRICT_RULE,
  FILENAME_CASE_NUMBER_RULE,
  HEARING_DATE_RULES,
  JUDGE_RULES,
  JUDGE_SEARCH_WINDOW,
  JUDGMENT_DATE_RULES,
  PARTIES_RULE,
} from './rules.js';

// ============================================================================
// Rule Evaluation
// ============================================================================

/**
 * Evaluate rules in order and return the trimmed capture of the first match
 */
export function firstMatch(text: string, rules: readonly PatternRule[]): string | undefined {
  for (const rule of rules) {
    const match = rule.pattern.exec(text);
    const value = match?.[rule.group]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

/**
 * Collect every capture of every rule, in rule order
 */
export function allMatches(text: string, rules: readonly PatternRule[]): string[] {
  const values: string[] = [];
  for (const rule of rules) {
    const global = rule.pattern.global
      ? rule.pattern
      : new RegExp(rule.pattern.source, `${rule.pattern.flags}g`);
    for (const match of text.matchAll(global)) {
      const value = match[rule.group]?.trim();
      if (value) {
        values.push(value);
      }
    }
  }
  return values;
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

// ============================================================================
// Field Extractors
// ============================================================================

/**
 * Case number from the text, falling back to a `<digits>_<word>_` file stem
 */
export function extractCaseNumber(text: string, filename: string): string | undefined {
  const fromText = firstMatch(text, CASE_NUMBER_RULES);
  if (fromText) {
    return fromText;
  }

  const stem = path.parse(filename).name;
  const match = FILENAME_CASE_NUMBER_RULE.pattern.exec(stem);
  const value = match?.[FILENAME_CASE_NUMBER_RULE.group]?.replace(/_+$/, '');
  return value || undefined;
}

/**
 * First case type label contained in the text, case-insensitively
 */
export function extractCaseType(text: string): string | undefined {
  const lower = text.toLowerCase();
  return CASE_TYPES.find((caseType) => lower.includes(caseType.toLowerCase()));
}

/**
 * Judges named near the head of the document, deduplicated and capped
 */
export function extractJudges(text: string): string[] {
  const head = text.slice(0, JUDGE_SEARCH_WINDOW);
  const unique = [...new Set(allMatches(head, JUDGE_RULES))];
  return unique.slice(0, MAX_JUDGES);
}

export function extractParties(text: string): { plaintiff?: string; defendant?: string } {
  const match = PARTIES_RULE.pattern.exec(text);
  const plaintiff = match?.[1];
  const defendant = match?.[2];

  if (plaintiff === undefined || defendant === undefined) {
    return {};
  }

  return {
    plaintiff: collapseWhitespace(plaintiff),
    defendant: collapseWhitespace(defendant),
  };
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Extract structured metadata from the raw text of a case.
 *
 * @param rawText - Text before any Bijoy conversion
 * @param filename - File name or stem, used for the case number fallback
 * @param classification - Script classification of `rawText`; computed when omitted
 *
 * @example
 * ```typescript
 * const metadata = extractCaseMetadata(rawText, '123_Smith_case.pdf');
 * console.log(metadata.caseNumber ?? 'Unknown');
 * ```
 */
export function extractCaseMetadata(
  rawText: string,
  filename: string,
  classification?: ScriptClassification
): CaseMetadata {
  const metadata = createEmptyMetadata();
  const script = classification ?? classifyScript(rawText);

  metadata.hasBengali = script.hasBengali;
  if (script.verdict !== 'none') {
    metadata.originalEncoding = script.verdict;
  }

  metadata.caseNumber = extractCaseNumber(rawText, filename);
  metadata.caseType = extractCaseType(rawText);
  metadata.court = firstMatch(rawText, COURT_RULES);
  metadata.district = firstMatch(rawText, [DISTRICT_RULE]);
  metadata.judges = extractJudges(rawText);
  metadata.parties = extractParties(rawText);
  metadata.hearingDate = firstMatch(rawText, HEARING_DATE_RULES);
  metadata.judgmentDate = firstMatch(rawText, JUDGMENT_DATE_RULES);

  return freezeMetadata(metadata);
}

/**
 * Record the conversion outcome on an extracted record
 */
export function withConversionFlag(metadata: CaseMetadata, converted: boolean): CaseMetadata {
  return freezeMetadata({
    ...metadata,
    judges: [...metadata.judges],
    parties: { ...metadata.parties },
    citations: [...metadata.citations],
    convertedToUnicode: converted,
  });
}

function freezeMetadata(metadata: ReturnType<typeof createEmptyMetadata>): CaseMetadata {
  Object.freeze(metadata.judges);
  Object.freeze(metadata.parties);
  Object.freeze(metadata.citations);
  return Object.freeze(metadata);
}
