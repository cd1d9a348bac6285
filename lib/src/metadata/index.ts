/**
 * Metadata Module
 *
 * Case metadata record and its rule-based extraction.
 */

// Types and schemas
export {
  CaseMetadataSchema,
  PartiesSchema,
  MAX_JUDGES,
  createEmptyMetadata,
  toMetadataJson,
  type CaseMetadata,
  type CaseMetadataJson,
  type Parties,
  type PatternRule,
} from './types.js';

// Rule tables
export {
  CASE_TYPES,
  CASE_NUMBER_RULES,
  FILENAME_CASE_NUMBER_RULE,
  COURT_RULES,
  DISTRICT_RULE,
  JUDGE_RULES,
  JUDGE_SEARCH_WINDOW,
  PARTIES_RULE,
  HEARING_DATE_RULES,
  JUDGMENT_DATE_RULES,
} from './rules.js';

// Extraction
export {
  extractCaseMetadata,
  extractCaseNumber,
  extractCaseType,
  extractJudges,
  extractParties,
  firstMatch,
  allMatches,
  withConversionFlag,
} from './extractor.js';
