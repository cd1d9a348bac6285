/**
 * Case Metadata Types
 *
 * Structured record extracted from the raw text of a legal case.
 */

import { z } from 'zod';
import { BengaliEncodingSchema } from '../bengali/index.js';

// =============================================================================
// Case Metadata
// =============================================================================

export const PartiesSchema = z.object({
  plaintiff: z.string().optional(),
  defendant: z.string().optional(),
});

export type Parties = z.infer<typeof PartiesSchema>;

/**
 * Maximum number of judges kept on a record
 */
export const MAX_JUDGES = 5;

export const CaseMetadataSchema = z.object({
  /** Full matched label and numbers, e.g. "Civil Appeal No. 45 of 2020" */
  caseNumber: z.string().optional(),
  /** One of the known case type labels */
  caseType: z.string().optional(),
  district: z.string().optional(),
  /** Court line, verbatim */
  court: z.string().optional(),
  /** Deduplicated, in order of first appearance */
  judges: z.array(z.string()).max(MAX_JUDGES),
  parties: PartiesSchema,
  /** As written in the document, no date normalization */
  hearingDate: z.string().optional(),
  judgmentDate: z.string().optional(),
  citations: z.array(z.string()),
  hasBengali: z.boolean(),
  /** Set only when hasBengali is true */
  originalEncoding: BengaliEncodingSchema.optional(),
  /** True only when at least one line was converted */
  convertedToUnicode: z.boolean(),
});

export type CaseMetadata = Readonly<z.infer<typeof CaseMetadataSchema>>;

/**
 * Persisted form of the metadata record
 */
export interface CaseMetadataJson {
  case_number: string | null;
  case_type: string | null;
  district: string | null;
  court: string | null;
  judges: string[];
  parties: Parties;
  hearing_date: string | null;
  judgment_date: string | null;
  citations: string[];
  has_bengali: boolean;
  original_encoding: string | null;
  converted_to_unicode: boolean;
}

// =============================================================================
// Pattern Rules
// =============================================================================

/**
 * An ordered extraction rule: the first rule that matches wins
 */
export interface PatternRule {
  /** Human-readable rule name */
  readonly label: string;
  readonly pattern: RegExp;
  /** Capture group holding the value (0 = whole match) */
  readonly group: number;
}

// =============================================================================
// Factories
// =============================================================================

export function createEmptyMetadata(): z.infer<typeof CaseMetadataSchema> {
  return {
    judges: [],
    parties: {},
    citations: [],
    hasBengali: false,
    convertedToUnicode: false,
  };
}

/**
 * Convert a metadata record to its persisted snake_case form
 */
export function toMetadataJson(metadata: CaseMetadata): CaseMetadataJson {
  return {
    case_number: metadata.caseNumber ?? null,
    case_type: metadata.caseType ?? null,
    district: metadata.district ?? null,
    court: metadata.court ?? null,
    judges: [...metadata.judges],
    parties: { ...metadata.parties },
    hearing_date: metadata.hearingDate ?? null,
    judgment_date: metadata.judgmentDate ?? null,
    citations: [...metadata.citations],
    has_bengali: metadata.hasBengali,
    original_encoding: metadata.originalEncoding ?? null,
    converted_to_unicode: metadata.convertedToUnicode,
  };
}
