/**
 * Bijoy to Unicode Codec
 *
 * Converts text typed in the Bijoy (legacy 8-bit Bengali) keyboard/font
 * encoding to Unicode Bengali.
 *
 * Conversion runs in three passes:
 * 1. Longest-match glyph substitution from `bijoy-map.json`
 * 2. Pre-base vowel signs (ি ে ৈ) move after the consonant cluster they
 *    visually precede, merging ে…া into ো and ে…ৗ into ৌ
 * 3. Reph (র্), typed after its cluster, moves in front of it
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { type LegacyCodec, BijoyConversionError } from './types.js';

// ============================================================================
// Constants
// ============================================================================

const BijoyMapSchema = z.record(z.string().min(1), z.string());

type BijoyMap = z.infer<typeof BijoyMapSchema>;

/** Bijoy glyph for reph */
const REPH_GLYPH = '©';
/** Private-use placeholder held until the reph pass */
const REPH_PLACEHOLDER = '\ue000';
const REPH = 'র্';

const HASANTA = '্';
const E_KAR = 'ে';
const AA_KAR = 'া';
const AU_LENGTH_MARK = 'ৗ';
const O_KAR = 'ো';
const AU_KAR = 'ৌ';

const PRE_BASE_KARS: ReadonlySet<string> = new Set(['ি', 'ে', 'ৈ']);

const UNPAIRED_SURROGATE = /[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/;

// ============================================================================
// Character Classes
// ============================================================================

function isConsonant(char: string | undefined): boolean {
  if (char === undefined) return false;
  const code = char.charCodeAt(0);
  return (
    (code >= 0x0995 && code <= 0x09b9) ||
    code === 0x09dc ||
    code === 0x09dd ||
    code === 0x09df
  );
}

/** Dependent vowel signs and the marks that sit on a cluster */
function isClusterMark(char: string | undefined): boolean {
  if (char === undefined) return false;
  const code = char.charCodeAt(0);
  return (code >= 0x09be && code <= 0x09cc) || code === 0x09d7 || (code >= 0x0981 && code <= 0x0983);
}

// ============================================================================
// Passes
// ============================================================================

function substituteGlyphs(text: string, map: BijoyMap, maxKeyLength: number): string[] {
  const out: string[] = [];
  let i = 0;

  while (i < text.length) {
    const char = text.charAt(i);
    if (char === REPH_GLYPH) {
      out.push(REPH_PLACEHOLDER);
      i++;
      continue;
    }

    let matched = false;
    for (let length = Math.min(maxKeyLength, text.length - i); length > 0; length--) {
      const replacement = map[text.slice(i, i + length)];
      if (replacement !== undefined) {
        out.push(...replacement);
        i += length;
        matched = true;
        break;
      }
    }

    if (!matched) {
      out.push(char);
      i++;
    }
  }

  return out;
}

/**
 * Index just past the consonant cluster starting at `start`
 */
function clusterEnd(chars: readonly string[], start: number): number {
  let end = start + 1;
  while (chars[end] === HASANTA && isConsonant(chars[end + 1])) {
    end += 2;
  }
  return end;
}

function reorderPreBaseKars(chars: readonly string[]): string[] {
  const out: string[] = [];
  let i = 0;

  while (i < chars.length) {
    const char = chars[i] ?? '';

    if (PRE_BASE_KARS.has(char) && isConsonant(chars[i + 1])) {
      const end = clusterEnd(chars, i + 1);
      out.push(...chars.slice(i + 1, end));

      const next = chars[end];
      if (char === E_KAR && next === AA_KAR) {
        out.push(O_KAR);
        i = end + 1;
      } else if (char === E_KAR && next === AU_LENGTH_MARK) {
        out.push(AU_KAR);
        i = end + 1;
      } else {
        out.push(char);
        i = end;
      }
      continue;
    }

    out.push(char);
    i++;
  }

  return out;
}

function placeReph(chars: readonly string[]): string[] {
  const out: string[] = [];

  for (const char of chars) {
    if (char !== REPH_PLACEHOLDER) {
      out.push(char);
      continue;
    }

    let k = out.length - 1;
    while (k >= 0 && isClusterMark(out[k])) {
      k--;
    }

    if (k < 0 || !isConsonant(out[k])) {
      // Nothing to attach to: keep the reph where it was typed
      out.push(...REPH);
      continue;
    }

    k--;
    while (k >= 1 && out[k] === HASANTA && isConsonant(out[k - 1])) {
      k -= 2;
    }

    out.splice(k + 1, 0, ...REPH);
  }

  return out;
}

// ============================================================================
// Codec
// ============================================================================

let defaultMap: BijoyMap | null = null;

/**
 * Load the bundled Bijoy glyph table
 */
export function loadBijoyMap(): BijoyMap {
  if (!defaultMap) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL('./bijoy-map.json', import.meta.url), 'utf-8')
    );
    defaultMap = BijoyMapSchema.parse(raw);
  }
  return defaultMap;
}

/**
 * Create a Bijoy codec.
 *
 * @param map - Glyph table to use instead of the bundled one
 *
 * @example
 * ```typescript
 * const codec = createBijoyCodec();
 * codec.convertLegacyToUnicode('Avgvi'); // 'আমার'
 * ```
 */
export function createBijoyCodec(map?: Readonly<Record<string, string>>): LegacyCodec {
  const table = map ? BijoyMapSchema.parse(map) : loadBijoyMap();
  const maxKeyLength = Math.max(1, ...Object.keys(table).map((key) => key.length));

  return {
    name: 'bijoy',
    convertLegacyToUnicode(text: string): string {
      if (UNPAIRED_SURROGATE.test(text)) {
        throw new BijoyConversionError('Input contains an unpaired surrogate', text);
      }

      const substituted = substituteGlyphs(text, table, maxKeyLength);
      return placeReph(reorderPreBaseKars(substituted)).join('');
    },
  };
}

/**
 * Convert Bijoy text to Unicode with the bundled table
 */
export function convertBijoyToUnicode(text: string): string {
  return createBijoyCodec().convertLegacyToUnicode(text);
}
