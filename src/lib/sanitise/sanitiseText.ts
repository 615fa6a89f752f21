/**
 * Character sanitiser
 *
 * Maps arbitrary text onto a restricted alphabet. Characters already in the
 * alphabet pass through; accented letters fall back to their base letter;
 * dashes, smart quotes and a few invisible characters have fixed
 * replacements; anything else becomes "?".
 */

import charsets from "./charsets.json";

const REPLACEMENT_CHARACTERS: Readonly<Record<string, string>> = {
  "–": "-", // en dash
  "—": "-", // em dash
  "…": "...", // horizontal ellipsis
  "‘": "'",
  "’": "'",
  "“": '"',
  "”": '"',
  "\u200b": "", // zero width space
  "\u00a0": "", // no-break space
  "\t": " ",
};

const HANGUL_SYLLABLES_FIRST = 0xac00;
const HANGUL_SYLLABLES_LAST = 0xd7a3;

/**
 * Turn a four-digit upper-case hex code point ("00E9") into its character.
 */
export function getUnicodeCharFromCodepoint(codepoint: string): string {
  if (!/^[0-9A-F]{4}$/.test(codepoint)) {
    throw new RangeError(`${codepoint} is not a valid unicode codepoint`);
  }
  return String.fromCharCode(parseInt(codepoint, 16));
}

function firstCodepoint(text: string): number | null {
  return text.codePointAt(0) ?? null;
}

/**
 * First element of a character's canonical decomposition as a hex code point,
 * or null when it has none. Compatibility mappings are not canonical and are
 * never returned.
 */
function canonicalDecompositionHead(c: string): string | null {
  const cp = firstCodepoint(c);
  if (cp === null) return null;
  if (cp >= HANGUL_SYLLABLES_FIRST && cp <= HANGUL_SYLLABLES_LAST) return null;

  const decomposed = c.normalize("NFD");
  if (decomposed === c) return null;

  const composed = c.normalize("NFC");
  let head: number | null;
  if (composed !== c) {
    // singleton or excluded composition: decomposes straight to this form
    head = firstCodepoint(composed);
  } else {
    const parts = [...decomposed];
    head = firstCodepoint(parts.slice(0, -1).join("").normalize("NFC"));
  }
  if (head === null) return null;

  return head.toString(16).toUpperCase().padStart(4, "0");
}

export class SanitiseText {
  constructor(readonly allowedCharacters: ReadonlySet<string>) {}

  encode(content: string): string {
    let out = "";
    for (const c of content) out += this.encodeChar(c);
    return out;
  }

  /**
   * Characters that `encode` would turn into "?".
   */
  getNonCompatibleCharacters(content: string): Set<string> {
    const found = new Set<string>();
    for (const c of content) {
      if (!this.allowedCharacters.has(c) && this.downgradeCharacter(c) === null) {
        found.add(c);
      }
    }
    return found;
  }

  /**
   * A replacement for a character outside the alphabet, possibly several
   * characters long ("…" → "..."), or null when there is none.
   */
  downgradeCharacter(c: string): string | null {
    const head = canonicalDecompositionHead(c);
    if (head !== null) {
      // astral decompositions have five digits and are left alone
      return head.length === 4 ? getUnicodeCharFromCodepoint(head) : null;
    }
    return REPLACEMENT_CHARACTERS[c] ?? null;
  }

  encodeChar(c: string): string {
    if (this.allowedCharacters.has(c)) return c;
    return this.downgradeCharacter(c) ?? "?";
  }
}

function charSet(...groups: string[]): Set<string> {
  const set = new Set<string>();
  for (const group of groups) {
    for (const c of group) set.add(c);
  }
  return set;
}

/** Welsh letters outside GSM; their presence makes an SMS unicode-encoded. */
export const WELSH_NON_GSM_CHARACTERS: ReadonlySet<string> = charSet(charsets.welshNonGsm);

export const FRENCH_NON_GSM_CHARACTERS: ReadonlySet<string> = charSet(charsets.frenchNonGsm);

/**
 * GSM 03.38 basic set and extension table, plus Welsh, French, Inuktitut,
 * Cree and Ojibwe characters.
 */
export const SanitiseSMS = new SanitiseText(
  charSet(
    charsets.gsm,
    charsets.welshNonGsm,
    charsets.frenchNonGsm,
    charsets.inuktitut,
    charsets.cree,
    charsets.ojibwe,
  ),
);

// printable ASCII, 32 to 126
export const SanitiseASCII = new SanitiseText(
  charSet(Array.from({ length: 95 }, (_, i) => String.fromCharCode(32 + i)).join("")),
);

export function smsEncode(content: unknown): string {
  return SanitiseSMS.encode(String(content));
}
