/**
 * @fileoverview HTML Entity Decoder
 *
 * Cleans up text that was scraped with legacy escaping: numeric character
 * references, octal "\u" escapes, stray closing anchors and a few named
 * entities. Decoding is best effort and always returns a string.
 *
 * @module @entrypipe/engine/text/HtmlEntityDecoder
 */

const kLINE_SEPARATOR = 0x2028;
const kOCTAL_ESCAPE   = /^[0-7]{4}$/;

/**
 * Outcome of a decoding stage that may stop early.
 */
interface StageResult {
    readonly text: string;
    readonly complete: boolean;
}

/**
 * Decoded text plus the stages that stopped before the end of the input.
 */
export interface DecodedText {
    /** Text as far as it could be decoded */
    readonly text: string;

    /** Stages that hit a malformed escape and left the rest untouched */
    readonly incompleteStages: readonly ("numeric" | "octal")[];
}

/**
 * Decode `&#NNN;` and `&#xHHH;` references from left to right.
 *
 * Stops at the first reference that is unterminated or does not name a
 * valid code point; everything decoded up to that point is kept.
 */
function decodeNumericReferences(input: string): StageResult {
    let s = input;
    let p = s.indexOf("&#");

    while (p >= 0) {
        const q = s.indexOf(";", p + 2);
        if (q < 0) {
            return { text: s, complete: false };
        }

        const reference = s.substring(p + 2, q);
        const codePoint = /^[xX]/.test(reference)
            ? parseStrictInt(reference.substring(1), 16)
            : parseStrictInt(reference, 10);

        if (codePoint === null || codePoint > 0x10ffff) {
            return { text: s, complete: false };
        }

        const replacement = codePoint === 10 || codePoint === 13 ? "\n" : String.fromCodePoint(codePoint);
        s = s.substring(0, p) + replacement + s.substring(q + 1);
        p = s.indexOf("&#");
    }

    return { text: s, complete: true };
}

/**
 * Decode `\uNNNN` escapes whose four digits are read as octal. Results
 * below the space character become a space.
 *
 * Stops at the first escape that is not followed by four octal digits.
 */
function decodeOctalEscapes(input: string): StageResult {
    let s = input;
    let p = s.indexOf("\\u");

    while (p >= 0 && s.length >= p + 6) {
        const digits = s.substring(p + 2, p + 6);
        if (!kOCTAL_ESCAPE.test(digits)) {
            return { text: s, complete: false };
        }

        const code = parseInt(digits, 8);
        const char = code < 0x20 ? " " : String.fromCharCode(code);
        s = s.substring(0, p) + char + s.substring(p + 6);
        p = s.indexOf("\\u");
    }

    return { text: s, complete: true };
}

function parseStrictInt(digits: string, radix: 10 | 16): number | null {
    const pattern = radix === 16 ? /^[0-9a-fA-F]+$/ : /^[0-9]+$/;
    return pattern.test(digits) ? parseInt(digits, radix) : null;
}

/**
 * Map line separators, CR and LF to a newline and any other control
 * character to a space.
 */
function normalizeControlCharacters(s: string): string {
    let clean = "";

    for (const char of s) {
        const code = char.codePointAt(0) ?? 0;

        if (code === kLINE_SEPARATOR || char === "\n" || char === "\r") {
            clean += "\n";
        }
        else if (code < 0x20) {
            clean += " ";
        }
        else {
            clean += char;
        }
    }

    return clean;
}

/**
 * Decode legacy-escaped message text, reporting stages that stopped early.
 *
 * Steps, in order:
 * 1. numeric character references (10 and 13 become a newline)
 * 2. octal `\u` escapes
 * 3. remove `</a>`, unescape `&quot;` and `&amp;`
 * 4. line separators, CR and LF become a newline, other controls a space
 * 5. one pass replacing double spaces with one space; a run of three
 *    spaces therefore leaves two
 *
 * A malformed escape ends its own stage; later stages still run on the
 * partially decoded text.
 */
export function decodeHtmlEntitiesDetailed(input: string): DecodedText {
    const incompleteStages: ("numeric" | "octal")[] = [];

    const numeric = decodeNumericReferences(input);
    if (!numeric.complete) {
        incompleteStages.push("numeric");
    }

    const octal = decodeOctalEscapes(numeric.text);
    if (!octal.complete) {
        incompleteStages.push("octal");
    }

    const unescaped = octal.text
        .replaceAll("</a>", "")
        .replaceAll("&quot;", "\"")
        .replaceAll("&amp;", "&");

    return {
        text: normalizeControlCharacters(unescaped).replaceAll("  ", " "),
        incompleteStages,
    };
}

/**
 * Decode legacy-escaped message text.
 *
 * @param input - Text as captured
 * @returns Decoded text; never throws
 *
 * @example
 * ```typescript
 * decodeHtmlEntities("Fish &amp; Chips &#8364;5</a>");
 * // => "Fish & Chips €5"
 * ```
 */
export function decodeHtmlEntities(input: string): string {
    return decodeHtmlEntitiesDetailed(input).text;
}
