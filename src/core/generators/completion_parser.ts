/**
 * ✂️ COMPLETION PARSER
 * Turns free-form model output into candidate tokens. Models ignore "no numbering,
 * no explanations" often enough that list markers, fences and chatter have to be
 * peeled off here; validation happens later.
 */

const CODE_FENCE = /^\s*```/;
const TOKEN_SEPARATORS = /[,;\t]/;
// "- word", "* word", "• word", "1. word", "1) word". A bare "-word" is left alone.
const LIST_MARKER = /^(?:[-*•]\s+|\d+[.)](?:\s+|$))/;
const WRAPPING_CHARS = /^["'`*,]+|["'`*,]+$/g;
const COMMENTARY = /[:[\](){}\s]|->/;

function cleanToken(token: string): string {
    return token
        .trim()
        .replace(LIST_MARKER, '')
        .replace(WRAPPING_CHARS, '')
        .trim();
}

export function parseCompletion(raw: string): string[] {
    const candidates: string[] = [];

    for (const line of raw.split(/\r?\n/)) {
        if (CODE_FENCE.test(line)) continue;

        for (const piece of line.split(TOKEN_SEPARATORS)) {
            const token = cleanToken(piece);
            if (!token || COMMENTARY.test(token)) continue;
            candidates.push(token);
        }
    }

    return candidates;
}
