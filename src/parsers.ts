import { ChurnTotals, emptyChurn, emptyWordCounts, WordCounts } from "./contributor-data";
import { splitLines } from "./git";

// --shortstat lines look like " 3 files changed, 10 insertions(+), 2 deletions(-)",
// but any part may be missing, so each number is matched on its own.
const FILES_PATTERN = /^.*\s+([0-9]+)\s+file/i;
const ADDS_PATTERN = /^.*\s+([0-9]+)\s+inser/i;
const DELS_PATTERN = /^.*\s+([0-9]+)\s+delet/i;

// Forgiving inflections accepted after a keyword. Known to over- and under-match.
export const KEYWORD_SUFFIXES = ["s", "z", "d", "es", "ed", "er", "rs", "ers", "or", "ors", "ing", "in", "-"];

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function keywordPattern(keyword: string): RegExp {
    const suffixes = KEYWORD_SUFFIXES.map(escapeRegExp).join("|");
    return new RegExp(`\\b(${escapeRegExp(keyword)})(\\b|${suffixes})?(\\b|\\\\s|-|_|$)`, "i");
}

export function countCommits(output: string): number {
    return splitLines(output).length;
}

function matchCount(pattern: RegExp, line: string): number | undefined {
    const digits = pattern.exec(line)?.[1];
    return digits !== undefined ? Number(digits) : undefined;
}

/**
 * Folds every line of a `git log --shortstat` output into `totals`.
 * The max* fields hold the largest value seen on a single line, i.e. the
 * biggest commit.
 */
export function countChurn(output: string, totals: ChurnTotals = emptyChurn()): ChurnTotals {
    for (const line of splitLines(output)) {
        const files = matchCount(FILES_PATTERN, line);
        const adds = matchCount(ADDS_PATTERN, line);
        const dels = matchCount(DELS_PATTERN, line);

        if (files !== undefined) {
            totals.files += files;
            if (files > totals.maxFiles) totals.maxFiles = files;
        }
        if (adds !== undefined) {
            totals.adds += adds;
            if (adds > totals.maxAdds) totals.maxAdds = adds;
        }
        if (dels !== undefined) {
            totals.dels += dels;
            if (dels > totals.maxDels) totals.maxDels = dels;
        }
    }
    return totals;
}

/** Counts, per keyword, the commit messages that mention it at least once. */
export function countKeywords(
    output: string,
    wordlist: readonly string[],
    counts: WordCounts = emptyWordCounts(wordlist)
): WordCounts {
    const messages = splitLines(output);
    for (const word of new Set(wordlist)) {
        const pattern = keywordPattern(word);
        for (const message of messages) {
            if (pattern.test(message)) counts.set(word, (counts.get(word) ?? 0) + 1);
        }
    }
    return counts;
}
