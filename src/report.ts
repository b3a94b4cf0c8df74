import { ContributorRecord, METRIC_SECTIONS } from "./contributor-data";

export const DEFAULT_TOP = 10;

const RULE = "-".repeat(87);

export type MetricValue = (record: ContributorRecord) => number;

/**
 * Highest values first; records with equal values keep their input order.
 * Zero-valued records never make it into a leaderboard.
 */
export function rankBy(records: readonly ContributorRecord[], value: MetricValue, top: number): ContributorRecord[] {
    return [...records]
        .sort((a, b) => value(b) - value(a))
        .filter((record) => value(record) > 0)
        .slice(0, top);
}

export function formatCount(n: number): string {
    return String(n)
        .replace(/\B(?=(\d{3})+(?!\d))/g, ",")
        .padStart(9);
}

function section(title: string, records: readonly ContributorRecord[], value: MetricValue, top: number): string[] {
    const lines = ["", RULE, ` ${title}`, RULE];
    for (const record of rankBy(records, value, top)) {
        lines.push(`${formatCount(value(record))}   ${record.email}`);
    }
    return lines;
}

export function renderReport(
    records: readonly ContributorRecord[],
    wordlist: readonly string[],
    top: number = DEFAULT_TOP
): string[] {
    const lines: string[] = [];
    for (const metric of METRIC_SECTIONS) {
        lines.push(...section(metric.title, records, (r) => r[metric.key], top));
    }
    for (const word of wordlist) {
        lines.push(...section(`WORD: ${word}`, records, (r) => r.words.get(word) ?? 0, top));
    }
    return lines;
}
