export interface DateRange {
    since?: string;
    until?: string;
}

export interface ChurnTotals {
    files: number;
    adds: number;
    dels: number;
    maxFiles: number;
    maxAdds: number;
    maxDels: number;
}

export type WordCounts = Map<string, number>;

export interface ContributorRecord extends ChurnTotals {
    email: string;
    commits: number;
    words: ReadonlyMap<string, number>;
}

export type NumericMetric = Exclude<keyof ContributorRecord, "email" | "words">;

export interface MetricSection {
    key: NumericMetric;
    title: string;
}

// Order in which the report prints its sections.
export const METRIC_SECTIONS: readonly MetricSection[] = [
    { key: "commits", title: "NUMBER OF COMMITS" },
    { key: "files", title: "CHANGED FILES" },
    { key: "maxFiles", title: "MAX CHANGED FILES PER COMMIT" },
    { key: "adds", title: "LINES OF ADDITIONS" },
    { key: "maxAdds", title: "MAX LINES OF ADDITIONS PER COMMIT" },
    { key: "dels", title: "LINES OF DELETIONS" },
    { key: "maxDels", title: "MAX LINES OF DELETIONS PER COMMIT" },
];

export function emptyChurn(): ChurnTotals {
    return { files: 0, adds: 0, dels: 0, maxFiles: 0, maxAdds: 0, maxDels: 0 };
}

export function emptyWordCounts(wordlist: readonly string[]): WordCounts {
    return new Map(wordlist.map((word): [string, number] => [word, 0]));
}
