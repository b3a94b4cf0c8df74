import { ContributorRecord, DateRange, emptyChurn, emptyWordCounts } from "./contributor-data";
import { LogQuery } from "./git";
import { countChurn, countCommits, countKeywords } from "./parsers";

export interface StatisticsOptions {
    repositories: string[];
    wordlist: string[];
    range: DateRange;
    onContributor?: (email: string, index: number, total: number) => void;
}

// git matches --author as a basic regex against "Name <email>".
function escapeBre(text: string): string {
    return text.replace(/[.*[\]^$\\]/g, "\\$&");
}

export function authorFilter(email: string): string {
    return `--author=<${escapeBre(email)}>`;
}

export async function discoverContributors(
    repositories: string[],
    range: DateRange,
    log: LogQuery
): Promise<Set<string>> {
    const contributors = new Set<string>();
    for (const repo of repositories) {
        const committers = (await log(repo, range, ["--format=%cE"])).split(/\s+/);
        const authors = (await log(repo, range, ["--format=%aE"])).split(/\s+/);
        for (const email of [...authors, ...committers]) {
            if (email) contributors.add(email);
        }
    }
    return contributors;
}

export async function buildRecord(
    email: string,
    repositories: string[],
    wordlist: string[],
    range: DateRange,
    log: LogQuery
): Promise<ContributorRecord> {
    const churn = emptyChurn();
    const words = emptyWordCounts(wordlist);
    let commits = 0;

    for (const repo of repositories) {
        countChurn(await log(repo, range, [authorFilter(email), "--shortstat", "--format=%H"]), churn);
        commits += countCommits(await log(repo, range, [authorFilter(email), "--format=%H"]));
        if (wordlist.length > 0) {
            countKeywords(await log(repo, range, [authorFilter(email), "--oneline", "--no-decorate"]), wordlist, words);
        }
    }

    return Object.freeze({ email, commits, ...churn, words });
}

export async function buildRecords(
    repositories: string[],
    contributors: string[],
    wordlist: string[],
    range: DateRange,
    log: LogQuery,
    onContributor?: StatisticsOptions["onContributor"]
): Promise<ContributorRecord[]> {
    const records: ContributorRecord[] = [];
    for (const [index, email] of contributors.entries()) {
        onContributor?.(email, index, contributors.length);
        records.push(await buildRecord(email, repositories, wordlist, range, log));
    }
    return records;
}

/** One record per contributor found in any repository within the range. */
export async function collectStatistics(options: StatisticsOptions, log: LogQuery): Promise<ContributorRecord[]> {
    const { repositories, wordlist, range, onContributor } = options;
    const contributors = await discoverContributors(repositories, range, log);
    return buildRecords(repositories, [...contributors], wordlist, range, log, onContributor);
}
