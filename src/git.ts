import { execFile } from "child_process";
import { DateRange } from "./contributor-data";

export class GitError extends Error {
    constructor(
        message: string,
        public stderr?: string
    ) {
        super(message);
        this.name = "GitError";
    }
}

export type GitRunner = (args: string[], options?: { cwd?: string }) => Promise<string>;

/** Raw `git log` output for one repository, or "" when the query fails. */
export type LogQuery = (repoPath: string, range: DateRange, args: string[]) => Promise<string>;

// git log output for a busy author easily exceeds execFile's 1 MiB default
const MAX_BUFFER = 64 * 1024 * 1024;

export const runGit: GitRunner = (args, options = {}) => {
    return new Promise((resolve, reject) => {
        const child = execFile(
            "git",
            args,
            { windowsHide: true, maxBuffer: MAX_BUFFER, ...options },
            (err, stdout, stderr) => {
                if (err) {
                    const message = `git command failed: ${String(stderr).trim() || err.message}`;
                    return reject(new GitError(message, stderr?.toString()));
                }
                resolve(stdout.toString());
            }
        );
        if (child.stdout) child.stdout.setEncoding("utf8");
    });
};

export function buildLogArgs(range: DateRange, args: string[]): string[] {
    const { since, until } = range;
    if (since && until) return ["log", `--after=${since}`, `--before=${until}`, ...args];
    if (since) return ["log", `--after=${since}`, ...args];
    if (until) return ["log", `--before=${until}`, ...args];
    return ["log", ...args];
}

/**
 * Runs `git log` inside `repoPath`. A repository without commits in range, an
 * unborn branch or a path that is no repository all come back as "".
 */
export async function gitLog(
    repoPath: string,
    range: DateRange,
    args: string[],
    run: GitRunner = runGit
): Promise<string> {
    try {
        return await run(buildLogArgs(range, args), { cwd: repoPath });
    } catch {
        // a failed query counts as zero contribution
        return "";
    }
}

export function createLogQuery(run: GitRunner = runGit): LogQuery {
    return (repoPath, range, args) => gitLog(repoPath, range, args, run);
}

export function splitLines(output: string): string[] {
    return output.split(/\r?\n/).filter((line) => line.length > 0);
}
