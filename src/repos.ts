import * as fs from "fs";
import * as path from "path";
import { GitError, GitRunner, runGit } from "./git";

export class ProvisioningError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ProvisioningError";
    }
}

const REPO_NAME_PATTERN = /^.+?\/([-_a-zA-Z0-9.]+)(\.git)$/i;

export function repoNameFromUrl(url: string): string {
    const name = REPO_NAME_PATTERN.exec(url)?.[1];
    if (!name) throw new ProvisioningError(`Cannot derive repository name from URL: ${url}`);
    return name;
}

/**
 * A working copy has a .git entry at its top: a directory, or a file pointing
 * elsewhere for worktrees and submodules. Parent repositories do not count.
 */
export function isRepository(repoPath: string): boolean {
    return fs.existsSync(path.join(repoPath, ".git"));
}

/**
 * Maps a remote URL to `<tmpdir>/<name>`. With `init` the working copy is
 * cloned when missing and fetched when present; without it nothing touches
 * the network.
 */
export async function provisionRepository(
    url: string,
    tmpdir: string,
    init: boolean,
    run: GitRunner = runGit
): Promise<string> {
    const repoPath = path.join(tmpdir, repoNameFromUrl(url));
    if (!init) return repoPath;

    try {
        if (isRepository(repoPath)) {
            console.log(`Updating: ${repoPath}`);
            await run(["fetch", "origin"], { cwd: repoPath });
        } else {
            console.log(`Cloning : ${repoPath}`);
            await run(["clone", url, repoPath]);
        }
    } catch (err: unknown) {
        if (err instanceof GitError) throw new ProvisioningError(`Cannot provision ${url}: ${err.message}`);
        throw err;
    }
    return repoPath;
}

export async function provisionRepositories(
    urls: string[],
    tmpdir: string,
    init: boolean,
    run: GitRunner = runGit
): Promise<string[]> {
    const paths: string[] = [];
    for (const url of urls) {
        paths.push(await provisionRepository(url, tmpdir, init, run));
    }
    return paths;
}

export function validateRepositories(repoPaths: string[]): void {
    for (const repoPath of repoPaths) {
        if (!isRepository(repoPath)) {
            throw new ProvisioningError(`Repo does not yet exist: ${repoPath}\nRun with --init first, see --help`);
        }
    }
}
