import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GitError, GitRunner } from "../src/git";
import {
    isRepository,
    provisionRepositories,
    provisionRepository,
    ProvisioningError,
    repoNameFromUrl,
    validateRepositories,
} from "../src/repos";

describe("repoNameFromUrl", () => {
    it.each([
        ["https://example.com/team/app.git", "app"],
        ["git@example.com:team/my_lib.v2.git", "my_lib.v2"],
        ["ssh://git@example.com/team/Web-Site.GIT", "Web-Site"],
    ])("derives the name of %s", (url, name) => {
        expect(repoNameFromUrl(url)).toBe(name);
    });

    it("rejects URLs without a .git suffix", () => {
        expect(() => repoNameFromUrl("https://example.com/team/app")).toThrow(ProvisioningError);
    });
});

describe("provisioning", () => {
    let tmpdir: string;
    let calls: { args: string[]; cwd?: string }[];
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const recordingRunner: GitRunner = async (args, options = {}) => {
        calls.push({ args, cwd: options.cwd });
        return "";
    };

    beforeEach(() => {
        tmpdir = fs.mkdtempSync(path.join(os.tmpdir(), "leaderboard-repos-"));
        calls = [];
        logSpy.mockClear();
    });

    afterEach(() => {
        fs.rmSync(tmpdir, { recursive: true, force: true });
    });

    it("only computes the path without --init", async () => {
        const repoPath = await provisionRepository("https://example.com/team/app.git", tmpdir, false, recordingRunner);
        expect(repoPath).toBe(path.join(tmpdir, "app"));
        expect(calls).toEqual([]);
    });

    it("clones a missing repository", async () => {
        const url = "https://example.com/team/app.git";
        const repoPath = await provisionRepository(url, tmpdir, true, recordingRunner);

        expect(calls).toEqual([{ args: ["clone", url, repoPath], cwd: undefined }]);
        expect(logSpy).toHaveBeenCalledWith(`Cloning : ${repoPath}`);
    });

    it("fetches a repository that is already there", async () => {
        const repoPath = path.join(tmpdir, "app");
        fs.mkdirSync(path.join(repoPath, ".git"), { recursive: true });

        await provisionRepository("https://example.com/team/app.git", tmpdir, true, recordingRunner);

        expect(calls).toEqual([{ args: ["fetch", "origin"], cwd: repoPath }]);
        expect(logSpy).toHaveBeenCalledWith(`Updating: ${repoPath}`);
    });

    it("turns a failed clone into a provisioning error", async () => {
        const failing: GitRunner = async () => {
            throw new GitError("git command failed: repository not found");
        };
        await expect(provisionRepository("https://example.com/team/app.git", tmpdir, true, failing)).rejects.toThrow(
            "Cannot provision https://example.com/team/app.git: git command failed: repository not found"
        );
    });

    it("keeps the order of the configured repositories", async () => {
        const paths = await provisionRepositories(
            ["https://example.com/team/web.git", "https://example.com/team/api.git"],
            tmpdir,
            false,
            recordingRunner
        );
        expect(paths).toEqual([path.join(tmpdir, "web"), path.join(tmpdir, "api")]);
    });

    it("accepts directories holding a .git directory", () => {
        const repoPath = path.join(tmpdir, "app");
        expect(isRepository(repoPath)).toBe(false);

        fs.mkdirSync(path.join(repoPath, ".git"), { recursive: true });
        expect(isRepository(repoPath)).toBe(true);
        expect(() => validateRepositories([repoPath])).not.toThrow();
    });

    it("accepts a worktree whose .git is a file", async () => {
        const repoPath = path.join(tmpdir, "app");
        fs.mkdirSync(repoPath, { recursive: true });
        fs.writeFileSync(path.join(repoPath, ".git"), "gitdir: /srv/main/.git/worktrees/app\n", "utf8");

        expect(isRepository(repoPath)).toBe(true);
        expect(() => validateRepositories([repoPath])).not.toThrow();

        await provisionRepository("https://example.com/team/app.git", tmpdir, true, recordingRunner);
        expect(calls).toEqual([{ args: ["fetch", "origin"], cwd: repoPath }]);
    });

    it("fails validation for the first missing repository", () => {
        const missing = path.join(tmpdir, "missing");
        expect(() => validateRepositories([missing])).toThrow(
            `Repo does not yet exist: ${missing}\nRun with --init first, see --help`
        );
    });
});
