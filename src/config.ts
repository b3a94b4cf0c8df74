import dotenv from "dotenv";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ArgumentError, CliOptions, isIsoDate, parseTop } from "./args";
import { DateRange } from "./contributor-data";
import { DEFAULT_TOP } from "./report";

dotenv.config();

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".config", "repo-leaderboard", "conf.yml");

// YAML reads `- 404` as a number; keywords and URLs are strings either way.
const Text = z.union([z.string(), z.number()]).transform(String);

export const ConfigFileSchema = z
    .object({
        tmpdir: z.string().min(1).nullish(),
        wordlist: z.array(Text).nullish(),
        repositories: z.array(Text).nullish(),
    })
    .passthrough();

export interface ConfigFile {
    tmpdir: string;
    wordlist: string[];
    repositories: string[];
}

export interface Settings extends ConfigFile {
    range: DateRange;
    top: number;
    init: boolean;
    verbose: boolean;
}

export function defaultConfig(): ConfigFile {
    return { tmpdir: os.tmpdir() || "/tmp", wordlist: [], repositories: [] };
}

function unique(list: string[]): string[] {
    return [...new Set(list)];
}

/**
 * Reads the YAML configuration. A missing file means defaults; an unreadable
 * or invalid one is reported on stderr and also falls back to defaults.
 */
export function loadConfigFile(filePath: string): ConfigFile {
    const defaults = defaultConfig();
    if (!fs.existsSync(filePath)) return defaults;

    let raw: unknown;
    try {
        raw = parseYaml(fs.readFileSync(filePath, "utf8"));
    } catch (e: unknown) {
        console.error(`[ERR] Cannot read yaml file: ${filePath}`);
        console.error(e instanceof Error ? e.message : String(e));
        return defaults;
    }
    if (raw === null || raw === undefined) return defaults;

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
        console.error(`[ERR] Invalid configuration in ${filePath}`);
        for (const issue of parsed.error.issues) {
            console.error(`- ${issue.path.join(".") || "(root)"}: ${issue.message}`);
        }
        return defaults;
    }

    return {
        tmpdir: parsed.data.tmpdir ?? defaults.tmpdir,
        wordlist: unique(parsed.data.wordlist ?? []),
        repositories: unique(parsed.data.repositories ?? []),
    };
}

/** Command-line flags win over FROM / UNTIL / TOP from the environment (or .env). */
export function resolveSettings(
    options: CliOptions,
    file: ConfigFile,
    env: NodeJS.ProcessEnv = process.env
): Settings {
    const errors: string[] = [];

    const since = options.from ?? (env.FROM?.trim() || undefined);
    const until = options.until ?? (env.UNTIL?.trim() || undefined);
    if (since !== undefined && !isIsoDate(since)) errors.push(`FROM must be a date as YYYY-MM-DD: ${since}`);
    if (until !== undefined && !isIsoDate(until)) errors.push(`UNTIL must be a date as YYYY-MM-DD: ${until}`);

    let top = options.top ?? DEFAULT_TOP;
    const topEnv = env.TOP?.trim();
    if (options.top === undefined && topEnv) {
        try {
            top = parseTop(topEnv, "TOP");
        } catch (e: unknown) {
            if (!(e instanceof ArgumentError)) throw e;
            errors.push(e.message);
        }
    }

    if (errors.length) {
        throw new ArgumentError(`Invalid configuration:\n- ${errors.join("\n- ")}`);
    }

    return {
        tmpdir: options.tmpdir ?? file.tmpdir,
        wordlist: file.wordlist,
        repositories: file.repositories,
        range: { since, until },
        top,
        init: options.init,
        verbose: options.verbose,
    };
}
