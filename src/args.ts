import * as fs from "fs";
import { DEFAULT_TOP } from "./report";

export class ArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ArgumentError";
    }
}

export interface CliOptions {
    config?: string;
    tmpdir?: string;
    from?: string;
    until?: string;
    top?: number;
    init: boolean;
    help: boolean;
    version: boolean;
    verbose: boolean;
}

type ValueOption = "config" | "tmpdir" | "from" | "until" | "top";
type SwitchOption = "init" | "help" | "version" | "verbose";

type OptionSpec = { long: ValueOption; short?: string; value: true } | { long: SwitchOption; short?: string; value: false };

const OPTION_SPECS: OptionSpec[] = [
    { long: "config", short: "c", value: true },
    { long: "tmpdir", short: "t", value: true },
    { long: "from", short: "f", value: true },
    { long: "until", short: "u", value: true },
    { long: "top", short: "n", value: true },
    { long: "init", short: "i", value: false },
    { long: "help", short: "h", value: false },
    { long: "version", short: "v", value: false },
    { long: "verbose", value: false },
];

export function isIsoDate(value: string): boolean {
    return /^\d{4}-\d{2}-\d{2}$/.test(value) && Number.isFinite(Date.parse(value));
}

export function parseTop(value: string, source: string): number {
    const top = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(top) || top <= 0) {
        throw new ArgumentError(`${source} must be a positive integer: ${value}`);
    }
    return top;
}

function findSpec(flag: string): OptionSpec {
    const spec = flag.startsWith("--")
        ? OPTION_SPECS.find((s) => s.long === flag.slice(2))
        : OPTION_SPECS.find((s) => s.short !== undefined && s.short === flag.slice(1));
    if (!spec) throw new ArgumentError(`option ${flag} not recognized`);
    return spec;
}

function applyValue(options: CliOptions, name: ValueOption, flag: string, value: string): void {
    switch (name) {
        case "config":
            if (!fs.existsSync(value) || !fs.statSync(value).isFile()) {
                throw new ArgumentError(`${flag} specified config does not exist: ${value}`);
            }
            options.config = value;
            break;
        case "tmpdir":
            if (!fs.existsSync(value) || !fs.statSync(value).isDirectory()) {
                throw new ArgumentError(`${flag} specified directory does not exist: ${value}`);
            }
            options.tmpdir = value;
            break;
        case "from":
        case "until":
            if (!isIsoDate(value)) throw new ArgumentError(`${flag} expects a date as YYYY-MM-DD: ${value}`);
            options[name] = value;
            break;
        case "top":
            options.top = parseTop(value, flag);
            break;
    }
}

/**
 * getopt-style parsing: `-c path`, `-cpath`, `-iv`, `--config path` and
 * `--config=path` are all accepted. `argv` excludes the node binary and script.
 */
export function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = { init: false, help: false, version: false, verbose: false };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i] as string;

        if (arg.startsWith("--")) {
            const eq = arg.indexOf("=");
            const flag = eq === -1 ? arg : arg.slice(0, eq);
            const spec = findSpec(flag);
            if (spec.value) {
                const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
                if (value === undefined) throw new ArgumentError(`option ${flag} requires argument`);
                applyValue(options, spec.long, flag, value);
            } else {
                if (eq !== -1) throw new ArgumentError(`option ${flag} must not have an argument`);
                options[spec.long] = true;
            }
            continue;
        }

        if (arg.startsWith("-") && arg.length > 1) {
            for (let j = 1; j < arg.length; j++) {
                const flag = `-${arg[j]}`;
                const spec = findSpec(flag);
                if (!spec.value) {
                    options[spec.long] = true;
                    continue;
                }
                const value = j + 1 < arg.length ? arg.slice(j + 1) : argv[++i];
                if (value === undefined) throw new ArgumentError(`option ${flag} requires argument`);
                applyValue(options, spec.long, flag, value);
                break;
            }
            continue;
        }

        throw new ArgumentError(`unexpected argument: ${arg}`);
    }

    return options;
}

export function helpText(defaultConfigPath: string): string {
    return [
        "Usage: repo-leaderboard [options]",
        "",
        "Ranks the contributors of the configured git repositories by commits,",
        "changed files, added and deleted lines, and keywords in commit messages.",
        "",
        "Options:",
        `  -c, --config <path>   YAML configuration file (default: ${defaultConfigPath})`,
        "  -t, --tmpdir <path>   Directory holding the local clones (overrides config)",
        "  -i, --init            Clone missing repositories and fetch existing ones",
        "  -f, --from <date>     Only count commits after YYYY-MM-DD (env: FROM)",
        "  -u, --until <date>    Only count commits before YYYY-MM-DD (env: UNTIL)",
        `  -n, --top <N>         Rows per leaderboard (env: TOP, default: ${DEFAULT_TOP})`,
        "      --verbose         Report progress on stderr",
        "  -h, --help            Show this help",
        "  -v, --version         Show the version",
        "",
    ].join("\n");
}
