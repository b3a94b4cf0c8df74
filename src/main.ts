import { collectStatistics } from "./aggregate";
import { ArgumentError, helpText, parseArgs } from "./args";
import { DEFAULT_CONFIG_PATH, loadConfigFile, resolveSettings } from "./config";
import { createLogQuery, GitRunner, runGit } from "./git";
import { renderReport } from "./report";
import { provisionRepositories, ProvisioningError, validateRepositories } from "./repos";
import pkg from "../package.json";

export const EXIT_PROVISIONING = 1;
export const EXIT_ARGUMENTS = 2;

export interface RunDeps {
    env?: NodeJS.ProcessEnv;
    git?: GitRunner;
}

/** Runs one leaderboard batch and resolves to the process exit status. */
export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
    const git = deps.git ?? runGit;

    try {
        const options = parseArgs(argv);
        if (options.help) {
            console.log(helpText(DEFAULT_CONFIG_PATH));
            return 0;
        }
        if (options.version) {
            console.log(`${pkg.name} ${pkg.version}`);
            return 0;
        }

        const file = loadConfigFile(options.config ?? DEFAULT_CONFIG_PATH);
        const settings = resolveSettings(options, file, deps.env);

        const repoPaths = await provisionRepositories(settings.repositories, settings.tmpdir, settings.init, git);
        validateRepositories(repoPaths);

        const records = await collectStatistics(
            {
                repositories: repoPaths,
                wordlist: settings.wordlist,
                range: settings.range,
                onContributor: settings.verbose
                    ? (email, index, total) => console.error(`[${index + 1}/${total}] ${email}`)
                    : undefined,
            },
            createLogQuery(git)
        );

        console.log(renderReport(records, settings.wordlist, settings.top).join("\n"));
        return 0;
    } catch (err: unknown) {
        if (err instanceof ArgumentError) {
            console.error(`[ERR] ${err.message}`);
            console.error("Type --help for help");
            return EXIT_ARGUMENTS;
        }
        if (err instanceof ProvisioningError) {
            console.error(`[ERR] ${err.message}`);
            return EXIT_PROVISIONING;
        }
        throw err;
    }
}
