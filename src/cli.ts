#!/usr/bin/env node
import { run } from "./main";

(async () => {
    try {
        process.exitCode = await run(process.argv.slice(2));
    } catch (err: unknown) {
        console.error(err instanceof Error ? err.stack ?? err.message : err);
        process.exitCode = 1;
    }
})();
