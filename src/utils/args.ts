import { BuildRequest } from "../types/index.js";

export const DEFAULT_SCRIPT = "scenario.csv";

export function parseCompileArgs(argv: string[]): BuildRequest {
    let script: string | undefined;
    let strict: boolean | undefined;

    for (const arg of argv) {
        if (arg === "--strict") {
            strict = true;
        } else if (arg === "--lenient") {
            strict = false;
        } else if (arg.startsWith("--")) {
            throw new Error(`Unknown option '${arg}'. Usage: novelpress [script.csv] [--strict|--lenient]`);
        } else if (script === undefined) {
            script = arg;
        } else {
            throw new Error(`Unexpected argument '${arg}': only one script can be compiled at a time`);
        }
    }

    return strict === undefined ? { script: script ?? DEFAULT_SCRIPT } : { script: script ?? DEFAULT_SCRIPT, strict };
}

/** Script names from the HTTP API: a bare file name with a table extension. */
export function isValidScriptName(name: string): boolean {
    return /^[^/\\]+\.(csv|tsv|txt)$/i.test(name) && !name.startsWith(".");
}
