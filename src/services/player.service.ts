import { build } from "esbuild";

import { BuildIOError, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { playerEntryPath } from "../utils/project.js";

/**
 * Bundles the browser runtime into one IIFE that the assembler inlines.
 * The bundle only depends on the source tree, so it is built once per
 * process.
 */
export class PlayerService {
    private bundlePromise?: Promise<string>;

    constructor(private entryPath: string = playerEntryPath) {}

    bundle(): Promise<string> {
        if (!this.bundlePromise) {
            this.bundlePromise = this.buildBundle().catch((error: unknown) => {
                this.bundlePromise = undefined;
                throw error;
            });
        }
        return this.bundlePromise;
    }

    private async buildBundle(): Promise<string> {
        const startTime = Date.now();
        try {
            const result = await build({
                entryPoints: [this.entryPath],
                bundle: true,
                write: false,
                format: "iife",
                platform: "browser",
                target: "es2019",
                minify: true,
                legalComments: "none",
                logLevel: "silent"
            });
            const output = result.outputFiles[0];
            if (!output) {
                throw new Error("esbuild produced no output");
            }
            logger.info(`Bundled playback runtime (${(output.text.length / 1024).toFixed(1)} KB) in ${Date.now() - startTime}ms`);
            return output.text;
        } catch (error) {
            throw new BuildIOError(`Failed to bundle the playback runtime from ${this.entryPath}: ${errorMessage(error)}`, {
                cause: error
            });
        }
    }
}
