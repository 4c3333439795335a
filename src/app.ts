import express from "express";
import { existsSync } from "fs";
import path from "path";

import { BuildInProgressError, BuildService } from "./services/build.service.js";
import { BuildRequest } from "./types/index.js";
import { DEFAULT_SCRIPT, isValidScriptName } from "./utils/args.js";
import { errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

function readBuildBody(body: unknown): { script: string; strict?: boolean } {
    if (typeof body !== "object" || body === null) {
        return { script: DEFAULT_SCRIPT };
    }
    const script = "csv" in body && typeof body.csv === "string" ? body.csv : DEFAULT_SCRIPT;
    const strict = "strict" in body && typeof body.strict === "boolean" ? body.strict : undefined;
    return { script, strict };
}

export function createApp(buildService: BuildService): express.Express {
    const app = express();

    app.use(express.json({ limit: "64kb" }));

    app.get("/status", (_req, res) => {
        res.json(buildService.getStatus());
    });

    app.post("/build", async (req, res, next) => {
        try {
            const { script, strict } = readBuildBody(req.body);

            if (!isValidScriptName(script)) {
                return res.status(400).json({
                    success: false,
                    error: `Invalid script name '${script}'. Expected a .csv, .tsv or .txt file name.`
                });
            }

            if (!existsSync(path.join(buildService.inputPath, script))) {
                return res.status(404).json({
                    success: false,
                    error: `Script '${script}' not found`
                });
            }

            const request: BuildRequest = strict === undefined ? { script } : { script, strict };

            const summary = await buildService.runBuild(request).catch((error: unknown) => {
                if (error instanceof BuildInProgressError) {
                    return undefined;
                }
                throw error;
            });
            if (!summary) {
                return res.status(409).json({
                    success: false,
                    error: new BuildInProgressError().message
                });
            }

            if (!summary.success) {
                return res.status(500).json({
                    success: false,
                    error: summary.error,
                    code: summary.errorCode,
                    summary
                });
            }

            res.json({
                success: true,
                artifactPath: summary.artifactPath,
                summary
            });
        } catch (error) {
            next(error);
        }
    });

    app.use(
        (
            err: unknown,
            _req: express.Request,
            res: express.Response,
            _next: express.NextFunction
        ) => {
            logger.error(`Unhandled error: ${errorMessage(err)}`);
            res.status(500).json({
                success: false,
                error: errorMessage(err)
            });
        }
    );

    return app;
}
