#!/usr/bin/env node
import { BuildService } from "./services/build.service.js";
import { parseCompileArgs } from "./utils/args.js";
import { errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

try {
    const request = parseCompileArgs(process.argv.slice(2));
    const summary = await new BuildService().compile(request);
    if (!summary.success) {
        process.exitCode = 1;
    } else {
        logger.info(`Open ${summary.artifactPath} in a browser to play.`);
    }
} catch (error) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
}
