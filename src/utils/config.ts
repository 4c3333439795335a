import dotenv from "dotenv";
import path from "node:path";

import { BuildConfig } from "../types/index.js";

dotenv.config();

const parseBoolean = (value: string | undefined): boolean =>
    ["1", "true", "yes", "on"].includes((value ?? "").trim().toLowerCase());

export const config = {
    inputPath: path.resolve(process.env.INPUT_DIR || "input"),
    outputPath: path.resolve(process.env.OUTPUT_DIR || "output"),
    strictAssets: parseBoolean(process.env.STRICT_ASSETS),
    server: {
        port: Number(process.env.NOVELPRESS_PORT || 4100)
    }
};

export function getBuildConfig(
    scriptName: string,
    overrides: Partial<Omit<BuildConfig, "scriptName">> = {}
): BuildConfig {
    const inputPath = overrides.inputPath ?? config.inputPath;
    return {
        scriptName,
        inputPath,
        outputPath: overrides.outputPath ?? config.outputPath,
        assetsPath: overrides.assetsPath ?? path.join(inputPath, "assets"),
        strictAssets: overrides.strictAssets ?? config.strictAssets
    };
}
