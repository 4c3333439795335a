import { readFile } from "fs/promises";
import { existsSync } from "fs";
import path from "path";
import { parse as parseYaml } from "yaml";

import { NovelConfig } from "../types/index.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export const CONFIG_FILE_NAME = "config.yml";

export const DEFAULT_NOVEL_CONFIG: Readonly<NovelConfig> = Object.freeze({
    title: "Untitled Novel",
    subtitle: "",
    title_background: "",
    creator_name: "",
    theme_color: "#667EEA",
    secondary_color: "#754CA3",
    text_color: "#FFFFFF",
    font_stylesheet_url: "",
    x_url: "",
    vrchat_url: "",
    fediverse_url: "",
    web_url: "",
    booth_url: "",
    favicon_url: "",
    lang: "en"
});

/**
 * Overlays a parsed YAML document on the defaults. Scalars are kept as
 * strings; anything nested is dropped.
 */
export function mergeNovelConfig(parsed: unknown): NovelConfig {
    const merged: NovelConfig = { ...DEFAULT_NOVEL_CONFIG };
    if (parsed === null || parsed === undefined) {
        return merged;
    }
    if (typeof parsed !== "object" || Array.isArray(parsed)) {
        logger.warn(`${CONFIG_FILE_NAME} is not a mapping; using defaults`);
        return merged;
    }

    for (const [key, value] of Object.entries(parsed)) {
        if (value === null || value === undefined) {
            continue;
        }
        if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
            merged[key] = String(value);
        } else {
            logger.warn(`Ignoring non-scalar config key '${key}'`);
        }
    }
    return merged;
}

export class ConfigParser {
    async parseDirectory(inputPath: string): Promise<NovelConfig> {
        const configPath = path.join(inputPath, CONFIG_FILE_NAME);
        if (!existsSync(configPath)) {
            logger.warn(`${configPath} not found; using default configuration`);
            return { ...DEFAULT_NOVEL_CONFIG };
        }

        try {
            const rawContent = await readFile(configPath, "utf-8");
            const config = mergeNovelConfig(parseYaml(rawContent));
            logger.info(`Loaded configuration from ${configPath}`);
            return config;
        } catch (error) {
            logger.warn(`Failed to read ${configPath}: ${errorMessage(error)}; using default configuration`);
            return { ...DEFAULT_NOVEL_CONFIG };
        }
    }
}
