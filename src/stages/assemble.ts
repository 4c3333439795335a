import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import path from "path";

import { PlayerService } from "../services/player.service.js";
import { AssetBundle, BuildConfig, NovelConfig, ScenarioRow } from "../types/index.js";
import { BuildIOError, errorMessage } from "../utils/errors.js";
import { stageLogger } from "../utils/logger.js";
import { templatesPath } from "../utils/project.js";

const log = stageLogger("assemble");

export interface ArtifactTemplates {
    html: string;
    css: string;
    playerScript: string;
}

export interface PlayerBundler {
    bundle(): Promise<string>;
}

export interface AssembleOutput {
    artifactPath: string;
    bytes: number;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

/** Single pass: substituted values are never rescanned for placeholders. */
export function fillTemplate(template: string, values: Record<string, string>): string {
    return template.replace(PLACEHOLDER, (match: string, key: string) => values[key] ?? match);
}

export function escapeHtml(value: string): string {
    return value
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
        .replace(/'/g, "&#39;");
}

/** Keeps a configured value from closing the declaration or the style element. */
export function sanitizeCssValue(value: string): string {
    return value.replace(/[;{}<>"'\\\r\n]/g, "").trim();
}

export function embedJson(value: unknown): string {
    return JSON.stringify(value)
        .replace(/</g, "\\u003c")
        .replace(/\u2028/g, "\\u2028")
        .replace(/\u2029/g, "\\u2029");
}

export function embedScript(script: string): string {
    return script.replace(/<\/(script)/gi, "<\\/$1");
}

function headLinks(config: NovelConfig): string {
    const links: string[] = [];
    if (config.font_stylesheet_url) {
        links.push(`<link href="${escapeHtml(config.font_stylesheet_url)}" rel="stylesheet">`);
    }
    if (config.favicon_url) {
        links.push(`<link rel="icon" href="${escapeHtml(config.favicon_url)}">`);
    }
    return links.join("\n    ");
}

/**
 * Builds the artifact document. Pure: identical inputs give identical
 * output, and assets keep their insertion order.
 */
export function assembleArtifact(
    rows: ScenarioRow[],
    assets: AssetBundle,
    config: NovelConfig,
    templates: ArtifactTemplates
): string {
    const style = fillTemplate(templates.css, {
        theme_color: sanitizeCssValue(config.theme_color ?? ""),
        secondary_color: sanitizeCssValue(config.secondary_color ?? ""),
        text_color: sanitizeCssValue(config.text_color ?? "")
    });

    return fillTemplate(templates.html, {
        lang: escapeHtml(config.lang || "en"),
        title: escapeHtml(config.title ?? ""),
        head_links: headLinks(config),
        style,
        novel_data: embedJson({ rows, assets, config }),
        player_script: embedScript(templates.playerScript)
    });
}

export async function writeArtifact(filePath: string, html: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(tempPath, html, "utf-8");
        await rename(tempPath, filePath);
    } catch (error) {
        await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
            log.warn(`Failed to remove ${tempPath}: ${errorMessage(cleanupError)}`);
        });
        throw new BuildIOError(`Failed to write ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
}

export class AssembleStage {
    private templates?: Promise<ArtifactTemplates>;

    constructor(
        private playerBundler: PlayerBundler = new PlayerService(),
        private templateDir = templatesPath
    ) {}

    loadTemplates(): Promise<ArtifactTemplates> {
        if (!this.templates) {
            this.templates = this.readTemplates().catch((error: unknown) => {
                this.templates = undefined;
                throw error;
            });
        }
        return this.templates;
    }

    async execute(
        buildConfig: BuildConfig,
        rows: ScenarioRow[],
        assets: AssetBundle,
        novelConfig: NovelConfig
    ): Promise<AssembleOutput> {
        const startTime = Date.now();
        const templates = await this.loadTemplates();
        const html = assembleArtifact(rows, assets, novelConfig, templates);

        const artifactName = `${path.parse(buildConfig.scriptName).name}.html`;
        const artifactPath = path.join(buildConfig.outputPath, artifactName);
        await writeArtifact(artifactPath, html);

        const bytes = Buffer.byteLength(html, "utf-8");
        log.info(`Wrote ${artifactPath} (${(bytes / 1024).toFixed(1)} KB) in ${Date.now() - startTime}ms`);
        return { artifactPath, bytes };
    }

    private async readTemplates(): Promise<ArtifactTemplates> {
        try {
            const [html, css] = await Promise.all([
                readFile(path.join(this.templateDir, "artifact.html"), "utf-8"),
                readFile(path.join(this.templateDir, "artifact.css"), "utf-8")
            ]);
            const playerScript = await this.playerBundler.bundle();
            return { html, css, playerScript };
        } catch (error) {
            if (error instanceof BuildIOError) {
                throw error;
            }
            throw new BuildIOError(`Failed to load artifact templates from ${this.templateDir}: ${errorMessage(error)}`, {
                cause: error
            });
        }
    }
}
