import { ConfigParser } from "../parsers/config.parser.js";
import { AssembleStage } from "../stages/assemble.js";
import { IngestStage } from "../stages/ingest.js";
import { ResolveStage } from "../stages/resolve.js";
import {
    BuildConfig,
    BuildRequest,
    BuildRunSummary,
    BuildStageSummary,
    BuildStatus
} from "../types/index.js";
import { config, getBuildConfig } from "../utils/config.js";
import { CompileError, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export class BuildInProgressError extends Error {
    constructor() {
        super("A build is already in progress");
        this.name = "BuildInProgressError";
    }
}

export interface BuildServiceOptions {
    paths?: Partial<Pick<BuildConfig, "inputPath" | "outputPath" | "assetsPath">>;
    assembleStage?: AssembleStage;
}

export class BuildService {
    private running = false;
    private currentRun?: {
        request: BuildRequest;
        startedAt: string;
    };
    private lastRun?: BuildRunSummary;

    private readonly configParser = new ConfigParser();
    private readonly ingestStage = new IngestStage();
    private readonly resolveStage = new ResolveStage();
    private readonly assembleStage: AssembleStage;

    constructor(private options: BuildServiceOptions = {}) {
        this.assembleStage = options.assembleStage ?? new AssembleStage();
    }

    /** Directory scripts are compiled from. */
    get inputPath(): string {
        return this.options.paths?.inputPath ?? config.inputPath;
    }

    /**
     * compile(script) -> artifact path. Never throws: failures are reported
     * through `success`, `error` and `errorCode` on the summary.
     */
    async compile(request: BuildRequest): Promise<BuildRunSummary> {
        const startedAt = new Date().toISOString();
        const summary: BuildRunSummary = {
            request,
            startedAt,
            finishedAt: "",
            success: true,
            stages: []
        };

        try {
            const buildConfig = getBuildConfig(request.script, {
                ...this.options.paths,
                ...(request.strict === undefined ? {} : { strictAssets: request.strict })
            });
            logger.info(
                `Compiling ${buildConfig.scriptName} (input: ${buildConfig.inputPath}, output: ${buildConfig.outputPath}, strict: ${buildConfig.strictAssets})`
            );

            let stageStart = Date.now();
            const ingested = await this.ingestStage.execute(buildConfig);
            summary.stages.push(
                this.createStageSummary("ingest", stageStart, ingested.rows.length, {
                    encoding: ingested.metadata.encoding,
                    delimiter: ingested.metadata.delimiter === "\t" ? "tab" : "comma"
                })
            );

            const novelConfig = await this.configParser.parseDirectory(buildConfig.inputPath);

            stageStart = Date.now();
            const resolved = await this.resolveStage.execute(buildConfig, ingested.rows, novelConfig);
            summary.stages.push(
                this.createStageSummary("resolve", stageStart, Object.keys(resolved.assets).length, {
                    unresolved: resolved.unresolved.map((reference) => reference.name)
                })
            );

            stageStart = Date.now();
            const assembled = await this.assembleStage.execute(
                buildConfig,
                ingested.rows,
                resolved.assets,
                novelConfig
            );
            summary.stages.push(
                this.createStageSummary("assemble", stageStart, 1, {
                    bytes: assembled.bytes
                })
            );

            summary.artifactPath = assembled.artifactPath;
            summary.finishedAt = new Date().toISOString();
            logger.info(
                `Build complete: ${assembled.artifactPath} in ${
                    new Date(summary.finishedAt).getTime() - new Date(summary.startedAt).getTime()
                }ms`
            );
            return summary;
        } catch (error) {
            summary.success = false;
            summary.error = errorMessage(error);
            if (error instanceof CompileError) {
                summary.errorCode = error.code;
            }
            summary.finishedAt = new Date().toISOString();
            logger.error(`Build failed: ${summary.error}`);
            return summary;
        }
    }

    /** Serialises builds triggered from the HTTP API. */
    async runBuild(request: BuildRequest): Promise<BuildRunSummary> {
        if (this.running) {
            throw new BuildInProgressError();
        }

        this.running = true;
        this.currentRun = {
            request,
            startedAt: new Date().toISOString()
        };
        logger.info(`Build queued: script=${request.script}, strict=${request.strict ?? "default"}`);

        try {
            const summary = await this.compile(request);
            this.lastRun = summary;
            return summary;
        } finally {
            this.running = false;
            this.currentRun = undefined;
        }
    }

    getStatus(): BuildStatus {
        return {
            running: this.running,
            current: this.currentRun,
            lastRun: this.lastRun
        };
    }

    private createStageSummary(
        stage: BuildStageSummary["stage"],
        startedAt: number,
        itemsProcessed: number,
        metadata?: Record<string, unknown>
    ): BuildStageSummary {
        return {
            stage,
            durationMs: Date.now() - startedAt,
            itemsProcessed,
            metadata
        };
    }
}
