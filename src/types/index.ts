import type { CompileErrorCode } from "../utils/errors.js";
import type { AssetBundle, AssetEntry, MediaKind, NovelConfig, ScenarioRow } from "../player/types.js";

export type { AssetBundle, AssetEntry, MediaKind, NovelConfig, ScenarioRow };

export interface BuildConfig {
    scriptName: string;
    inputPath: string;
    outputPath: string;
    assetsPath: string;
    strictAssets: boolean;
}

export type Delimiter = "," | "\t";

export interface IngestOutput {
    rows: ScenarioRow[];
    metadata: {
        source: string;
        encoding: string;
        delimiter: Delimiter;
    };
}

export type AssetRoot = "backgrounds" | "characters" | "audio";

export interface AssetReference {
    root: AssetRoot;
    name: string;
}

export interface ResolvedAsset extends AssetEntry {
    name: string;
    path: string;
}

export interface ResolveOutput {
    assets: AssetBundle;
    unresolved: AssetReference[];
}

export interface BuildRequest {
    script: string;
    strict?: boolean;
}

export type BuildStage = "ingest" | "resolve" | "assemble";

export interface BuildStageSummary {
    stage: BuildStage;
    durationMs: number;
    itemsProcessed: number;
    metadata?: Record<string, unknown>;
}

export interface BuildRunSummary {
    request: BuildRequest;
    startedAt: string;
    finishedAt: string;
    success: boolean;
    stages: BuildStageSummary[];
    artifactPath?: string;
    error?: string;
    errorCode?: CompileErrorCode;
}

export interface BuildStatus {
    running: boolean;
    current?: {
        request: BuildRequest;
        startedAt: string;
    };
    lastRun?: BuildRunSummary;
}
