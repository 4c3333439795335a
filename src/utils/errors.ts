export type CompileErrorCode = "INGESTION" | "ASSET_UNRESOLVED" | "BUILD_IO";

export class CompileError extends Error {
    constructor(
        readonly code: CompileErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Script missing, or unreadable under every encoding and delimiter tried. */
export class IngestionError extends CompileError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("INGESTION", message, options);
    }
}

/** Raised only in strict mode, listing every unresolved reference. */
export class AssetResolutionError extends CompileError {
    constructor(readonly missing: string[]) {
        super("ASSET_UNRESOLVED", `Unresolved asset references: ${missing.join(", ")}`);
    }
}

export class BuildIOError extends CompileError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("BUILD_IO", message, options);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
