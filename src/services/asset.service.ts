import { readFile, stat } from "fs/promises";
import path from "path";
import { glob, escape } from "glob";

import { AssetRoot, MediaKind, ResolvedAsset } from "../types/index.js";
import { errorMessage } from "../utils/errors.js";
import { stageLogger } from "../utils/logger.js";
import { resolveInside } from "../utils/project.js";

const log = stageLogger("resolve");

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".gif", ".webp"];
export const AUDIO_EXTENSIONS = [".mp3", ".ogg", ".wav", ".m4a"];

const MIME_TYPES: Record<string, string> = {
    ".png": "image/png",
    ".jpg": "image/jpeg",
    ".jpeg": "image/jpeg",
    ".gif": "image/gif",
    ".webp": "image/webp",
    ".mp3": "audio/mpeg",
    ".ogg": "audio/ogg",
    ".wav": "audio/wav",
    ".m4a": "audio/mp4"
};

const ROOT_MEDIA: Record<AssetRoot, { kind: MediaKind; defaultExtension: string; extensions: string[] }> = {
    backgrounds: { kind: "image", defaultExtension: ".png", extensions: IMAGE_EXTENSIONS },
    characters: { kind: "image", defaultExtension: ".png", extensions: IMAGE_EXTENSIONS },
    audio: { kind: "audio", defaultExtension: ".mp3", extensions: AUDIO_EXTENSIONS }
};

export function mimeTypeFor(filePath: string, root: AssetRoot): string {
    const media = ROOT_MEDIA[root];
    return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? MIME_TYPES[media.defaultExtension] ?? "application/octet-stream";
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await stat(filePath)).isFile();
    } catch {
        return false;
    }
}

/**
 * Looks media references up under `<assetsPath>/<root>` and encodes hits as
 * data URIs. Lookups are memoised per (root, name) for the lifetime of the
 * service, which is one compile.
 */
export class AssetService {
    private cache = new Map<string, Promise<ResolvedAsset | undefined>>();

    constructor(private assetsPath: string) {}

    rootPath(root: AssetRoot): string {
        return path.join(this.assetsPath, root);
    }

    resolve(root: AssetRoot, name: string): Promise<ResolvedAsset | undefined> {
        const key = `${root}:${name}`;
        let pending = this.cache.get(key);
        if (!pending) {
            pending = this.lookup(root, name);
            this.cache.set(key, pending);
        }
        return pending;
    }

    /** Exact name, then `<name>.<default ext>`, then the bare stem, then any known extension. */
    async locate(root: AssetRoot, name: string): Promise<string | undefined> {
        if (!name) {
            return undefined;
        }

        const rootDir = this.rootPath(root);
        const media = ROOT_MEDIA[root];
        const extension = path.extname(name);
        const stem = extension ? name.slice(0, -extension.length) : name;
        const candidates = extension ? [name, stem] : [`${name}${media.defaultExtension}`, stem];

        for (const candidate of candidates) {
            const candidatePath = resolveInside(rootDir, candidate);
            if (!candidatePath) {
                log.warn(`Asset name '${name}' escapes ${rootDir}`);
                return undefined;
            }
            if (await isFile(candidatePath)) {
                return candidatePath;
            }
        }

        const matches = await glob(`${escape(stem)}.*`, {
            cwd: rootDir,
            nodir: true,
            nocase: true,
            posix: true
        });
        matches.sort();
        for (const known of media.extensions) {
            const match = matches.find((candidate) => path.extname(candidate).toLowerCase() === known);
            if (match) {
                return path.join(rootDir, match);
            }
        }
        return undefined;
    }

    private async lookup(root: AssetRoot, name: string): Promise<ResolvedAsset | undefined> {
        const filePath = await this.locate(root, name);
        if (!filePath) {
            return undefined;
        }

        try {
            const encoded = (await readFile(filePath)).toString("base64");
            const mimeType = mimeTypeFor(filePath, root);
            return {
                name,
                path: filePath,
                kind: ROOT_MEDIA[root].kind,
                mimeType,
                dataUri: `data:${mimeType};base64,${encoded}`
            };
        } catch (error) {
            log.warn(`Failed to encode ${filePath}: ${errorMessage(error)}`);
            return undefined;
        }
    }
}
