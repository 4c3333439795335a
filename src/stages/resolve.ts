import { AssetService } from "../services/asset.service.js";
import {
    AssetBundle,
    AssetReference,
    BuildConfig,
    NovelConfig,
    ResolveOutput,
    ScenarioRow
} from "../types/index.js";
import { AssetResolutionError } from "../utils/errors.js";
import { stageLogger } from "../utils/logger.js";

const log = stageLogger("resolve");

/**
 * Distinct references in first-reference order: per row background, the
 * three portraits left to right, sound, music; the title background last.
 */
export function collectReferences(rows: ScenarioRow[], config: NovelConfig): AssetReference[] {
    const seen = new Set<string>();
    const references: AssetReference[] = [];
    const add = (root: AssetReference["root"], name: string | undefined) => {
        const trimmed = (name ?? "").trim();
        if (!trimmed || seen.has(trimmed)) {
            return;
        }
        seen.add(trimmed);
        references.push({ root, name: trimmed });
    };

    for (const row of rows) {
        add("backgrounds", row.background);
        add("characters", row.portraitLeft);
        add("characters", row.portraitCenter);
        add("characters", row.portraitRight);
        add("audio", row.sound);
        add("audio", row.music);
    }
    add("backgrounds", config.title_background);

    return references;
}

export class ResolveStage {
    async execute(
        buildConfig: BuildConfig,
        rows: ScenarioRow[],
        novelConfig: NovelConfig,
        assetService = new AssetService(buildConfig.assetsPath)
    ): Promise<ResolveOutput> {
        const startTime = Date.now();
        const references = collectReferences(rows, novelConfig);
        log.info(`Resolving ${references.length} distinct asset references under ${buildConfig.assetsPath}`);

        const resolved = await Promise.all(
            references.map((reference) => assetService.resolve(reference.root, reference.name))
        );

        const assets: AssetBundle = {};
        const unresolved: AssetReference[] = [];
        references.forEach((reference, index) => {
            const asset = resolved[index];
            if (!asset) {
                unresolved.push(reference);
                log.warn(`Asset unresolved: '${reference.name}' not found in ${assetService.rootPath(reference.root)}`);
                return;
            }
            assets[reference.name] = {
                kind: asset.kind,
                mimeType: asset.mimeType,
                dataUri: asset.dataUri
            };
        });

        if (buildConfig.strictAssets && unresolved.length > 0) {
            throw new AssetResolutionError(unresolved.map((reference) => reference.name));
        }

        log.info(
            `Resolve stage complete: ${Object.keys(assets).length} encoded, ${unresolved.length} unresolved in ${
                Date.now() - startTime
            }ms`
        );
        return { assets, unresolved };
    }
}
