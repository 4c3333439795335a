import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ResolveStage, collectReferences } from "../../src/stages/resolve.js";
import type { BuildConfig, ScenarioRow } from "../../src/types/index.js";
import { AssetResolutionError } from "../../src/utils/errors.js";

function row(sceneId: string, media: Partial<ScenarioRow>): ScenarioRow {
    return {
        sceneId,
        kind: "dialogue",
        speaker: "",
        text: "",
        effect: "",
        background: "",
        portraitLeft: "",
        portraitCenter: "",
        portraitRight: "",
        sound: "",
        music: "",
        ...media
    };
}

const rows = [
    row("1-1", { background: "bg_a.png", portraitRight: "sp_b", portraitLeft: "sp_a", music: "theme" }),
    row("1-2", { background: "bg_a.png", portraitCenter: " sp_c ", sound: "bell" }),
    row("1-3", { background: "bg_b", portraitLeft: "sp_a" })
];

describe("collectReferences", () => {
    it("lists distinct names in first-reference order with the title background last", () => {
        expect(collectReferences(rows, { title_background: "bg_title.png" })).toEqual([
            { root: "backgrounds", name: "bg_a.png" },
            { root: "characters", name: "sp_a" },
            { root: "characters", name: "sp_b" },
            { root: "audio", name: "theme" },
            { root: "characters", name: "sp_c" },
            { root: "audio", name: "bell" },
            { root: "backgrounds", name: "bg_b" },
            { root: "backgrounds", name: "bg_title.png" }
        ]);
    });

    it("does not repeat a title background the rows already use", () => {
        const references = collectReferences(rows, { title_background: "bg_b" });
        expect(references.map((reference) => reference.name)).toEqual([
            "bg_a.png",
            "sp_a",
            "sp_b",
            "theme",
            "sp_c",
            "bell",
            "bg_b"
        ]);
    });
});

describe("ResolveStage", () => {
    let inputPath: string;
    let buildConfig: BuildConfig;

    beforeEach(async () => {
        inputPath = await mkdtemp(path.join(os.tmpdir(), "novelpress-resolve-"));
        const assetsPath = path.join(inputPath, "assets");
        await mkdir(path.join(assetsPath, "backgrounds"), { recursive: true });
        await mkdir(path.join(assetsPath, "characters"), { recursive: true });
        await writeFile(path.join(assetsPath, "backgrounds", "bg_a.png"), Buffer.from([1]));
        await writeFile(path.join(assetsPath, "backgrounds", "bg_b.png"), Buffer.from([2]));
        await writeFile(path.join(assetsPath, "characters", "sp_a.png"), Buffer.from([3]));
        buildConfig = {
            scriptName: "scenario.csv",
            inputPath,
            outputPath: path.join(inputPath, "out"),
            assetsPath,
            strictAssets: false
        };
    });

    afterEach(async () => {
        await rm(inputPath, { recursive: true, force: true });
    });

    it("bundles what it finds and reports the rest", async () => {
        const output = await new ResolveStage().execute(buildConfig, rows, {});

        expect(Object.keys(output.assets)).toEqual(["bg_a.png", "sp_a", "bg_b"]);
        expect(output.assets.sp_a).toEqual({ kind: "image", mimeType: "image/png", dataUri: "data:image/png;base64,Aw==" });
        expect(output.unresolved.map((reference) => reference.name)).toEqual(["sp_b", "theme", "sp_c", "bell"]);
    });

    it("fails in strict mode with every unresolved name", async () => {
        const execution = new ResolveStage().execute({ ...buildConfig, strictAssets: true }, rows, {});

        await expect(execution).rejects.toBeInstanceOf(AssetResolutionError);
        await expect(execution).rejects.toThrow("Unresolved asset references: sp_b, theme, sp_c, bell");
    });
});
