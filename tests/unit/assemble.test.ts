import { mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
    AssembleStage,
    assembleArtifact,
    embedJson,
    embedScript,
    escapeHtml,
    fillTemplate,
    sanitizeCssValue,
    writeArtifact,
    type ArtifactTemplates
} from "../../src/stages/assemble.js";
import type { ScenarioRow } from "../../src/types/index.js";
import { BuildIOError } from "../../src/utils/errors.js";

const templates: ArtifactTemplates = {
    html: "<html lang=\"{{lang}}\"><title>{{title}}</title>{{head_links}}<style>{{style}}</style>" +
        "<script type=\"application/json\">{{novel_data}}</script><script>{{player_script}}</script></html>",
    css: ":root { --theme: {{theme_color}}; --secondary: {{secondary_color}}; --text: {{text_color}}; }",
    playerScript: "boot()"
};

const rows: ScenarioRow[] = [
    {
        sceneId: "1-1",
        kind: "dialogue",
        speaker: "Mina",
        text: "</script><b>hi</b>",
        effect: "",
        background: "bg",
        portraitLeft: "",
        portraitCenter: "",
        portraitRight: "",
        sound: "",
        music: ""
    }
];

describe("template helpers", () => {
    it("substitutes known placeholders in one pass", () => {
        expect(fillTemplate("{{a}} {{b}} {{missing}}", { a: "{{b}}", b: "2" })).toBe("{{b}} 2 {{missing}}");
    });

    it("escapes HTML metacharacters", () => {
        expect(escapeHtml(`<a href="x">Tom & 'Jo'</a>`)).toBe(
            "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jo&#39;&lt;/a&gt;"
        );
    });

    it("strips characters that could leave a CSS declaration", () => {
        expect(sanitizeCssValue(" #fff; } body { color: red ")).toBe("#fff  body  color: red");
        expect(sanitizeCssValue("</style>")).toBe("/style");
    });

    it("keeps embedded JSON inert inside a script element", () => {
        expect(embedJson({ text: "</script>\u2028" })).toBe('{"text":"\\u003c/script>\\u2028"}');
        expect(JSON.parse(embedJson({ text: "</script>\u2028" }))).toEqual({ text: "</script>\u2028" });
    });

    it("breaks closing script tags in the player code", () => {
        expect(embedScript('a("</SCRIPT>")')).toBe('a("<\\/SCRIPT>")');
        expect(embedScript('const s = "</script>"; const t = "</Script";')).toBe(
            'const s = "<\\/script>"; const t = "<\\/Script";'
        );
    });
});

describe("assembleArtifact", () => {
    const config = {
        title: "Tom & Jo",
        theme_color: "#123456",
        secondary_color: "red;}",
        text_color: "#fff",
        favicon_url: "icon.png"
    };

    it("fills the document from rows, assets and config", () => {
        const assets = { bg: { kind: "image" as const, mimeType: "image/png", dataUri: "data:image/png;base64,AA==" } };
        const html = assembleArtifact(rows, assets, config, templates);

        expect(html).toBe(
            "<html lang=\"en\"><title>Tom &amp; Jo</title><link rel=\"icon\" href=\"icon.png\">" +
                "<style>:root { --theme: #123456; --secondary: red; --text: #fff; }</style>" +
                "<script type=\"application/json\">" +
                embedJson({ rows, assets, config }) +
                "</script><script>boot()</script></html>"
        );
        expect(html).not.toContain("</script><b>");
    });

    it("is deterministic", () => {
        expect(assembleArtifact(rows, {}, config, templates)).toBe(assembleArtifact(rows, {}, config, templates));
    });
});

describe("writing the artifact", () => {
    let outputDir: string;

    beforeEach(async () => {
        outputDir = await mkdtemp(path.join(os.tmpdir(), "novelpress-assemble-"));
    });

    afterEach(async () => {
        await rm(outputDir, { recursive: true, force: true });
    });

    it("creates missing directories and leaves no temp file", async () => {
        const target = path.join(outputDir, "nested", "story.html");
        await writeArtifact(target, "<html></html>");

        expect(await readFile(target, "utf-8")).toBe("<html></html>");
        expect(await readdir(path.dirname(target))).toEqual(["story.html"]);
    });

    it("wraps filesystem failures in BuildIOError", async () => {
        const blocker = path.join(outputDir, "blocker");
        await writeFile(blocker, "not a directory");

        await expect(writeArtifact(path.join(blocker, "story.html"), "x")).rejects.toBeInstanceOf(BuildIOError);
    });

    it("names the artifact after the script", async () => {
        const stage = new AssembleStage({ bundle: async () => "boot()" });
        const output = await stage.execute(
            {
                scriptName: "chapter_one.csv",
                inputPath: outputDir,
                outputPath: outputDir,
                assetsPath: outputDir,
                strictAssets: false
            },
            rows,
            {},
            { title: "Story" }
        );

        expect(output.artifactPath).toBe(path.join(outputDir, "chapter_one.html"));
        const html = await readFile(output.artifactPath, "utf-8");
        expect(output.bytes).toBe(Buffer.byteLength(html, "utf-8"));
        expect(html).toContain("<title>Story</title>");
        expect(html).toContain('<script type="application/json" id="novel-data">');
    });

    it("reports a failing player bundle as BuildIOError", async () => {
        const stage = new AssembleStage({
            bundle: async () => {
                throw new Error("bundle exploded");
            }
        });

        await expect(stage.loadTemplates()).rejects.toThrow(/bundle exploded/);
        await expect(stage.loadTemplates()).rejects.toBeInstanceOf(BuildIOError);
    });
});
