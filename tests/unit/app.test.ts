import { once } from "events";
import { copyFile, mkdir, mkdtemp, rm } from "fs/promises";
import type { Server } from "http";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createApp } from "../../src/app.js";
import { BuildService } from "../../src/services/build.service.js";
import { AssembleStage, type PlayerBundler } from "../../src/stages/assemble.js";

const SAMPLE = fileURLToPath(new URL("../fixtures/sample_scenario.csv", import.meta.url));

describe("build API", () => {
    let workDir: string;
    let inputPath: string;
    let outputPath: string;
    let server: Server | undefined;

    async function start(bundler: PlayerBundler = { bundle: async () => "/* player */" }): Promise<{
        baseUrl: string;
        service: BuildService;
    }> {
        const service = new BuildService({
            paths: { inputPath, outputPath },
            assembleStage: new AssembleStage(bundler)
        });
        const listening = createApp(service).listen(0, "127.0.0.1");
        server = listening;
        await once(listening, "listening");
        const address = listening.address();
        if (address === null || typeof address === "string") {
            throw new Error("server has no TCP address");
        }
        return { baseUrl: `http://127.0.0.1:${address.port}`, service };
    }

    const postBuild = (baseUrl: string, body: unknown) =>
        fetch(`${baseUrl}/build`, {
            method: "POST",
            headers: { "content-type": "application/json" },
            body: JSON.stringify(body)
        });

    beforeEach(async () => {
        workDir = await mkdtemp(path.join(os.tmpdir(), "novelpress-app-"));
        inputPath = path.join(workDir, "input");
        outputPath = path.join(workDir, "output");
        await mkdir(inputPath, { recursive: true });
        await copyFile(SAMPLE, path.join(inputPath, "sample_scenario.csv"));
    });

    afterEach(async () => {
        if (server) {
            const closing = server;
            server = undefined;
            closing.closeAllConnections();
            await new Promise<void>((resolve, reject) => closing.close((error) => (error ? reject(error) : resolve())));
        }
        await rm(workDir, { recursive: true, force: true });
    });

    it("reports an idle status", async () => {
        const { baseUrl } = await start();

        const response = await fetch(`${baseUrl}/status`);

        expect(response.status).toBe(200);
        expect(await response.json()).toEqual({ running: false });
    });

    it("builds a script from the service's input directory", async () => {
        const { baseUrl } = await start();

        const response = await postBuild(baseUrl, { csv: "sample_scenario.csv" });

        expect(response.status).toBe(200);
        expect(await response.json()).toMatchObject({
            success: true,
            artifactPath: path.join(outputPath, "sample_scenario.html")
        });
    });

    it("rejects script names that are not bare table files", async () => {
        const { baseUrl } = await start();

        expect((await postBuild(baseUrl, { csv: "../sample_scenario.csv" })).status).toBe(400);
        expect((await postBuild(baseUrl, { csv: "notes.md" })).status).toBe(400);
    });

    it("answers 404 for a script that does not exist", async () => {
        const { baseUrl } = await start();

        const response = await postBuild(baseUrl, { csv: "absent.csv" });

        expect(response.status).toBe(404);
        expect(await response.json()).toEqual({ success: false, error: "Script 'absent.csv' not found" });
    });

    it("answers 500 with the error code when the build fails", async () => {
        const { baseUrl } = await start();

        const response = await postBuild(baseUrl, { csv: "sample_scenario.csv", strict: true });

        expect(response.status).toBe(500);
        expect(await response.json()).toMatchObject({
            success: false,
            code: "ASSET_UNRESOLVED",
            error: "Unresolved asset references: bg_morning.png, bg_room, sp_rook_frown.png, sp_mina_smile.png"
        });
    });

    it("answers 409 while another build is running", async () => {
        let release: (script: string) => void = () => undefined;
        const pending = new Promise<string>((resolve) => {
            release = resolve;
        });
        const { baseUrl, service } = await start({ bundle: () => pending });

        const first = postBuild(baseUrl, { csv: "sample_scenario.csv" });
        await vi.waitFor(() => expect(service.getStatus().running).toBe(true));

        const second = await postBuild(baseUrl, { csv: "sample_scenario.csv" });
        expect(second.status).toBe(409);
        expect(await second.json()).toEqual({ success: false, error: "A build is already in progress" });

        release("/* player */");
        expect((await first).status).toBe(200);
    });
});
