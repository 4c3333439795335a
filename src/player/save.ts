import { z } from "zod";

import type { GameState, PlayerSettings, SaveData } from "./types.js";

export class SaveDataCorruptError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "SaveDataCorruptError";
    }
}

export const DEFAULT_SETTINGS: PlayerSettings = {
    textSpeed: 5,
    bgmVolume: 70,
    seVolume: 70
};

export const settingsSchema = z.object({
    textSpeed: z.number().int().min(1).max(10),
    bgmVolume: z.number().int().min(0).max(100),
    seVolume: z.number().int().min(0).max(100)
});

const saveSchema = z.object({
    sceneIndex: z.number().int().min(0),
    state: z.object({
        currentSceneId: z.string().nullable(),
        visitedScenes: z.array(z.string()),
        choices: z.record(
            z.string(),
            z.object({
                index: z.number().int().min(0),
                text: z.string()
            })
        ),
        settings: settingsSchema
    }),
    history: z.array(
        z.object({
            speaker: z.string(),
            text: z.string()
        })
    )
});

export function createGameState(settings: PlayerSettings = DEFAULT_SETTINGS): GameState {
    return {
        currentSceneId: null,
        visitedScenes: [],
        choices: {},
        settings: { ...settings }
    };
}

export function cloneSaveData(data: SaveData): SaveData {
    return {
        sceneIndex: data.sceneIndex,
        state: {
            currentSceneId: data.state.currentSceneId,
            visitedScenes: [...data.state.visitedScenes],
            choices: Object.fromEntries(
                Object.entries(data.state.choices).map(([sceneId, choice]) => [sceneId, { ...choice }])
            ),
            settings: { ...data.state.settings }
        },
        history: data.history.map((entry) => ({ ...entry }))
    };
}

export function serializeSaveData(data: SaveData): string {
    return JSON.stringify(data);
}

/**
 * Parses a stored save record. `sceneCount` bounds `sceneIndex`; the
 * sentinel value `sceneCount` itself is allowed.
 */
export function parseSaveData(raw: string, sceneCount: number): SaveData {
    let decoded: unknown;
    try {
        decoded = JSON.parse(raw);
    } catch (error) {
        throw new SaveDataCorruptError(
            `Save data is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    const parsed = saveSchema.safeParse(decoded);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
        throw new SaveDataCorruptError(`Save data is malformed${where}: ${issue?.message ?? "schema validation error"}`);
    }

    if (parsed.data.sceneIndex > sceneCount) {
        throw new SaveDataCorruptError(
            `Save data points at scene ${parsed.data.sceneIndex} but the script has ${sceneCount} scenes`
        );
    }

    return parsed.data;
}

export function parseSettings(raw: string | null): PlayerSettings {
    if (!raw) {
        return { ...DEFAULT_SETTINGS };
    }
    try {
        const parsed = settingsSchema.safeParse(JSON.parse(raw));
        return parsed.success ? parsed.data : { ...DEFAULT_SETTINGS };
    } catch {
        return { ...DEFAULT_SETTINGS };
    }
}

export function clampSettings(settings: PlayerSettings): PlayerSettings {
    const clamp = (value: number, min: number, max: number) =>
        Math.min(max, Math.max(min, Math.round(Number.isFinite(value) ? value : min)));
    return {
        textSpeed: clamp(settings.textSpeed, 1, 10),
        bgmVolume: clamp(settings.bgmVolume, 0, 100),
        seVolume: clamp(settings.seVolume, 0, 100)
    };
}
