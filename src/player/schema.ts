import { z } from "zod";

import type { NovelData } from "./types.js";

const rowSchema = z.object({
    sceneId: z.string(),
    kind: z.enum(["title", "dialogue", "choice", "ending"]),
    speaker: z.string(),
    text: z.string(),
    effect: z.string(),
    background: z.string(),
    portraitLeft: z.string(),
    portraitCenter: z.string(),
    portraitRight: z.string(),
    sound: z.string(),
    music: z.string()
});

const novelDataSchema = z.object({
    rows: z.array(rowSchema),
    assets: z.record(
        z.string(),
        z.object({
            kind: z.enum(["image", "audio"]),
            mimeType: z.string(),
            dataUri: z.string()
        })
    ),
    config: z.record(z.string(), z.string())
});

export function parseNovelData(raw: string): NovelData {
    const parsed = novelDataSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Embedded novel data is malformed at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "unknown"}`);
    }
    return parsed.data;
}
