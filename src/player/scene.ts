import type { SceneKind } from "./types.js";

export const SCENE_ID_DELIMITER = "-";

const SEGMENT_KINDS: Record<string, SceneKind> = {
    T: "title",
    Q: "choice",
    E: "ending"
};

export function classify(sceneId: string): SceneKind {
    const segment = sceneId.split(SCENE_ID_DELIMITER)[1];
    if (segment === undefined) {
        return "dialogue";
    }
    return SEGMENT_KINDS[segment] ?? "dialogue";
}

export function chapterOf(sceneId: string): string {
    return sceneId.split(SCENE_ID_DELIMITER)[0] ?? "";
}

/** 0 -> "A", 1 -> "B", ... */
export function branchLetter(optionIndex: number): string {
    return String.fromCharCode(65 + optionIndex);
}

export function branchTarget(sceneId: string, optionIndex: number): string {
    return [chapterOf(sceneId), branchLetter(optionIndex), "1"].join(SCENE_ID_DELIMITER);
}

export const MAX_DIALOGUE_LINES = 4;

export function truncateLines(text: string, maxLines = MAX_DIALOGUE_LINES): string {
    const lines = text.split("\n");
    return lines.length > maxLines ? lines.slice(0, maxLines).join("\n") : text;
}

export function choiceOptions(text: string): string[] {
    return text
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}
