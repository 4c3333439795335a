export type SceneKind = "title" | "dialogue" | "choice" | "ending";

export interface ScenarioRow {
    sceneId: string;
    kind: SceneKind;
    speaker: string;
    text: string;
    effect: string;
    background: string;
    portraitLeft: string;
    portraitCenter: string;
    portraitRight: string;
    sound: string;
    music: string;
}

export type MediaKind = "image" | "audio";

export interface AssetEntry {
    kind: MediaKind;
    mimeType: string;
    dataUri: string;
}

/** Insertion order is first-reference order. */
export type AssetBundle = Record<string, AssetEntry>;

export type NovelConfig = Record<string, string>;

export interface NovelData {
    rows: ScenarioRow[];
    assets: AssetBundle;
    config: NovelConfig;
}

export interface PlayerSettings {
    textSpeed: number;
    bgmVolume: number;
    seVolume: number;
}

export interface ChoiceRecord {
    index: number;
    text: string;
}

export interface GameState {
    currentSceneId: string | null;
    visitedScenes: string[];
    choices: Record<string, ChoiceRecord>;
    settings: PlayerSettings;
}

export interface HistoryEntry {
    speaker: string;
    text: string;
}

export interface SaveData {
    sceneIndex: number;
    state: GameState;
    history: HistoryEntry[];
}
