import { branchTarget, choiceOptions, truncateLines } from "./scene.js";
import {
    SaveDataCorruptError,
    clampSettings,
    cloneSaveData,
    createGameState,
    parseSaveData,
    parseSettings,
    serializeSaveData
} from "./save.js";
import type { Scheduler } from "./scheduler.js";
import type {
    AssetBundle,
    GameState,
    HistoryEntry,
    PlayerSettings,
    SaveData,
    ScenarioRow
} from "./types.js";

export interface PortraitSlots {
    left?: string;
    center?: string;
    right?: string;
}

/** Rendering port. Media arguments are embeddable URIs, never asset names. */
export interface PlaybackView {
    showTitleScreen(): void;
    showGameScreen(): void;
    renderChapterTitle(text: string): void;
    renderDialogue(speaker: string, text: string): void;
    renderChoices(options: string[]): void;
    setBackground(uri: string): void;
    setPortraits(portraits: PortraitSlots): void;
    playMusic(uri: string, volume: number): void;
    playSound(uri: string, volume: number): void;
    startGate(durationMs: number): void;
    setAutoMode(enabled: boolean): void;
    applySettings(settings: PlayerSettings): void;
    notify(message: string): void;
}

/** The subset of the Web Storage API the session needs. */
export interface KeyValueStore {
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
}

export interface PlayerLogger {
    info(message: string): void;
    warn(message: string): void;
}

export interface PlaybackTimings {
    titleDelayMs: number;
    clickGateMs: number;
    autoAdvanceMs: number;
}

export const DEFAULT_TIMINGS: PlaybackTimings = {
    titleDelayMs: 2000,
    clickGateMs: 500,
    autoAdvanceMs: 3000
};

export const CHOICE_HISTORY_PLACEHOLDER = "[Choice]";

export interface PlaybackSessionOptions {
    rows: ScenarioRow[];
    assets: AssetBundle;
    view: PlaybackView;
    scheduler: Scheduler;
    storage: KeyValueStore;
    /** Prefix for the save and settings keys. */
    storageNamespace?: string;
    timings?: Partial<PlaybackTimings>;
    logger?: PlayerLogger;
}

export type SessionScreen = "title" | "scene";

export class PlaybackSession {
    private readonly rows: ScenarioRow[];
    private readonly assets: AssetBundle;
    private readonly view: PlaybackView;
    private readonly scheduler: Scheduler;
    private readonly storage: KeyValueStore;
    private readonly timings: PlaybackTimings;
    private readonly logger: PlayerLogger;
    private readonly saveKey: string;
    private readonly settingsKey: string;

    private state: GameState = createGameState();
    private historyEntries: HistoryEntry[] = [];
    private currentIndex = 0;
    private screen: SessionScreen = "title";
    private autoMode = false;
    private gateOpen = false;
    private options: string[] = [];

    constructor(options: PlaybackSessionOptions) {
        this.rows = options.rows;
        this.assets = options.assets;
        this.view = options.view;
        this.scheduler = options.scheduler;
        this.storage = options.storage;
        this.timings = { ...DEFAULT_TIMINGS, ...options.timings };
        this.logger = options.logger ?? console;
        const namespace = options.storageNamespace ?? "novelpress";
        this.saveKey = `${namespace}:save`;
        this.settingsKey = `${namespace}:settings`;
    }

    get sceneIndex(): number {
        return this.currentIndex;
    }

    get currentScreen(): SessionScreen {
        return this.screen;
    }

    get currentRow(): ScenarioRow | undefined {
        return this.screen === "scene" ? this.rows[this.currentIndex] : undefined;
    }

    get isAutoMode(): boolean {
        return this.autoMode;
    }

    get canAdvance(): boolean {
        const row = this.currentRow;
        return row !== undefined && (row.kind === "dialogue" || row.kind === "ending") && this.gateOpen;
    }

    get choiceOptions(): readonly string[] {
        return this.options;
    }

    get gameState(): Readonly<GameState> {
        return this.state;
    }

    history(): readonly HistoryEntry[] {
        return this.historyEntries;
    }

    loadSettings(): PlayerSettings {
        const settings = parseSettings(this.storage.getItem(this.settingsKey));
        this.state.settings = settings;
        this.view.applySettings(settings);
        return settings;
    }

    updateSettings(partial: Partial<PlayerSettings>): PlayerSettings {
        const settings = clampSettings({ ...this.state.settings, ...partial });
        this.state.settings = settings;
        this.view.applySettings(settings);
        try {
            this.storage.setItem(this.settingsKey, JSON.stringify(settings));
        } catch (error) {
            this.logger.warn(`Failed to persist settings: ${describe(error)}`);
        }
        return settings;
    }

    startNewGame(): void {
        this.state = createGameState(this.state.settings);
        this.historyEntries = [];
        this.setAutoMode(false);
        this.view.showGameScreen();
        this.screen = "scene";
        this.enter(0);
    }

    /** Reader trigger (click, key). Ignored outside an open dialogue gate. */
    advance(): void {
        if (!this.canAdvance) {
            return;
        }
        this.enter(this.currentIndex + 1);
    }

    selectChoice(optionIndex: number): void {
        const row = this.currentRow;
        if (!row || row.kind !== "choice") {
            return;
        }
        const text = this.options[optionIndex];
        if (text === undefined) {
            this.logger.warn(`Ignoring choice ${optionIndex} on ${row.sceneId}: only ${this.options.length} options`);
            return;
        }

        this.state.choices[row.sceneId] = { index: optionIndex, text };
        this.addHistory("", `→ ${text}`);

        const targetId = branchTarget(row.sceneId, optionIndex);
        const targetIndex = this.rows.findIndex((candidate) => candidate.sceneId === targetId);
        if (targetIndex === -1) {
            this.logger.warn(`Branch target ${targetId} not found; continuing after ${row.sceneId}`);
            this.enter(this.currentIndex + 1);
            return;
        }
        this.enter(targetIndex);
    }

    toggleAuto(): boolean {
        this.setAutoMode(!this.autoMode);
        if (this.autoMode && this.canAdvance) {
            this.scheduleAutoAdvance();
        }
        return this.autoMode;
    }

    returnToTitle(): void {
        this.scheduler.cancelAll();
        this.screen = "title";
        this.gateOpen = false;
        this.options = [];
        this.setAutoMode(false);
        this.view.showTitleScreen();
    }

    snapshot(): SaveData {
        return cloneSaveData({
            sceneIndex: this.currentIndex,
            state: this.state,
            history: this.historyEntries
        });
    }

    restore(data: SaveData): void {
        const copy = cloneSaveData(data);
        this.state = copy.state;
        this.historyEntries = copy.history;
        this.setAutoMode(false);
        this.view.applySettings(this.state.settings);
        if (copy.sceneIndex >= this.rows.length) {
            this.currentIndex = copy.sceneIndex;
            this.returnToTitle();
            return;
        }
        this.view.showGameScreen();
        this.screen = "scene";
        this.enter(copy.sceneIndex, { restoring: true });
    }

    save(): boolean {
        if (this.screen !== "scene") {
            this.view.notify("Nothing to save yet.");
            return false;
        }
        try {
            this.storage.setItem(this.saveKey, serializeSaveData(this.snapshot()));
        } catch (error) {
            this.view.notify(`Save failed: ${describe(error)}`);
            return false;
        }
        this.view.notify("Game saved.");
        return true;
    }

    load(): boolean {
        const raw = this.storage.getItem(this.saveKey);
        if (raw === null) {
            this.view.notify("No save data found.");
            this.returnToTitle();
            return false;
        }

        let data: SaveData;
        try {
            data = parseSaveData(raw, this.rows.length);
        } catch (error) {
            if (!(error instanceof SaveDataCorruptError)) {
                throw error;
            }
            this.logger.warn(error.message);
            this.view.notify(`Load failed: ${error.message}`);
            this.returnToTitle();
            return false;
        }

        this.restore(data);
        return true;
    }

    private enter(index: number, options: { restoring?: boolean } = {}): void {
        this.scheduler.cancelAll();
        this.gateOpen = false;
        this.options = [];

        const row = this.rows[index];
        if (!row) {
            this.logger.info("Reached the end of the script");
            this.currentIndex = this.rows.length;
            this.returnToTitle();
            return;
        }

        this.currentIndex = index;
        this.state.currentSceneId = row.sceneId;
        if (!options.restoring) {
            this.state.visitedScenes.push(row.sceneId);
        }
        this.logger.info(`Scene ${row.sceneId} (${row.kind})`);

        this.renderMedia(row);

        switch (row.kind) {
            case "title":
                this.enterTitle(row, options.restoring);
                break;
            case "choice":
                this.enterChoice(row, options.restoring);
                break;
            case "dialogue":
            case "ending":
                this.enterDialogue(row, options.restoring);
                break;
        }
    }

    private enterTitle(row: ScenarioRow, restoring?: boolean): void {
        this.view.setPortraits({});
        this.view.renderChapterTitle(row.text);
        if (!restoring) {
            this.addHistory("", row.text);
        }
        this.scheduler.schedule("titleAdvance", this.timings.titleDelayMs, () => {
            this.enter(this.currentIndex + 1);
        });
    }

    private enterChoice(row: ScenarioRow, restoring?: boolean): void {
        this.options = choiceOptions(row.text);
        this.view.renderChoices([...this.options]);
        if (!restoring) {
            this.addHistory("", CHOICE_HISTORY_PLACEHOLDER);
        }
    }

    private enterDialogue(row: ScenarioRow, restoring?: boolean): void {
        const text = truncateLines(row.text);
        this.view.setPortraits({
            left: this.assetUri(row.portraitLeft),
            center: this.assetUri(row.portraitCenter),
            right: this.assetUri(row.portraitRight)
        });
        this.view.renderDialogue(row.speaker, text);
        if (!restoring) {
            this.addHistory(row.speaker, text);
        }

        this.view.startGate(this.timings.clickGateMs);
        this.scheduler.schedule("gate", this.timings.clickGateMs, () => {
            this.gateOpen = true;
            if (this.autoMode) {
                this.scheduleAutoAdvance();
            }
        });
    }

    private scheduleAutoAdvance(): void {
        this.scheduler.schedule("autoAdvance", this.timings.autoAdvanceMs, () => {
            if (this.autoMode && this.canAdvance) {
                this.enter(this.currentIndex + 1);
            }
        });
    }

    private renderMedia(row: ScenarioRow): void {
        const background = this.assetUri(row.background);
        if (background) {
            this.view.setBackground(background);
        }
        const music = this.assetUri(row.music);
        if (music) {
            this.view.playMusic(music, this.state.settings.bgmVolume);
        }
        const sound = this.assetUri(row.sound);
        if (sound) {
            this.view.playSound(sound, this.state.settings.seVolume);
        }
    }

    private assetUri(name: string): string | undefined {
        if (!name) {
            return undefined;
        }
        return Object.prototype.hasOwnProperty.call(this.assets, name) ? this.assets[name]?.dataUri : undefined;
    }

    private addHistory(speaker: string, text: string): void {
        if (text.trim().length === 0) {
            return;
        }
        this.historyEntries.push({ speaker, text });
    }

    private setAutoMode(enabled: boolean): void {
        this.autoMode = enabled;
        if (!enabled) {
            this.scheduler.cancel("autoAdvance");
        }
        this.view.setAutoMode(enabled);
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
