import type { PlaybackView, PortraitSlots } from "./session.js";
import type { HistoryEntry, NovelConfig, PlayerSettings } from "./types.js";

export type ModalId = "history-screen" | "game-menu" | "settings-screen" | "credits-screen";

const CREDIT_LINKS: Array<[key: string, label: string]> = [
    ["x_url", "X (Twitter)"],
    ["vrchat_url", "VRChat"],
    ["fediverse_url", "Fediverse"],
    ["web_url", "Website"],
    ["booth_url", "BOOTH"]
];

const TOAST_MS = 2000;

function cssUrl(uri: string): string {
    return `url("${uri.replace(/"/g, "%22")}")`;
}

export class DomView implements PlaybackView {
    private music?: HTMLAudioElement;
    private toastTimer?: ReturnType<typeof setTimeout>;

    constructor(private doc: Document) {}

    element(id: string): HTMLElement {
        const found = this.doc.getElementById(id);
        if (!found) {
            throw new Error(`Artifact is missing #${id}`);
        }
        return found;
    }

    input(id: string): HTMLInputElement {
        const found = this.doc.querySelector<HTMLInputElement>(`input#${id}`);
        if (!found) {
            throw new Error(`Artifact is missing input#${id}`);
        }
        return found;
    }

    showTitleScreen(): void {
        this.music?.pause();
        this.music = undefined;
        this.activateScreen("title-screen");
        this.hideModal("game-menu");
    }

    showGameScreen(): void {
        this.activateScreen("game-screen");
    }

    renderChapterTitle(text: string): void {
        this.showTextBox();
        this.element("speaker-name").textContent = "";
        const dialogue = this.element("dialogue-text");
        dialogue.classList.add("chapter-title");
        dialogue.textContent = text;
        this.element("click-gauge").style.width = "0%";
    }

    renderDialogue(speaker: string, text: string): void {
        this.showTextBox();
        this.element("speaker-name").textContent = speaker;
        const dialogue = this.element("dialogue-text");
        dialogue.classList.remove("chapter-title");
        dialogue.textContent = text;
    }

    renderChoices(options: string[]): void {
        this.element("text-box").classList.add("hidden");
        this.element("choice-box").classList.remove("hidden");
        const container = this.element("choices-container");
        container.replaceChildren(
            ...options.map((option, index) => {
                const button = this.doc.createElement("button");
                button.className = "choice-btn";
                button.dataset.choice = String(index);
                button.textContent = option;
                return button;
            })
        );
    }

    setBackground(uri: string): void {
        this.element("background-layer").style.backgroundImage = cssUrl(uri);
    }

    setPortraits(portraits: PortraitSlots): void {
        this.setPortrait("portrait-left", portraits.left);
        this.setPortrait("portrait-center", portraits.center);
        this.setPortrait("portrait-right", portraits.right);
    }

    playMusic(uri: string, volume: number): void {
        if (this.music && this.music.src === uri) {
            this.music.volume = volume / 100;
            return;
        }
        this.music?.pause();
        const music = new Audio(uri);
        music.loop = true;
        music.volume = volume / 100;
        this.music = music;
        this.play(music);
    }

    playSound(uri: string, volume: number): void {
        const sound = new Audio(uri);
        sound.volume = volume / 100;
        this.play(sound);
    }

    startGate(durationMs: number): void {
        const gauge = this.element("click-gauge");
        gauge.style.transition = "none";
        gauge.style.width = "0%";
        // Force a reflow so the width change below animates from zero.
        void gauge.offsetWidth;
        gauge.style.transition = `width ${durationMs}ms linear`;
        gauge.style.width = "100%";
    }

    setAutoMode(enabled: boolean): void {
        this.element("auto-button").classList.toggle("active", enabled);
    }

    applySettings(settings: PlayerSettings): void {
        this.input("text-speed").value = String(settings.textSpeed);
        this.input("bgm-volume").value = String(settings.bgmVolume);
        this.input("se-volume").value = String(settings.seVolume);
        this.doc.documentElement.style.setProperty("--text-speed", String(settings.textSpeed));
        if (this.music) {
            this.music.volume = settings.bgmVolume / 100;
        }
    }

    readSettings(): PlayerSettings {
        return {
            textSpeed: Number(this.input("text-speed").value),
            bgmVolume: Number(this.input("bgm-volume").value),
            seVolume: Number(this.input("se-volume").value)
        };
    }

    notify(message: string): void {
        const toast = this.element("toast");
        toast.textContent = message;
        toast.classList.remove("hidden");
        if (this.toastTimer !== undefined) {
            clearTimeout(this.toastTimer);
        }
        this.toastTimer = setTimeout(() => {
            toast.classList.add("hidden");
            this.toastTimer = undefined;
        }, TOAST_MS);
    }

    renderTitleInfo(config: NovelConfig, backgroundUri?: string): void {
        this.element("novel-title").textContent = config.title ?? "";
        const subtitle = this.element("novel-subtitle");
        subtitle.textContent = config.subtitle ?? "";
        subtitle.classList.toggle("hidden", !config.subtitle);
        if (backgroundUri) {
            this.element("title-screen").style.backgroundImage = cssUrl(backgroundUri);
        }
    }

    renderCredits(config: NovelConfig): void {
        const items: HTMLElement[] = [];
        if (config.creator_name) {
            const creator = this.doc.createElement("p");
            const label = this.doc.createElement("strong");
            label.textContent = "Created by: ";
            creator.append(label, config.creator_name);
            items.push(creator);
        }
        for (const [key, label] of CREDIT_LINKS) {
            const url = config[key];
            if (!url || !/^https?:\/\//i.test(url)) {
                continue;
            }
            const paragraph = this.doc.createElement("p");
            const link = this.doc.createElement("a");
            link.href = url;
            link.target = "_blank";
            link.rel = "noopener";
            link.textContent = label;
            paragraph.append(link);
            items.push(paragraph);
        }
        this.element("credits-content").replaceChildren(...items);
    }

    renderHistory(entries: readonly HistoryEntry[]): void {
        const list = this.element("history-list");
        list.replaceChildren(
            ...entries.map((entry) => {
                const item = this.doc.createElement("div");
                item.className = "history-item";
                if (entry.speaker) {
                    const speaker = this.doc.createElement("div");
                    speaker.className = "history-speaker";
                    speaker.textContent = entry.speaker;
                    item.append(speaker);
                }
                const text = this.doc.createElement("div");
                text.className = "history-text";
                text.textContent = entry.text;
                item.append(text);
                return item;
            })
        );
        list.scrollTop = list.scrollHeight;
    }

    showModal(id: ModalId): void {
        this.element(id).classList.remove("hidden");
    }

    hideModal(id: ModalId): void {
        this.element(id).classList.add("hidden");
    }

    toggleModal(id: ModalId): void {
        this.element(id).classList.toggle("hidden");
    }

    private activateScreen(id: "title-screen" | "game-screen"): void {
        this.doc.querySelectorAll(".screen").forEach((screen) => screen.classList.remove("active"));
        this.element(id).classList.add("active");
    }

    private showTextBox(): void {
        this.element("text-box").classList.remove("hidden");
        this.element("choice-box").classList.add("hidden");
    }

    private setPortrait(id: string, uri: string | undefined): void {
        const portrait = this.element(id);
        portrait.style.backgroundImage = uri ? cssUrl(uri) : "";
        portrait.classList.toggle("visible", Boolean(uri));
    }

    private play(audio: HTMLAudioElement): void {
        try {
            const started = audio.play();
            // Autoplay policies reject until the reader has interacted.
            if (started) {
                started.catch((error: unknown) => {
                    console.warn(`Audio playback blocked: ${error instanceof Error ? error.message : String(error)}`);
                });
            }
        } catch (error) {
            console.warn(`Audio playback failed: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
}
