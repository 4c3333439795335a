import { DomView } from "./dom.js";
import { parseNovelData } from "./schema.js";
import { TimerScheduler, type Scheduler } from "./scheduler.js";
import { PlaybackSession, type KeyValueStore, type PlaybackTimings } from "./session.js";

export const NOVEL_DATA_ELEMENT_ID = "novel-data";

export interface BootOptions {
    scheduler?: Scheduler;
    timings?: Partial<PlaybackTimings>;
}

function closestWith(target: EventTarget | null, selector: string): Element | null {
    return target instanceof Element ? target.closest(selector) : null;
}

/**
 * Reads the embedded novel data from `doc` and wires the session to the
 * artifact's controls.
 */
export function bootPlayer(doc: Document, storage: KeyValueStore, options: BootOptions = {}): PlaybackSession {
    const dataElement = doc.getElementById(NOVEL_DATA_ELEMENT_ID);
    if (!dataElement?.textContent) {
        throw new Error(`Artifact is missing #${NOVEL_DATA_ELEMENT_ID}`);
    }
    const data = parseNovelData(dataElement.textContent);
    const view = new DomView(doc);
    const session = new PlaybackSession({
        rows: data.rows,
        assets: data.assets,
        view,
        scheduler: options.scheduler ?? new TimerScheduler(),
        storage,
        storageNamespace: `novelpress:${data.config.title ?? ""}`,
        timings: options.timings
    });

    const titleBackground = data.config.title_background;
    view.renderTitleInfo(data.config, titleBackground ? data.assets[titleBackground]?.dataUri : undefined);
    view.renderCredits(data.config);
    session.loadSettings();

    const actions: Record<string, () => void> = {
        "new-game": () => session.startNewGame(),
        load: () => {
            view.hideModal("game-menu");
            session.load();
        },
        save: () => {
            if (session.save()) {
                view.hideModal("game-menu");
            }
        },
        settings: () => {
            view.hideModal("game-menu");
            view.showModal("settings-screen");
        },
        "close-settings": () => {
            session.updateSettings(view.readSettings());
            view.hideModal("settings-screen");
        },
        credits: () => view.showModal("credits-screen"),
        "close-credits": () => view.hideModal("credits-screen"),
        history: () => {
            view.renderHistory(session.history());
            view.showModal("history-screen");
        },
        "close-history": () => view.hideModal("history-screen"),
        auto: () => {
            session.toggleAuto();
        },
        menu: () => view.toggleModal("game-menu"),
        "close-menu": () => view.hideModal("game-menu"),
        "return-to-title": () => session.returnToTitle()
    };

    doc.addEventListener("click", (event) => {
        const action = closestWith(event.target, "[data-action]")?.getAttribute("data-action");
        if (action) {
            actions[action]?.();
        }
    });

    view.element("text-box").addEventListener("click", () => session.advance());

    view.element("choices-container").addEventListener("click", (event) => {
        const choice = closestWith(event.target, "[data-choice]")?.getAttribute("data-choice");
        if (choice !== null && choice !== undefined) {
            session.selectChoice(Number(choice));
        }
    });

    doc.addEventListener("keydown", (event) => {
        if (event.key !== "Enter" && event.key !== " ") {
            return;
        }
        // Keys on a focused control, or behind an open panel, are not advances.
        if (closestWith(event.target, "button, input") || doc.querySelector(".modal:not(.hidden)")) {
            return;
        }
        session.advance();
    });

    return session;
}
