import { bootPlayer } from "./boot.js";

const LOADING_MS = 1000;
const FADE_MS = 500;

document.addEventListener("DOMContentLoaded", () => {
    try {
        bootPlayer(document, window.localStorage);
    } catch (error) {
        console.error("Failed to start playback", error);
        const loading = document.querySelector(".loading-text");
        if (loading) {
            loading.textContent = error instanceof Error ? error.message : String(error);
        }
        return;
    }

    setTimeout(() => {
        const loading = document.getElementById("loading-screen");
        loading?.classList.add("fade-out");
        setTimeout(() => {
            if (loading) {
                loading.style.display = "none";
            }
            document.getElementById("game-container")?.classList.remove("hidden");
        }, FADE_MS);
    }, LOADING_MS);
});
