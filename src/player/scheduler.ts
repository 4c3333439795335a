export type TimerKind = "gate" | "autoAdvance" | "titleAdvance";

export interface Scheduler {
    /** Replaces any pending timer of the same kind. */
    schedule(kind: TimerKind, delayMs: number, callback: () => void): void;
    cancel(kind: TimerKind): void;
    cancelAll(): void;
    isPending(kind: TimerKind): boolean;
}

export class TimerScheduler implements Scheduler {
    private timers = new Map<TimerKind, ReturnType<typeof setTimeout>>();

    schedule(kind: TimerKind, delayMs: number, callback: () => void): void {
        this.cancel(kind);
        const handle = setTimeout(() => {
            this.timers.delete(kind);
            callback();
        }, delayMs);
        this.timers.set(kind, handle);
    }

    cancel(kind: TimerKind): void {
        const handle = this.timers.get(kind);
        if (handle !== undefined) {
            clearTimeout(handle);
            this.timers.delete(kind);
        }
    }

    cancelAll(): void {
        for (const handle of this.timers.values()) {
            clearTimeout(handle);
        }
        this.timers.clear();
    }

    isPending(kind: TimerKind): boolean {
        return this.timers.has(kind);
    }
}
