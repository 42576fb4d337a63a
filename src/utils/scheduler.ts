import { LedgerView } from "../types";

let timeout: NodeJS.Timeout | null = null;

/**
 * Arms a timer that closes the round one second after its deadline
 * (closing needs the deadline strictly behind us). Replaces any timer
 * already armed. Returns the delay in ms, or null when nothing was armed.
 */
export function scheduleRoundClose(
    view: LedgerView,
    close: () => Promise<void>,
    now: number = Math.floor(Date.now() / 1000),
): number | null {
    cancelRoundClose();
    if (view.phase !== "Started" || view.deadline === null) return null;

    const delay = Math.max(0, (view.deadline + 1 - now) * 1000);
    timeout = setTimeout(() => {
        timeout = null;
        close().catch((err) => console.error("Failed to close voting:", err));
    }, delay);
    return delay;
}

export function cancelRoundClose() {
    if (timeout) clearTimeout(timeout);
    timeout = null;
}
