import { EventTypes, KeyValues, keyName } from "../keys.js";
import type { OutputSink } from "./types.js";

/**
 * Tracks which output codes (keys and mouse buttons) a `press` step left down.
 *
 * Every method runs to completion without yielding, so the playback worker and
 * the controller never observe the set half-updated.
 */
export class HeldKeyLedger {
    private static readonly LOG_PREFIX = "HeldKeys:";

    private readonly held = new Set<number>();

    constructor(private readonly sink: OutputSink) {}

    public markDown(code: number): void {
        this.held.add(code);
    }

    /** Removing a code that was never marked is a no-op. */
    public markUp(code: number): void {
        this.held.delete(code);
    }

    public has(code: number): boolean {
        return this.held.has(code);
    }

    /** Codes currently held, in the order they were pressed. */
    public snapshot(): number[] {
        return [...this.held];
    }

    public get size(): number {
        return this.held.size;
    }

    /**
     * Snapshots and clears the ledger, then emits a release for every code in the
     * snapshot followed by a single sync. Individual write failures are logged and
     * skipped so the remaining codes are still released.
     * An empty ledger emits nothing.
     * @returns The released codes, so a caller can press them again later.
     */
    public releaseAll(): number[] {
        const codes = this.snapshot();
        this.held.clear();
        if (codes.length === 0) {
            return codes;
        }

        for (const code of codes) {
            try {
                this.sink.emit(EventTypes.Key, code, KeyValues.Up);
            } catch (error) {
                console.warn(`${HeldKeyLedger.LOG_PREFIX} Failed to release ${keyName(code)}:`, error);
            }
        }
        try {
            this.sink.sync();
        } catch (error) {
            console.warn(`${HeldKeyLedger.LOG_PREFIX} Failed to sync after releasing ${codes.length} key(s):`, error);
        }
        return codes;
    }
}
