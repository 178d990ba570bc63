import type { EventType } from "../keys.js";

/**
 * The virtual output device that receives synthetic events.
 * Writes are synchronous; a failed write throws `DeviceWriteError`.
 */
export interface OutputSink {
    emit(type: EventType, code: number, value: number): void;
    /** Flushes the events emitted so far as one report (EV_SYN / SYN_REPORT). */
    sync(): void;
}

/** One raw event read from the physical input device. */
export interface InputEvent {
    type: number;
    code: number;
    /** For key events: 0 = up, 1 = down, 2 = autorepeat. */
    value: number;
    /** Kernel timestamp in microseconds, when known. */
    timestampUs?: number;
}

export type PlaybackState = "idle" | "running" | "paused";
