import { EventTypes, type EventType, KeyValues, keyCode } from "./keys.js";
import type { InputEvent, OutputSink } from "./core/types.js";

export type RecordedEvent =
    | { kind: "emit"; type: EventType; code: number; value: number }
    | { kind: "sync" };

export interface RecordingSink extends OutputSink {
    events: RecordedEvent[];
    /** Codes whose emit calls throw, to simulate a busy device. */
    failingCodes: Set<number>;
    failSync: boolean;
    clear(): void;
}

/**
 * In-memory output sink that records every call in order.
 */
export function createRecordingSink(): RecordingSink {
    const sink: RecordingSink = {
        events: [],
        failingCodes: new Set(),
        failSync: false,
        emit(type, code, value) {
            if (sink.failingCodes.has(code)) {
                throw new Error(`device busy (${code})`);
            }
            sink.events.push({ kind: "emit", type, code, value });
        },
        sync() {
            if (sink.failSync) {
                throw new Error("device busy (sync)");
            }
            sink.events.push({ kind: "sync" });
        },
        clear() {
            sink.events = [];
        },
    };
    return sink;
}

export const down = (code: number): RecordedEvent => ({ kind: "emit", type: EventTypes.Key, code, value: KeyValues.Down });
export const up = (code: number): RecordedEvent => ({ kind: "emit", type: EventTypes.Key, code, value: KeyValues.Up });
export const rel = (code: number, value: number): RecordedEvent => ({ kind: "emit", type: EventTypes.Rel, code, value });
export const sync: RecordedEvent = { kind: "sync" };

/** Code of a `KEY_*` / `BTN_*` name; throws for typos so tests fail loudly. */
export function code(name: string): number {
    const value = keyCode(name);
    if (value === undefined) {
        throw new Error(`No key code for ${name}`);
    }
    return value;
}

/** Builds a raw key event as the input device would report it. */
export function keyEvent(name: string, value: number): InputEvent {
    return { type: EventTypes.Key, code: code(name), value };
}

export function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/** Polls until `predicate` holds; rejects after `timeoutMs`. */
export async function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
    const started = Date.now();
    while (!predicate()) {
        if (Date.now() - started > timeoutMs) {
            throw new Error(`Condition not met within ${timeoutMs}ms`);
        }
        await delay(5);
    }
}
