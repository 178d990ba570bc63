import { readFileSync } from "node:fs";
import { UnsupportedKeyError } from "./errors.js";

/**
 * Linux input event types used by the tool.
 * Values come from `linux/input-event-codes.h`.
 */
export const EventTypes = {
    Syn: 0,
    Key: 1,
    Rel: 2,
} as const;

export type EventType = typeof EventTypes[keyof typeof EventTypes];

export const SYN_REPORT = 0;

export const RelativeAxes = {
    X: 0,
    Y: 1,
    HorizontalWheel: 6,
    Wheel: 8,
} as const;

/** Key event values as reported by evdev. */
export const KeyValues = {
    Up: 0,
    Down: 1,
    Repeat: 2,
} as const;

export type KeyValue = typeof KeyValues[keyof typeof KeyValues];

interface KeyCodeTable {
    /** `KEY_*` / `BTN_*` name to numeric code. */
    codes: Record<string, number>;
    /** Printable, non-alphanumeric characters to their `KEY_*` name (US layout). */
    characters: Record<string, string>;
    /** `Key.<name>` macro references to their `KEY_*` name. */
    macroKeyNames: Record<string, string>;
}

const table: KeyCodeTable = JSON.parse(
    readFileSync(new URL("../data/keycodes.json", import.meta.url), "utf8"),
);

const namesByCode = new Map<number, string>();
for (const [name, code] of Object.entries(table.codes)) {
    if (!namesByCode.has(code)) {
        namesByCode.set(code, name);
    }
}

/**
 * Looks up the numeric code of a `KEY_*` or `BTN_*` name.
 * @returns The code, or `undefined` for names missing from the table.
 */
export function keyCode(name: string): number | undefined {
    return table.codes[name];
}

/** Reverse lookup used for log output. Unknown codes render as `#<code>`. */
export function keyName(code: number): string {
    return namesByCode.get(code) ?? `#${code}`;
}

function requireCode(name: string, source: string): number {
    const code = keyCode(name);
    if (code === undefined) {
        throw new UnsupportedKeyError(source);
    }
    return code;
}

export const Buttons = {
    left: requireCode("BTN_LEFT", "BTN_LEFT"),
    right: requireCode("BTN_RIGHT", "BTN_RIGHT"),
    middle: requireCode("BTN_MIDDLE", "BTN_MIDDLE"),
} as const;

export type MouseButtonName = keyof typeof Buttons;

/**
 * Maps one printable character to its key code: letters (case-insensitive),
 * digits, space, and the US punctuation set `` ` - = [ ] \ ; ' , . / ``.
 * @throws UnsupportedKeyError for anything else.
 */
export function charToKeyCode(ch: string): number {
    const lower = ch.toLowerCase();
    if (lower.length === 1 && ((lower >= "a" && lower <= "z") || (lower >= "0" && lower <= "9"))) {
        return requireCode(`KEY_${lower.toUpperCase()}`, ch);
    }
    const name = table.characters[lower];
    if (name === undefined) {
        throw new UnsupportedKeyError(ch);
    }
    return requireCode(name, ch);
}

/** Code of function key `F<n>`, or `undefined` when the table has no such key. */
export function functionKeyCode(n: number): number | undefined {
    if (!Number.isInteger(n) || n < 1) {
        return undefined;
    }
    return keyCode(`KEY_F${n}`);
}

/**
 * Resolves a key reference used in macro steps.
 *
 * Accepted forms:
 * - a single printable character, e.g. `"a"`, `"7"`, `"/"`
 * - `Key.<name>` for named keys, e.g. `"Key.enter"`, `"Key.ctrl_l"`, `"Key.f5"`
 *
 * @throws UnsupportedKeyError when the reference has no mapping.
 */
export function parseMacroKey(raw: string): number {
    const trimmed = raw.trim();
    if (trimmed.startsWith("Key.")) {
        const name = trimmed.slice("Key.".length);
        const fn = /^f(\d+)$/.exec(name);
        if (fn) {
            const code = functionKeyCode(Number(fn[1]));
            if (code === undefined) {
                throw new UnsupportedKeyError(raw);
            }
            return code;
        }
        const mapped = table.macroKeyNames[name];
        if (mapped === undefined) {
            throw new UnsupportedKeyError(raw);
        }
        return requireCode(mapped, raw);
    }
    // A lone space is trimmed away above, so check the raw value first.
    if (raw === " ") {
        return charToKeyCode(raw);
    }
    if (trimmed.length === 1) {
        return charToKeyCode(trimmed);
    }
    throw new UnsupportedKeyError(raw);
}
