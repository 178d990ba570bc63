import { InvalidHotkeySpecError, UnsupportedKeyError } from "../errors.js";
import { charToKeyCode, functionKeyCode, keyCode } from "../keys.js";

/**
 * One logical token of a hotkey: any of these codes satisfies it.
 * `<ctrl>` becomes `{KEY_LEFTCTRL, KEY_RIGHTCTRL}`, `e` becomes `{KEY_E}`.
 */
export type AlternativeSet = ReadonlySet<number>;

/** Parsed hotkey. Every alternative-set must be satisfied at once. */
export type HotkeyRequirement = readonly AlternativeSet[];

export type PressedSet = ReadonlySet<number>;

function pair(left: string, right: string): AlternativeSet {
    const codes = [keyCode(left), keyCode(right)].filter((code): code is number => code !== undefined);
    return new Set(codes);
}

const ModifierTokens: Record<string, AlternativeSet> = {
    "<ctrl>": pair("KEY_LEFTCTRL", "KEY_RIGHTCTRL"),
    "<control>": pair("KEY_LEFTCTRL", "KEY_RIGHTCTRL"),
    "<shift>": pair("KEY_LEFTSHIFT", "KEY_RIGHTSHIFT"),
    "<alt>": pair("KEY_LEFTALT", "KEY_RIGHTALT"),
    "<meta>": pair("KEY_LEFTMETA", "KEY_RIGHTMETA"),
    "<super>": pair("KEY_LEFTMETA", "KEY_RIGHTMETA"),
    "<win>": pair("KEY_LEFTMETA", "KEY_RIGHTMETA"),
};

function parseToken(token: string, spec: string): AlternativeSet {
    const modifier = ModifierTokens[token];
    if (modifier !== undefined) {
        return modifier;
    }

    const fn = /^<f(\d+)>$/.exec(token);
    if (fn) {
        const code = functionKeyCode(Number(fn[1]));
        if (code === undefined) {
            throw new InvalidHotkeySpecError(spec, `unknown function key "${token}"`);
        }
        return new Set([code]);
    }

    if (token.length === 1) {
        try {
            return new Set([charToKeyCode(token)]);
        } catch (error) {
            if (error instanceof UnsupportedKeyError) {
                throw new InvalidHotkeySpecError(spec, `unsupported character "${token}"`);
            }
            throw error;
        }
    }

    throw new InvalidHotkeySpecError(spec, `unsupported token "${token}"`);
}

/**
 * Parses a hotkey string such as `"<ctrl>+<shift>+e"` into its requirement.
 * Tokens are separated by `+`, trimmed and lowercased; empty tokens are skipped.
 * @throws InvalidHotkeySpecError for empty input or any unrecognized token.
 */
export function parseHotkey(spec: string): HotkeyRequirement {
    const tokens = spec.split("+").map(part => part.trim().toLowerCase()).filter(part => part !== "");
    if (tokens.length === 0) {
        throw new InvalidHotkeySpecError(spec, "no keys given");
    }
    return tokens.map(token => parseToken(token, spec));
}

/** True when every alternative-set has at least one of its codes pressed. */
export function isSatisfied(pressed: PressedSet, requirement: HotkeyRequirement): boolean {
    return requirement.every(alternatives => {
        for (const code of alternatives) {
            if (pressed.has(code)) {
                return true;
            }
        }
        return false;
    });
}
