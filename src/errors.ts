/**
 * Base class for every error raised by the macro tool.
 * `name` is set per subclass so log lines stay readable after `String(error)`.
 */
export class MacroError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Invalid or missing configuration. Fatal at startup. */
export class ConfigError extends MacroError {}

/** A hotkey string contains a token that is not a recognized key form. */
export class InvalidHotkeySpecError extends MacroError {
    constructor(public readonly spec: string, reason: string) {
        super(`Invalid hotkey "${spec}": ${reason}`);
    }
}

/** A macro step refers to a key that cannot be mapped to an output code. */
export class UnsupportedKeyError extends MacroError {
    constructor(public readonly key: string) {
        super(`Unsupported key: ${JSON.stringify(key)}`);
    }
}

/** A step value reached the interpreter without matching any known step kind. */
export class UnknownStepTypeError extends MacroError {
    constructor(public readonly stepType: unknown) {
        super(`Unknown step type: ${JSON.stringify(stepType)}`);
    }
}

export class UnsupportedModeError extends MacroError {
    constructor(public readonly mode: string) {
        super(`Mouse move mode "${mode}" is not supported; only "relative" moves can be emitted`);
    }
}

export class DeviceWriteError extends MacroError {}

export class DeviceReadError extends MacroError {}

export class DeviceNotFoundError extends MacroError {}
