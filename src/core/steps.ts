import { UnknownStepTypeError, UnsupportedModeError } from "../errors.js";
import { EventTypes, KeyValues, RelativeAxes, keyName } from "../keys.js";
import type { HeldKeyLedger } from "./ledger.js";
import type { PlaybackSignals } from "./signals.js";
import type { OutputSink } from "./types.js";

export type KeyAction = "tap" | "press" | "release";

export type MoveMode = "relative" | "absolute";

export interface WaitStep {
    type: "wait";
    seconds: number;
}

export interface KeyStep {
    type: "key";
    code: number;
    action: KeyAction;
}

/** Pressed in listed order, released in reverse. */
export interface ComboStep {
    type: "combo";
    codes: readonly number[];
}

export interface MouseClickStep {
    type: "mouse_click";
    button: number;
    count: number;
}

export interface MouseButtonStep {
    type: "mouse_button";
    button: number;
    action: KeyAction;
}

export interface MouseMoveStep {
    type: "mouse_move";
    dx: number;
    dy: number;
    mode: MoveMode;
}

export interface MouseScrollStep {
    type: "mouse_scroll";
    dy: number;
}

export type MacroStep =
    | WaitStep
    | KeyStep
    | ComboStep
    | MouseClickStep
    | MouseButtonStep
    | MouseMoveStep
    | MouseScrollStep;

export type MacroStepType = MacroStep["type"];

/** Short human-readable form of a step, for debug logs. */
export function describeStep(step: MacroStep): string {
    switch (step.type) {
        case "wait": return `wait ${step.seconds}s`;
        case "key": return `key ${keyName(step.code)} ${step.action}`;
        case "combo": return `combo ${step.codes.map(keyName).join("+")}`;
        case "mouse_click": return `click ${keyName(step.button)} x${step.count}`;
        case "mouse_button": return `button ${keyName(step.button)} ${step.action}`;
        case "mouse_move": return `move ${step.dx},${step.dy} (${step.mode})`;
        case "mouse_scroll": return `scroll ${step.dy}`;
        default: return "unknown step";
    }
}

/**
 * Executes macro steps against the output sink, recording presses in the ledger.
 *
 * Only `wait` steps observe the pause gate. Every other step is skipped entirely
 * when cancellation was requested before it began, and otherwise runs to completion.
 */
export class StepInterpreter {
    constructor(
        private readonly sink: OutputSink,
        private readonly ledger: HeldKeyLedger,
    ) {}

    public async execute(step: MacroStep, signals: PlaybackSignals): Promise<void> {
        if (step.type === "wait") {
            await signals.wait(step.seconds * 1000);
            return;
        }
        if (signals.isCancelled) {
            return;
        }
        this.apply(step);
    }

    private apply(step: Exclude<MacroStep, WaitStep>): void {
        switch (step.type) {
            case "key":
                this.button(step.code, step.action);
                return;

            case "combo":
                for (const code of step.codes) {
                    this.sink.emit(EventTypes.Key, code, KeyValues.Down);
                }
                for (const code of [...step.codes].reverse()) {
                    this.sink.emit(EventTypes.Key, code, KeyValues.Up);
                }
                this.sink.sync();
                return;

            case "mouse_click": {
                const count = Math.max(1, step.count);
                for (let i = 0; i < count; i++) {
                    this.button(step.button, "tap");
                }
                return;
            }

            case "mouse_button":
                this.button(step.button, step.action);
                return;

            case "mouse_move":
                if (step.mode !== "relative") {
                    throw new UnsupportedModeError(step.mode);
                }
                if (step.dx !== 0) this.sink.emit(EventTypes.Rel, RelativeAxes.X, step.dx);
                if (step.dy !== 0) this.sink.emit(EventTypes.Rel, RelativeAxes.Y, step.dy);
                this.sink.sync();
                return;

            case "mouse_scroll":
                if (step.dy !== 0) {
                    this.sink.emit(EventTypes.Rel, RelativeAxes.Wheel, step.dy);
                    this.sink.sync();
                }
                return;

            default: {
                const unknown: never = step;
                throw new UnknownStepTypeError(stepTypeOf(unknown));
            }
        }
    }

    private button(code: number, action: KeyAction): void {
        switch (action) {
            case "tap":
                this.sink.emit(EventTypes.Key, code, KeyValues.Down);
                this.sink.emit(EventTypes.Key, code, KeyValues.Up);
                this.sink.sync();
                return;
            case "press":
                this.sink.emit(EventTypes.Key, code, KeyValues.Down);
                this.sink.sync();
                this.ledger.markDown(code);
                return;
            case "release":
                this.sink.emit(EventTypes.Key, code, KeyValues.Up);
                this.sink.sync();
                this.ledger.markUp(code);
                return;
        }
    }
}

function stepTypeOf(value: unknown): unknown {
    if (typeof value === "object" && value !== null && "type" in value) {
        return value.type;
    }
    return value;
}
