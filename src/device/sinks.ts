import { closeSync, openSync, writeSync } from "node:fs";
import { DeviceWriteError } from "../errors.js";
import { EventTypes, type EventType, RelativeAxes, SYN_REPORT, keyName } from "../keys.js";
import type { OutputSink } from "../core/types.js";
import { encodeInputEvent } from "./evdev.js";

/**
 * Injects events into an existing evdev node (for example a virtual device
 * created by `uinput` tooling) by writing `input_event` records to it.
 */
export class EvdevWriterSink implements OutputSink {
    private fd: number | null;

    constructor(public readonly path: string) {
        try {
            // "r+" opens an existing node only, it never creates one
            this.fd = openSync(path, "r+");
        } catch (error) {
            throw new DeviceWriteError(`Cannot open output device ${path}`, { cause: error });
        }
    }

    public emit(type: EventType, code: number, value: number): void {
        this.write(encodeInputEvent(type, code, value));
    }

    public sync(): void {
        this.write(encodeInputEvent(EventTypes.Syn, SYN_REPORT, 0));
    }

    public close(): void {
        if (this.fd !== null) {
            closeSync(this.fd);
            this.fd = null;
        }
    }

    private write(record: Buffer): void {
        if (this.fd === null) {
            throw new DeviceWriteError(`Output device ${this.path} is closed`);
        }
        try {
            writeSync(this.fd, record);
        } catch (error) {
            throw new DeviceWriteError(`Write to ${this.path} failed`, { cause: error });
        }
    }
}

const AxisNames: Record<number, string> = {
    [RelativeAxes.X]: "REL_X",
    [RelativeAxes.Y]: "REL_Y",
    [RelativeAxes.HorizontalWheel]: "REL_HWHEEL",
    [RelativeAxes.Wheel]: "REL_WHEEL",
};

/** Renders one output event the way `evtest` would name it. */
export function formatOutputEvent(type: EventType, code: number, value: number): string {
    switch (type) {
        case EventTypes.Key:
            return `EV_KEY ${keyName(code)} ${value}`;
        case EventTypes.Rel:
            return `EV_REL ${AxisNames[code] ?? `#${code}`} ${value}`;
        case EventTypes.Syn:
            return "EV_SYN SYN_REPORT";
    }
}

/**
 * Dry-run sink: prints every event instead of touching a device.
 */
export class ConsoleSink implements OutputSink {
    private static readonly LOG_PREFIX = "Output:";

    public emit(type: EventType, code: number, value: number): void {
        console.log(`${ConsoleSink.LOG_PREFIX} ${formatOutputEvent(type, code, value)}`);
    }

    public sync(): void {
        console.log(`${ConsoleSink.LOG_PREFIX} ${formatOutputEvent(EventTypes.Syn, SYN_REPORT, 0)}`);
    }
}
