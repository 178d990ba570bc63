import { createReadStream } from "node:fs";
import { readFile, readdir, realpath } from "node:fs/promises";
import { basename, join } from "node:path";
import { Observable } from "rxjs";
import { DeviceNotFoundError, DeviceReadError } from "../errors.js";
import { keyCode } from "../keys.js";
import type { InputEvent } from "../core/types.js";

/**
 * Size of `struct input_event` on 64-bit Linux:
 * `struct timeval` (two 64-bit longs), `__u16 type`, `__u16 code`, `__s32 value`.
 */
export const INPUT_EVENT_SIZE = 24;

export function encodeInputEvent(type: number, code: number, value: number, timestampUs = 0): Buffer {
    const record = Buffer.alloc(INPUT_EVENT_SIZE);
    record.writeBigInt64LE(BigInt(Math.floor(timestampUs / 1_000_000)), 0);
    record.writeBigInt64LE(BigInt(timestampUs % 1_000_000), 8);
    record.writeUInt16LE(type, 16);
    record.writeUInt16LE(code, 18);
    record.writeInt32LE(value, 20);
    return record;
}

export function decodeInputEvent(record: Buffer, offset = 0): InputEvent {
    const seconds = record.readBigInt64LE(offset);
    const micros = record.readBigInt64LE(offset + 8);
    return {
        type: record.readUInt16LE(offset + 16),
        code: record.readUInt16LE(offset + 18),
        value: record.readInt32LE(offset + 20),
        timestampUs: Number(seconds * 1_000_000n + micros),
    };
}

/**
 * Splits a byte stream into `input_event` records. Reads from a device node
 * normally deliver whole records, but a trailing partial record is kept until
 * the next chunk completes it.
 */
export class InputEventDecoder {
    private pending: Buffer = Buffer.alloc(0);

    public push(chunk: Buffer): InputEvent[] {
        const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
        const events: InputEvent[] = [];
        let offset = 0;
        while (offset + INPUT_EVENT_SIZE <= data.length) {
            events.push(decodeInputEvent(data, offset));
            offset += INPUT_EVENT_SIZE;
        }
        this.pending = Buffer.from(data.subarray(offset));
        return events;
    }

    /** Bytes of an incomplete record waiting for more data. */
    public get bufferedBytes(): number {
        return this.pending.length;
    }
}

/**
 * Streams the raw events of an evdev device node. The stream errors with
 * `DeviceReadError` if the device cannot be read and completes if it goes away.
 * Unsubscribing closes the device.
 */
export function readInputEvents(path: string): Observable<InputEvent> {
    return new Observable<InputEvent>(subscriber => {
        const decoder = new InputEventDecoder();
        const stream = createReadStream(path, { highWaterMark: INPUT_EVENT_SIZE * 64 });

        stream.on("data", chunk => {
            const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
            for (const event of decoder.push(bytes)) {
                subscriber.next(event);
            }
        });
        stream.on("error", error => {
            subscriber.error(new DeviceReadError(`Failed to read input device ${path}: ${error.message}`, { cause: error }));
        });
        stream.on("end", () => subscriber.complete());

        return () => {
            stream.destroy();
        };
    });
}

/**
 * Parses a sysfs capability bitmap such as `"3 0 0 fffffffffef 400000"`.
 * Words are hexadecimal `unsigned long`s, most significant word first.
 * @returns The set of bit numbers that are set.
 */
export function parseCapabilityBitmap(text: string, wordBits = 64): Set<number> {
    const words = text.trim().split(/\s+/).filter(word => word !== "").reverse();
    const bits = new Set<number>();
    words.forEach((word, index) => {
        let value = BigInt(`0x${word}`);
        let bit = 0;
        while (value > 0n) {
            if (value & 1n) {
                bits.add(index * wordBits + bit);
            }
            value >>= 1n;
            bit++;
        }
    });
    return bits;
}

export interface InputDeviceInfo {
    path: string;
    name: string | null;
}

export interface DiscoveryOptions {
    /** Explicit device path; skips the scan. */
    explicitPath?: string | null;
    /** @default "/sys/class/input" */
    sysfsRoot?: string;
    /** @default "/dev/input" */
    devRoot?: string;
}

async function readDeviceName(sysfsRoot: string, eventName: string): Promise<string | null> {
    try {
        return (await readFile(join(sysfsRoot, eventName, "device", "name"), "utf8")).trim();
    } catch {
        return null;
    }
}

/** `/dev/input/by-id/...-event-kbd` links resolve to their `eventN` node. */
async function resolveEventName(path: string): Promise<string> {
    try {
        return basename(await realpath(path));
    } catch {
        return basename(path);
    }
}

function eventNumber(name: string): number {
    return Number(name.slice("event".length));
}

/**
 * Picks the keyboard to listen on: the explicit path when given, otherwise the
 * lowest-numbered `eventN` whose key capabilities include both KEY_A and KEY_LEFTCTRL.
 * @throws DeviceNotFoundError when no device qualifies.
 */
export async function findKeyboardDevice(options: DiscoveryOptions = {}): Promise<InputDeviceInfo> {
    const sysfsRoot = options.sysfsRoot ?? "/sys/class/input";
    const devRoot = options.devRoot ?? "/dev/input";

    if (options.explicitPath) {
        const eventName = await resolveEventName(options.explicitPath);
        return { path: options.explicitPath, name: await readDeviceName(sysfsRoot, eventName) };
    }

    let entries: string[];
    try {
        entries = await readdir(sysfsRoot);
    } catch (error) {
        throw new DeviceNotFoundError(`Cannot list input devices in ${sysfsRoot}`, { cause: error });
    }

    const letterA = keyCode("KEY_A");
    const leftCtrl = keyCode("KEY_LEFTCTRL");
    const candidates = entries.filter(name => /^event\d+$/.test(name)).sort((a, b) => eventNumber(a) - eventNumber(b));

    for (const eventName of candidates) {
        let bitmap: string;
        try {
            bitmap = await readFile(join(sysfsRoot, eventName, "device", "capabilities", "key"), "utf8");
        } catch {
            continue;
        }
        const keys = parseCapabilityBitmap(bitmap);
        if (letterA !== undefined && leftCtrl !== undefined && keys.has(letterA) && keys.has(leftCtrl)) {
            return { path: join(devRoot, eventName), name: await readDeviceName(sysfsRoot, eventName) };
        }
    }

    throw new DeviceNotFoundError(
        'Keyboard device not found. Set "input_device" in the config to a path such as /dev/input/by-id/...-event-kbd',
    );
}
