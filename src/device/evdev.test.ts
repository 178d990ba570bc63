import { after, before, describe, it } from "node:test";
import assert from "node:assert";
import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { lastValueFrom, toArray } from "rxjs";
import { DeviceNotFoundError, DeviceReadError } from "../errors.js";
import { EventTypes, KeyValues } from "../keys.js";
import { code } from "../testutils.js";
import {
    INPUT_EVENT_SIZE,
    InputEventDecoder,
    decodeInputEvent,
    encodeInputEvent,
    findKeyboardDevice,
    parseCapabilityBitmap,
    readInputEvents,
} from "./evdev.js";

/** Capability word with KEY_LEFTCTRL (29) and KEY_A (30) set. */
const KEYBOARD_CAPS = "60000000";

describe("input_event records", () => {
    it("should encode little-endian fields at their kernel offsets", () => {
        const record = encodeInputEvent(EventTypes.Key, 30, 1, 1_500_000);
        assert.strictEqual(record.length, INPUT_EVENT_SIZE);
        assert.strictEqual(record.readBigInt64LE(0), 1n);
        assert.strictEqual(record.readBigInt64LE(8), 500_000n);
        assert.strictEqual(record.readUInt16LE(16), 1);
        assert.strictEqual(record.readUInt16LE(18), 30);
        assert.strictEqual(record.readInt32LE(20), 1);
    });

    it("should decode negative values and timestamps", () => {
        const event = decodeInputEvent(encodeInputEvent(EventTypes.Rel, 8, -3, 2_000_042));
        assert.deepStrictEqual(event, { type: EventTypes.Rel, code: 8, value: -3, timestampUs: 2_000_042 });
    });
});

describe("InputEventDecoder", () => {
    it("should decode whole records from one chunk", () => {
        const decoder = new InputEventDecoder();
        const chunk = Buffer.concat([
            encodeInputEvent(EventTypes.Key, code("KEY_A"), KeyValues.Down),
            encodeInputEvent(EventTypes.Syn, 0, 0),
        ]);
        const events = decoder.push(chunk);
        assert.deepStrictEqual(events.map(event => [event.type, event.code, event.value]), [
            [EventTypes.Key, code("KEY_A"), KeyValues.Down],
            [EventTypes.Syn, 0, 0],
        ]);
        assert.strictEqual(decoder.bufferedBytes, 0);
    });

    it("should hold a partial record until the rest arrives", () => {
        const decoder = new InputEventDecoder();
        const bytes = Buffer.concat([
            encodeInputEvent(EventTypes.Key, code("KEY_B"), KeyValues.Down),
            encodeInputEvent(EventTypes.Key, code("KEY_B"), KeyValues.Up),
        ]);

        assert.strictEqual(decoder.push(bytes.subarray(0, 30)).length, 1);
        assert.strictEqual(decoder.bufferedBytes, 6);
        assert.deepStrictEqual(decoder.push(bytes.subarray(30, 40)), []);
        assert.strictEqual(decoder.bufferedBytes, 16);

        const rest = decoder.push(bytes.subarray(40));
        assert.strictEqual(rest.length, 1);
        assert.strictEqual(rest[0].code, code("KEY_B"));
        assert.strictEqual(rest[0].value, KeyValues.Up);
        assert.strictEqual(decoder.bufferedBytes, 0);
    });
});

describe("parseCapabilityBitmap", () => {
    it("should number bits from the least significant word", () => {
        assert.deepStrictEqual([...parseCapabilityBitmap("5 60000000\n")].sort((a, b) => a - b), [29, 30, 64, 66]);
    });

    it("should honour the word size", () => {
        assert.deepStrictEqual([...parseCapabilityBitmap("1 0", 32)], [32]);
    });

    it("should return nothing for an empty bitmap", () => {
        assert.strictEqual(parseCapabilityBitmap("0").size, 0);
    });
});

describe("device files", () => {
    let dir: string;

    before(async () => {
        dir = await mkdtemp(join(tmpdir(), "keymacro-evdev-"));
    });

    after(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    describe("readInputEvents", () => {
        it("should stream the records of a device node and complete at its end", async () => {
            const path = join(dir, "recorded-events");
            await writeFile(path, Buffer.concat([
                encodeInputEvent(EventTypes.Key, code("KEY_LEFTCTRL"), KeyValues.Down),
                encodeInputEvent(EventTypes.Key, code("KEY_E"), KeyValues.Down),
                encodeInputEvent(EventTypes.Syn, 0, 0),
            ]));

            const events = await lastValueFrom(readInputEvents(path).pipe(toArray()));
            assert.deepStrictEqual(events.map(event => event.code), [code("KEY_LEFTCTRL"), code("KEY_E"), 0]);
        });

        it("should fail with DeviceReadError when the node cannot be opened", async () => {
            await assert.rejects(lastValueFrom(readInputEvents(join(dir, "no-such-device"))), DeviceReadError);
        });
    });

    describe("findKeyboardDevice", () => {
        let sysfsRoot: string;
        let devRoot: string;

        const addDevice = async (eventName: string, name: string, keyCaps: string | null) => {
            const device = join(sysfsRoot, eventName, "device");
            await mkdir(join(device, "capabilities"), { recursive: true });
            await writeFile(join(device, "name"), `${name}\n`);
            if (keyCaps !== null) {
                await writeFile(join(device, "capabilities", "key"), `${keyCaps}\n`);
            }
            await writeFile(join(devRoot, eventName), "");
        };

        before(async () => {
            sysfsRoot = join(dir, "sys");
            devRoot = join(dir, "dev");
            await mkdir(sysfsRoot, { recursive: true });
            await mkdir(devRoot, { recursive: true });
            await addDevice("event0", "Power Button", "0");
            await addDevice("event1", "Lid Switch", null);
            await addDevice("event10", "Second Keyboard", KEYBOARD_CAPS);
            await addDevice("event3", "Test Keyboard", `1 ${KEYBOARD_CAPS}`);
            await mkdir(join(sysfsRoot, "mouse0"));
            await symlink(join(devRoot, "event3"), join(devRoot, "usb-test-event-kbd"));
        });

        it("should pick the lowest-numbered device with letter and control keys", async () => {
            const device = await findKeyboardDevice({ sysfsRoot, devRoot });
            assert.deepStrictEqual(device, { path: join(devRoot, "event3"), name: "Test Keyboard" });
        });

        it("should use an explicit path and name it through its event node", async () => {
            const explicitPath = join(devRoot, "usb-test-event-kbd");
            const device = await findKeyboardDevice({ explicitPath, sysfsRoot, devRoot });
            assert.deepStrictEqual(device, { path: explicitPath, name: "Test Keyboard" });
        });

        it("should accept an explicit path without sysfs information", async () => {
            const explicitPath = join(dir, "elsewhere", "kbd");
            const device = await findKeyboardDevice({ explicitPath, sysfsRoot, devRoot });
            assert.deepStrictEqual(device, { path: explicitPath, name: null });
        });

        it("should fail when no device has keyboard capabilities", async () => {
            const emptyRoot = join(dir, "sys-empty");
            await mkdir(join(emptyRoot, "event0", "device", "capabilities"), { recursive: true });
            await writeFile(join(emptyRoot, "event0", "device", "capabilities", "key"), "0\n");
            await assert.rejects(findKeyboardDevice({ sysfsRoot: emptyRoot, devRoot }), {
                name: "DeviceNotFoundError",
                message: /^Keyboard device not found/,
            });
        });

        it("should fail when the device directory cannot be listed", async () => {
            await assert.rejects(
                findKeyboardDevice({ sysfsRoot: join(dir, "missing"), devRoot }),
                DeviceNotFoundError,
            );
        });
    });
});
