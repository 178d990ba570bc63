import { afterEach, beforeEach, describe, it, mock } from "node:test";
import assert from "node:assert";
import { code, createRecordingSink, type RecordingSink, sync, up } from "../testutils.js";
import { HeldKeyLedger } from "./ledger.js";

describe("HeldKeyLedger", () => {
    let sink: RecordingSink;
    let ledger: HeldKeyLedger;

    beforeEach(() => {
        sink = createRecordingSink();
        ledger = new HeldKeyLedger(sink);
    });

    afterEach(() => {
        mock.restoreAll();
    });

    it("should track presses and releases", () => {
        ledger.markDown(code("KEY_A"));
        ledger.markDown(code("BTN_LEFT"));
        ledger.markUp(code("KEY_A"));
        assert.deepStrictEqual(ledger.snapshot(), [code("BTN_LEFT")]);
        assert.strictEqual(ledger.has(code("KEY_A")), false);
        assert.strictEqual(ledger.size, 1);
    });

    it("should ignore releases of codes never pressed", () => {
        ledger.markUp(code("KEY_Z"));
        assert.deepStrictEqual(ledger.snapshot(), []);
    });

    it("should release every outstanding code once, then sync", () => {
        ledger.markDown(code("KEY_A"));
        ledger.markDown(code("KEY_B"));
        ledger.markDown(code("KEY_C"));
        ledger.markUp(code("KEY_B"));

        const released = ledger.releaseAll();

        assert.deepStrictEqual(released, [code("KEY_A"), code("KEY_C")]);
        assert.deepStrictEqual(sink.events, [up(code("KEY_A")), up(code("KEY_C")), sync]);
        assert.strictEqual(ledger.size, 0);
    });

    it("should treat a second releaseAll as a no-op", () => {
        ledger.markDown(code("KEY_A"));
        ledger.releaseAll();
        sink.clear();

        assert.deepStrictEqual(ledger.releaseAll(), []);
        assert.deepStrictEqual(sink.events, []);
    });

    it("should keep releasing after an individual write fails", () => {
        const warn = mock.method(console, "warn", () => {});
        ledger.markDown(code("KEY_A"));
        ledger.markDown(code("KEY_B"));
        ledger.markDown(code("KEY_C"));
        sink.failingCodes.add(code("KEY_B"));

        const released = ledger.releaseAll();

        assert.deepStrictEqual(released, [code("KEY_A"), code("KEY_B"), code("KEY_C")]);
        assert.deepStrictEqual(sink.events, [up(code("KEY_A")), up(code("KEY_C")), sync]);
        assert.strictEqual(warn.mock.callCount(), 1);
        assert.ok(String(warn.mock.calls[0].arguments[0]).includes("Failed to release KEY_B"));
        assert.strictEqual(ledger.size, 0);
    });

    it("should not throw when the final sync fails", () => {
        const warn = mock.method(console, "warn", () => {});
        ledger.markDown(code("KEY_A"));
        sink.failSync = true;

        assert.deepStrictEqual(ledger.releaseAll(), [code("KEY_A")]);
        assert.deepStrictEqual(sink.events, [up(code("KEY_A"))]);
        assert.strictEqual(warn.mock.callCount(), 1);
    });
});
