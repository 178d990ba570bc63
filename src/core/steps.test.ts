import { beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import { UnknownStepTypeError, UnsupportedModeError } from "../errors.js";
import { RelativeAxes } from "../keys.js";
import { code, createRecordingSink, down, rel, type RecordingSink, sync, up } from "../testutils.js";
import { HeldKeyLedger } from "./ledger.js";
import { PlaybackSignals } from "./signals.js";
import { type MacroStep, StepInterpreter, describeStep } from "./steps.js";

describe("StepInterpreter", () => {
    let sink: RecordingSink;
    let ledger: HeldKeyLedger;
    let signals: PlaybackSignals;
    let interpreter: StepInterpreter;

    const A = code("KEY_A");
    const C = code("KEY_C");
    const CTRL = code("KEY_LEFTCTRL");
    const SHIFT = code("KEY_LEFTSHIFT");
    const LEFT = code("BTN_LEFT");

    beforeEach(() => {
        sink = createRecordingSink();
        ledger = new HeldKeyLedger(sink);
        signals = new PlaybackSignals();
        interpreter = new StepInterpreter(sink, ledger);
    });

    const run = (step: MacroStep) => interpreter.execute(step, signals);

    describe("key steps", () => {
        it("should tap as down, up, sync", async () => {
            await run({ type: "key", code: A, action: "tap" });
            assert.deepStrictEqual(sink.events, [down(A), up(A), sync]);
            assert.deepStrictEqual(ledger.snapshot(), []);
        });

        it("should record a press in the ledger", async () => {
            await run({ type: "key", code: A, action: "press" });
            assert.deepStrictEqual(sink.events, [down(A), sync]);
            assert.deepStrictEqual(ledger.snapshot(), [A]);
        });

        it("should remove a released key from the ledger", async () => {
            await run({ type: "key", code: A, action: "press" });
            await run({ type: "key", code: A, action: "release" });
            assert.deepStrictEqual(sink.events, [down(A), sync, up(A), sync]);
            assert.deepStrictEqual(ledger.snapshot(), []);
        });

        it("should release a key that was never pressed", async () => {
            await run({ type: "key", code: A, action: "release" });
            assert.deepStrictEqual(sink.events, [up(A), sync]);
        });
    });

    describe("combo steps", () => {
        it("should press in order and release in reverse with one sync", async () => {
            await run({ type: "combo", codes: [CTRL, C] });
            assert.deepStrictEqual(sink.events, [down(CTRL), down(C), up(C), up(CTRL), sync]);
        });

        it("should handle three keys", async () => {
            await run({ type: "combo", codes: [CTRL, SHIFT, A] });
            assert.deepStrictEqual(sink.events, [down(CTRL), down(SHIFT), down(A), up(A), up(SHIFT), up(CTRL), sync]);
        });
    });

    describe("mouse steps", () => {
        it("should click count times", async () => {
            await run({ type: "mouse_click", button: LEFT, count: 2 });
            assert.deepStrictEqual(sink.events, [down(LEFT), up(LEFT), sync, down(LEFT), up(LEFT), sync]);
        });

        it("should click at least once", async () => {
            await run({ type: "mouse_click", button: LEFT, count: 0 });
            assert.deepStrictEqual(sink.events, [down(LEFT), up(LEFT), sync]);
        });

        it("should hold and release buttons through the ledger", async () => {
            await run({ type: "mouse_button", button: LEFT, action: "press" });
            assert.deepStrictEqual(ledger.snapshot(), [LEFT]);
            await run({ type: "mouse_button", button: LEFT, action: "release" });
            assert.deepStrictEqual(ledger.snapshot(), []);
            assert.deepStrictEqual(sink.events, [down(LEFT), sync, up(LEFT), sync]);
        });

        it("should move relatively on non-zero axes", async () => {
            await run({ type: "mouse_move", dx: 10, dy: -5, mode: "relative" });
            await run({ type: "mouse_move", dx: 0, dy: 7, mode: "relative" });
            assert.deepStrictEqual(sink.events, [
                rel(RelativeAxes.X, 10), rel(RelativeAxes.Y, -5), sync,
                rel(RelativeAxes.Y, 7), sync,
            ]);
        });

        it("should reject absolute moves", async () => {
            await assert.rejects(run({ type: "mouse_move", dx: 100, dy: 100, mode: "absolute" }), UnsupportedModeError);
            assert.deepStrictEqual(sink.events, []);
        });

        it("should scroll only for a non-zero delta", async () => {
            await run({ type: "mouse_scroll", dy: 0 });
            assert.deepStrictEqual(sink.events, []);
            await run({ type: "mouse_scroll", dy: -3 });
            assert.deepStrictEqual(sink.events, [rel(RelativeAxes.Wheel, -3), sync]);
        });
    });

    describe("cancellation", () => {
        it("should skip device steps once cancelled", async () => {
            signals.cancel();
            await run({ type: "key", code: A, action: "press" });
            await run({ type: "combo", codes: [CTRL, C] });
            await run({ type: "mouse_click", button: LEFT, count: 3 });
            assert.deepStrictEqual(sink.events, []);
            assert.deepStrictEqual(ledger.snapshot(), []);
        });

        it("should still run device steps while paused", async () => {
            signals.closeGate();
            await run({ type: "key", code: A, action: "tap" });
            assert.deepStrictEqual(sink.events, [down(A), up(A), sync]);
        });
    });

    it("should reject step values outside the union", async () => {
        const bogus: MacroStep = JSON.parse('{"type":"teleport"}');
        await assert.rejects(
            interpreter.execute(bogus, signals),
            (error: unknown) => error instanceof UnknownStepTypeError && error.stepType === "teleport",
        );
    });

    it("should describe steps for logs", () => {
        assert.strictEqual(describeStep({ type: "combo", codes: [CTRL, C] }), "combo KEY_LEFTCTRL+KEY_C");
        assert.strictEqual(describeStep({ type: "wait", seconds: 0.5 }), "wait 0.5s");
        assert.strictEqual(describeStep({ type: "mouse_click", button: LEFT, count: 2 }), "click BTN_LEFT x2");
    });
});
