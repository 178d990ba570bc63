export {
    EXIT_INPUT_FAILED,
    EXIT_OK,
    MacroApp,
    type MacroAppOptions,
} from "./app.js";

export {
    ConfigSchema,
    StepSchema,
    compileConfig,
    compileStep,
    loadConfig,
    type MacroConfig,
    type MacroSettings,
    type StepConfig,
    type TriggerMode,
} from "./config.js";

export {
    type AlternativeSet,
    type HotkeyRequirement,
    type PressedSet,
    isSatisfied,
    parseHotkey,
} from "./core/chord.js";

export { PlaybackController, type PlaybackOptions } from "./core/controller.js";
export { HeldKeyLedger } from "./core/ledger.js";
export {
    type EdgeState,
    type HotkeyAction,
    INITIAL_EDGE,
    InputListener,
    type ListenerOptions,
    nextEdge,
    trackPressed,
} from "./core/listener.js";
export { PlaybackSignals } from "./core/signals.js";
export {
    type KeyAction,
    type MacroStep,
    type MacroStepType,
    type MoveMode,
    StepInterpreter,
    describeStep,
} from "./core/steps.js";
export type { InputEvent, OutputSink, PlaybackState } from "./core/types.js";

export {
    INPUT_EVENT_SIZE,
    InputEventDecoder,
    decodeInputEvent,
    encodeInputEvent,
    findKeyboardDevice,
    parseCapabilityBitmap,
    readInputEvents,
    type DiscoveryOptions,
    type InputDeviceInfo,
} from "./device/evdev.js";
export { ConsoleSink, EvdevWriterSink, formatOutputEvent } from "./device/sinks.js";

export * from "./errors.js";
export * from "./keys.js";
