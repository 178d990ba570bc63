import { readFile } from "node:fs/promises";
import { z } from "zod";
import { type HotkeyRequirement, parseHotkey } from "./core/chord.js";
import type { MacroStep } from "./core/steps.js";
import { ConfigError, MacroError } from "./errors.js";
import { Buttons, parseMacroKey } from "./keys.js";

/** Relative axis values travel as the `__s32 value` of an input_event. */
const AxisDelta = z.number().int().min(-0x8000_0000).max(0x7fff_ffff).default(0);

const KeyActionSchema = z.enum(["tap", "press", "release"]);
const MouseButtonSchema = z.enum(["left", "right", "middle"]);

export const StepSchema = z.discriminatedUnion("type", [
    z.object({
        type: z.literal("wait"),
        seconds: z.number().nonnegative().default(0),
    }),
    z.object({
        type: z.literal("key"),
        key: z.string().min(1),
        action: KeyActionSchema.default("tap"),
    }),
    z.object({
        type: z.literal("combo"),
        keys: z.array(z.string().min(1)).default([]),
    }),
    z.object({
        type: z.literal("mouse_click"),
        button: MouseButtonSchema.default("left"),
        count: z.number().int().default(1),
    }),
    z.object({
        type: z.literal("mouse_button"),
        button: MouseButtonSchema.default("left"),
        action: KeyActionSchema.default("tap"),
    }),
    z.object({
        type: z.literal("mouse_move"),
        x: AxisDelta,
        y: AxisDelta,
        mode: z.enum(["relative", "absolute"]).default("relative"),
    }),
    z.object({
        type: z.literal("mouse_scroll"),
        dy: AxisDelta,
    }),
]);
export type StepConfig = z.infer<typeof StepSchema>;

const optionalString = z
    .string()
    .trim()
    .nullish()
    .transform(value => (value ? value : undefined));

export const ConfigSchema = z.object({
    trigger_hotkey: z.string({ required_error: "is required" }).trim().min(1, "is required"),
    quit_hotkey: optionalString,
    loop: z.boolean().default(false),
    input_device: optionalString,
    output_device: optionalString,
    trigger_mode: z.enum(["pause", "toggle"]).default("pause"),
    macro: z.array(StepSchema).default([]),
});
export type MacroConfig = z.infer<typeof ConfigSchema>;

export type TriggerMode = MacroConfig["trigger_mode"];

/** Validated configuration with hotkeys and key references resolved to codes. */
export interface MacroSettings {
    triggerSpec: string;
    trigger: HotkeyRequirement;
    quitSpec: string | null;
    quit: HotkeyRequirement | null;
    loop: boolean;
    triggerMode: TriggerMode;
    inputDevice: string | null;
    outputDevice: string | null;
    steps: MacroStep[];
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
}

/** Resolves one validated step object into its executable form. */
export function compileStep(step: StepConfig): MacroStep {
    switch (step.type) {
        case "wait":
            return { type: "wait", seconds: step.seconds };
        case "key":
            return { type: "key", code: parseMacroKey(step.key), action: step.action };
        case "combo":
            return { type: "combo", codes: step.keys.map(parseMacroKey) };
        case "mouse_click":
            return { type: "mouse_click", button: Buttons[step.button], count: step.count };
        case "mouse_button":
            return { type: "mouse_button", button: Buttons[step.button], action: step.action };
        case "mouse_move":
            return { type: "mouse_move", dx: step.x, dy: step.y, mode: step.mode };
        case "mouse_scroll":
            return { type: "mouse_scroll", dy: step.dy };
    }
}

function compileWith<T>(path: string, compile: () => T): T {
    try {
        return compile();
    } catch (error) {
        if (error instanceof MacroError) {
            throw new ConfigError(`${path}: ${error.message}`, { cause: error });
        }
        throw error;
    }
}

/**
 * Validates a parsed JSON document and resolves it into `MacroSettings`.
 * @throws ConfigError describing the first offending field(s).
 */
export function compileConfig(raw: unknown): MacroSettings {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
    }
    const config = result.data;
    const quitSpec = config.quit_hotkey ?? null;

    return {
        triggerSpec: config.trigger_hotkey,
        trigger: compileWith("trigger_hotkey", () => parseHotkey(config.trigger_hotkey)),
        quitSpec,
        quit: quitSpec === null ? null : compileWith("quit_hotkey", () => parseHotkey(quitSpec)),
        loop: config.loop,
        triggerMode: config.trigger_mode,
        inputDevice: config.input_device ?? null,
        outputDevice: config.output_device ?? null,
        steps: config.macro.map((step, index) => compileWith(`macro.${index}`, () => compileStep(step))),
    };
}

/**
 * Reads and compiles a JSON configuration file.
 * @throws ConfigError when the file cannot be read, is not JSON, or is invalid.
 */
export async function loadConfig(path: string): Promise<MacroSettings> {
    let text: string;
    try {
        text = await readFile(path, "utf8");
    } catch (error) {
        throw new ConfigError(`Cannot read config file ${path}`, { cause: error });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigError(`Config file ${path} is not valid JSON`, { cause: error });
    }
    return compileConfig(raw);
}
