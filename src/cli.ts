import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { fromEvent, merge, map, skip, take } from "rxjs";
import { EXIT_OK, MacroApp } from "./app.js";
import { type MacroSettings, loadConfig } from "./config.js";
import type { OutputSink, PlaybackState } from "./core/types.js";
import { findKeyboardDevice, readInputEvents } from "./device/evdev.js";
import { ConsoleSink, EvdevWriterSink } from "./device/sinks.js";
import { ConfigError, MacroError } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "macros.json";

export interface CliOptions {
    configPath: string;
    dryRun: boolean;
    debug: boolean;
    help: boolean;
}

export const USAGE = `Usage: keymacro [config] [-c|--config <path>] [--dry-run] [--debug]

Plays the macro from a JSON config whenever the trigger hotkey is pressed.
  config, -c, --config  path to the macro config (default: ./${DEFAULT_CONFIG_FILE})
  --dry-run             print output events instead of writing to a device
  --debug               log hotkeys, state changes and every step
  -h, --help            show this help`;

function parseOrThrow(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                config: { type: "string", short: "c" },
                "dry-run": { type: "boolean", default: false },
                debug: { type: "boolean", default: false },
                help: { type: "boolean", short: "h", default: false },
            },
        });
    } catch (error) {
        throw new ConfigError(error instanceof Error ? error.message : String(error), { cause: error });
    }
}

/**
 * Parses command line arguments. `--config` wins over the positional path.
 * @throws ConfigError for unknown options or extra positionals.
 */
export function parseCliArgs(argv: string[], cwd = process.cwd()): CliOptions {
    const parsed = parseOrThrow(argv);
    if (parsed.positionals.length > 1) {
        throw new ConfigError(`Unexpected arguments: ${parsed.positionals.slice(1).join(" ")}`);
    }
    const configPath = parsed.values.config ?? parsed.positionals[0] ?? DEFAULT_CONFIG_FILE;
    return {
        configPath: resolve(cwd, configPath),
        dryRun: parsed.values["dry-run"] ?? false,
        debug: parsed.values.debug ?? false,
        help: parsed.values.help ?? false,
    };
}

const StateMessages: Record<PlaybackState, string> = {
    idle: "stopped",
    running: "running",
    paused: "paused",
};

function openSink(settings: MacroSettings, dryRun: boolean): OutputSink & { close?: () => void } {
    if (dryRun || settings.outputDevice === null) {
        if (!dryRun) {
            console.warn('[macro] no "output_device" configured; printing events instead');
        }
        return new ConsoleSink();
    }
    return new EvdevWriterSink(settings.outputDevice);
}

/**
 * Runs the tool until the quit hotkey, a signal, or the end of input.
 * @returns The process exit code.
 */
export async function main(argv: string[]): Promise<number> {
    let options: CliOptions;
    let settings: MacroSettings;
    try {
        options = parseCliArgs(argv);
        if (options.help) {
            console.log(USAGE);
            return EXIT_OK;
        }
        settings = await loadConfig(options.configPath);
    } catch (error) {
        if (error instanceof MacroError) {
            console.error(`keymacro: ${error.message}`);
            return 1;
        }
        throw error;
    }

    const device = await findKeyboardDevice({ explicitPath: settings.inputDevice });
    const sink = openSink(settings, options.dryRun);
    const app = new MacroApp({ settings, sink, debugMode: options.debug });

    console.log(`[macro] device=${device.path} name=${device.name ?? "unknown"}`);
    console.log(`[macro] trigger=${settings.triggerSpec} quit=${settings.quitSpec ?? ""}`);
    console.log("[macro] listening (evdev)...");

    const stateLog = app.controller.onStateChange$.pipe(skip(1)).subscribe(state => {
        console.log(`[macro] ${StateMessages[state]}`);
    });
    const signals = merge(
        fromEvent(process, "SIGINT").pipe(map(() => 130)),
        fromEvent(process, "SIGTERM").pipe(map(() => 143)),
    ).pipe(take(1));

    try {
        return await new Promise<number>((resolveExit, rejectExit) => {
            const onSignal = signals.subscribe(code => {
                console.log("[macro] quitting...");
                app.shutdown().then(() => resolveExit(code), rejectExit);
            });
            app.run(readInputEvents(device.path)).then(code => {
                onSignal.unsubscribe();
                if (code === EXIT_OK) {
                    console.log("[macro] quitting...");
                }
                resolveExit(code);
            }, rejectExit);
        });
    } finally {
        stateLog.unsubscribe();
        sink.close?.();
    }
}
