import { Observable, Subscription } from "rxjs";
import type { MacroSettings } from "./config.js";
import { PlaybackController } from "./core/controller.js";
import { type HotkeyAction, InputListener } from "./core/listener.js";
import type { InputEvent, OutputSink } from "./core/types.js";

export interface MacroAppOptions {
    settings: MacroSettings;
    sink: OutputSink;
    debugMode?: boolean;
}

/** Exit code returned by `run()` after the quit hotkey or a clean end of input. */
export const EXIT_OK = 0;
/** Exit code returned by `run()` when the input stream fails. */
export const EXIT_INPUT_FAILED = 1;

/**
 * Wires the input listener to the playback controller for one configuration.
 * All collaborators arrive through the constructor; nothing is process-global.
 */
export class MacroApp {
    private static readonly LOG_PREFIX = "MacroApp:";

    public readonly controller: PlaybackController;
    public readonly listener: InputListener;
    private readonly settings: MacroSettings;
    private subscription: Subscription | null = null;

    constructor(options: MacroAppOptions) {
        this.settings = options.settings;
        this.controller = new PlaybackController({
            steps: options.settings.steps,
            loop: options.settings.loop,
            sink: options.sink,
            debugMode: options.debugMode,
        });
        this.listener = new InputListener({
            trigger: options.settings.trigger,
            quit: options.settings.quit,
            debugMode: options.debugMode,
        });
    }

    /**
     * Listens until the quit hotkey fires or the input stream ends, then stops
     * playback and waits for the worker to release everything it held.
     * @returns The process exit code.
     */
    public run(events$: Observable<InputEvent>): Promise<number> {
        return new Promise<number>(resolve => {
            const finish = (code: number) => {
                this.shutdown().then(() => resolve(code), () => resolve(code));
            };
            this.subscription = this.listener.actions(events$).subscribe({
                next: action => this.dispatch(action),
                error: (error: unknown) => {
                    console.error(`${MacroApp.LOG_PREFIX} Input stream failed:`, error);
                    finish(EXIT_INPUT_FAILED);
                },
                complete: () => finish(EXIT_OK),
            });
        });
    }

    /** Stops listening and playback; resolves once the worker has exited. */
    public async shutdown(): Promise<void> {
        this.subscription?.unsubscribe();
        this.subscription = null;
        this.controller.stop();
        await this.controller.whenIdle();
    }

    private dispatch(action: HotkeyAction): void {
        if (action === "quit") {
            // stop right away; run() completes the shutdown when the stream ends
            this.controller.stop();
            return;
        }
        if (this.settings.triggerMode === "toggle") {
            this.controller.toggle();
        } else {
            this.controller.trigger();
        }
    }
}
