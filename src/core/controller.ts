import { BehaviorSubject, Observable, Subject, distinctUntilChanged } from "rxjs";
import { setImmediate as nextTurn } from "node:timers/promises";
import { EventTypes, KeyValues, keyName } from "../keys.js";
import { HeldKeyLedger } from "./ledger.js";
import { PlaybackSignals } from "./signals.js";
import { type MacroStep, StepInterpreter, describeStep } from "./steps.js";
import type { OutputSink, PlaybackState } from "./types.js";

export interface PlaybackOptions {
    steps: readonly MacroStep[];
    /** Repeat the sequence until stopped. */
    loop: boolean;
    sink: OutputSink;
    debugMode?: boolean;
}

/**
 * Owns the macro lifecycle: idle → running ⇄ paused → idle.
 *
 * At most one worker runs per controller. The public operations are synchronous
 * and never wait for the worker; they only flip the shared signals and reconcile
 * the held-key ledger so nothing stays pressed across a pause or stop.
 */
export class PlaybackController {
    private static readonly LOG_PREFIX = "Playback:";

    private readonly steps: readonly MacroStep[];
    private readonly loop: boolean;
    private readonly sink: OutputSink;
    private readonly ledger: HeldKeyLedger;
    private readonly interpreter: StepInterpreter;
    private readonly signals = new PlaybackSignals();
    private readonly state$ = new BehaviorSubject<PlaybackState>("idle");
    private readonly error$ = new Subject<Error>();
    private debugMode: boolean;

    private worker: Promise<void> | null = null;
    /** Codes released by `pause()`, pressed again by `resume()`. */
    private pausedRestore: number[] = [];

    constructor(options: PlaybackOptions) {
        this.steps = options.steps;
        this.loop = options.loop;
        this.sink = options.sink;
        this.debugMode = options.debugMode ?? false;
        this.ledger = new HeldKeyLedger(this.sink);
        this.interpreter = new StepInterpreter(this.sink, this.ledger);
    }

    /** Emits the current state on subscribe and every transition after it. */
    public get onStateChange$(): Observable<PlaybackState> {
        return this.state$.pipe(distinctUntilChanged());
    }

    /** Errors that aborted a run. The controller is idle again when they arrive. */
    public get onError$(): Observable<Error> {
        return this.error$.asObservable();
    }

    public getState(): PlaybackState {
        return this.state$.getValue();
    }

    /** Codes the macro currently holds down. */
    public heldCodes(): number[] {
        return this.ledger.snapshot();
    }

    public isRunning(): boolean {
        return this.worker !== null;
    }

    public isPaused(): boolean {
        return this.isRunning() && !this.signals.isOpen;
    }

    public setDebugMode(enable: boolean): void {
        this.debugMode = enable;
    }

    /** Resolves when the current worker (if any) has exited and cleaned up. */
    public whenIdle(): Promise<void> {
        return this.worker ?? Promise.resolve();
    }

    public start(): void {
        if (this.isRunning()) {
            return;
        }
        this.signals.reset();
        this.pausedRestore = [];
        this.worker = this.run().then(failure => {
            this.worker = null;
            this.state$.next("idle");
            this.log("Stopped.");
            if (failure) {
                this.error$.next(failure);
            }
        });
        this.state$.next("running");
        this.log(`Started (${this.steps.length} step(s), loop: ${this.loop}).`);
    }

    /**
     * Closes the pause gate and releases everything the macro holds. The released
     * codes are remembered and pressed again on `resume()`.
     */
    public pause(): void {
        if (!this.isRunning() || this.isPaused()) {
            return;
        }
        this.signals.closeGate();
        this.pausedRestore = this.ledger.releaseAll();
        this.state$.next("paused");
        this.log(`Paused, released [${this.pausedRestore.map(keyName).join(", ")}].`);
    }

    public resume(): void {
        if (!this.isPaused()) {
            return;
        }
        for (const code of this.pausedRestore) {
            try {
                this.sink.emit(EventTypes.Key, code, KeyValues.Down);
                this.ledger.markDown(code);
            } catch (error) {
                console.warn(`${PlaybackController.LOG_PREFIX} Failed to press ${keyName(code)} again on resume:`, error);
            }
        }
        try {
            this.sink.sync();
        } catch (error) {
            console.warn(`${PlaybackController.LOG_PREFIX} Failed to sync on resume:`, error);
        }
        this.pausedRestore = [];
        this.signals.openGate();
        this.state$.next("running");
        this.log("Resumed.");
    }

    /**
     * Requests cancellation and releases held codes. Idempotent. The worker exits
     * at its next step boundary (or immediately from a wait) and releases again.
     */
    public stop(): void {
        this.signals.cancel();
        this.signals.openGate();
        this.pausedRestore = [];
        this.ledger.releaseAll();
        if (this.isRunning()) {
            this.log("Stopping...");
        }
    }

    /** start → pause → resume cycle used by the trigger hotkey. */
    public trigger(): void {
        if (!this.isRunning()) {
            this.start();
        } else if (this.isPaused()) {
            this.resume();
        } else {
            this.pause();
        }
    }

    /** start/stop without pausing. */
    public toggle(): void {
        if (this.isRunning()) {
            this.stop();
        } else {
            this.start();
        }
    }

    /** Plays the sequence; resolves with the error that aborted it, if any. */
    private async run(): Promise<Error | undefined> {
        try {
            do {
                for (const step of this.steps) {
                    if (!(await this.signals.untilRunnable())) {
                        return undefined;
                    }
                    if (this.debugMode) {
                        console.log(`${PlaybackController.LOG_PREFIX} Step: ${describeStep(step)}`);
                    }
                    await this.interpreter.execute(step, this.signals);
                    await nextTurn();
                }
            } while (this.loop && this.steps.length > 0 && !this.signals.isCancelled);
            return undefined;
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            console.error(`${PlaybackController.LOG_PREFIX} Macro run aborted:`, failure);
            return failure;
        } finally {
            this.ledger.releaseAll();
        }
    }

    private log(message: string): void {
        if (this.debugMode) {
            console.log(`${PlaybackController.LOG_PREFIX} ${message}`);
        }
    }
}
