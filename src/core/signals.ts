import { BehaviorSubject, Observable, filter, firstValueFrom, map, merge, race, take, timer } from "rxjs";

/** Longest delay a Node.js timer accepts; longer waits run in several segments. */
export const MAX_TIMER_DELAY_MS = 0x7fff_ffff;

/**
 * Shared state between the controller and the playback worker: the pause gate
 * (open while playback may make progress) and the cancellation flag.
 */
export class PlaybackSignals {
    private readonly open$ = new BehaviorSubject<boolean>(true);
    private readonly cancelled$ = new BehaviorSubject<boolean>(false);

    public get isOpen(): boolean {
        return this.open$.getValue();
    }

    public get isCancelled(): boolean {
        return this.cancelled$.getValue();
    }

    /** Emits the gate state whenever it changes (and the current one on subscribe). */
    public get gate$(): Observable<boolean> {
        return this.open$.asObservable();
    }

    /** Re-arms both signals for a fresh run: gate open, not cancelled. */
    public reset(): void {
        this.cancelled$.next(false);
        this.open$.next(true);
    }

    public openGate(): void {
        if (!this.isOpen) this.open$.next(true);
    }

    public closeGate(): void {
        if (this.isOpen) this.open$.next(false);
    }

    public cancel(): void {
        if (!this.isCancelled) this.cancelled$.next(true);
    }

    /**
     * Resolves once the gate is open or cancellation was requested.
     * @returns `true` when playback may continue, `false` when cancelled.
     */
    public async untilRunnable(): Promise<boolean> {
        if (this.isCancelled) return false;
        if (this.isOpen) return true;
        await firstValueFrom(
            merge(
                this.open$.pipe(filter(open => open)),
                this.cancelled$.pipe(filter(cancelled => cancelled)),
            ),
        );
        return !this.isCancelled;
    }

    /**
     * Emits once when the gate closes or cancellation is requested.
     * The current values are skipped, so subscribe only while running.
     */
    private interruption$(): Observable<void> {
        return merge(
            this.open$.pipe(filter(open => !open)),
            this.cancelled$.pipe(filter(cancelled => cancelled)),
        ).pipe(take(1), map(() => undefined));
    }

    /**
     * Waits for `ms` milliseconds of running time. Time spent with the gate closed
     * is not counted; cancellation ends the wait early.
     */
    public async wait(ms: number): Promise<void> {
        let remaining = ms;
        while (remaining > 0 && !this.isCancelled) {
            if (!this.isOpen) {
                await this.untilRunnable();
                continue;
            }
            const started = performance.now();
            await firstValueFrom(race(timer(Math.min(remaining, MAX_TIMER_DELAY_MS)).pipe(map(() => undefined)), this.interruption$()));
            remaining -= performance.now() - started;
        }
    }
}
