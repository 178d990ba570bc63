import { EMPTY, Observable, type OperatorFunction, filter, from, mergeMap, pipe, scan, takeWhile, tap } from "rxjs";
import { EventTypes, KeyValues, keyName } from "../keys.js";
import { type HotkeyRequirement, type PressedSet, isSatisfied } from "./chord.js";
import type { InputEvent } from "./types.js";

export type HotkeyAction = "trigger" | "quit";

export interface ListenerOptions {
    trigger: HotkeyRequirement;
    quit?: HotkeyRequirement | null;
    debugMode?: boolean;
}

/**
 * Edge detector state of one hotkey. `armed` means the chord is currently not
 * satisfied, so the next transition to satisfied fires.
 */
export interface EdgeState {
    armed: boolean;
    fired: boolean;
}

export const INITIAL_EDGE: EdgeState = { armed: true, fired: false };

export function nextEdge(previous: EdgeState, satisfied: boolean): EdgeState {
    return { fired: satisfied && previous.armed, armed: !satisfied };
}

interface ListenerState {
    pressed: PressedSet;
    quit: EdgeState;
    trigger: EdgeState;
    actions: HotkeyAction[];
}

/**
 * Maintains the pressed-key set from raw events: down adds, up removes.
 * Autorepeat leaves the set unchanged but is still emitted so hotkeys are
 * re-evaluated on every key event. Non-key events are dropped.
 */
export function trackPressed(): OperatorFunction<InputEvent, PressedSet> {
    return pipe(
        filter(event => event.type === EventTypes.Key),
        scan<InputEvent, PressedSet>((pressed, event) => {
            if (event.value === KeyValues.Down && !pressed.has(event.code)) {
                return new Set(pressed).add(event.code);
            }
            if (event.value === KeyValues.Up && pressed.has(event.code)) {
                const next = new Set(pressed);
                next.delete(event.code);
                return next;
            }
            return pressed;
        }, new Set<number>()),
    );
}

/**
 * Recognizes the trigger and quit hotkeys in a raw keyboard event stream.
 */
export class InputListener {
    private static readonly LOG_PREFIX = "Listener:";

    private readonly trigger: HotkeyRequirement;
    private readonly quit: HotkeyRequirement | null;
    private readonly debugMode: boolean;

    constructor(options: ListenerOptions) {
        this.trigger = options.trigger;
        this.quit = options.quit ?? null;
        this.debugMode = options.debugMode ?? false;
    }

    /**
     * Emits `"trigger"` once per press of the trigger hotkey, and `"quit"` once for
     * the quit hotkey, after which the stream completes. Quit is evaluated first;
     * when it fires, the trigger is not evaluated for that event.
     */
    public actions(events$: Observable<InputEvent>): Observable<HotkeyAction> {
        return events$.pipe(
            trackPressed(),
            scan<PressedSet, ListenerState>(
                (state, pressed) => this.evaluate(state, pressed),
                { pressed: new Set<number>(), quit: INITIAL_EDGE, trigger: INITIAL_EDGE, actions: [] },
            ),
            tap(state => {
                if (this.debugMode && state.actions.length > 0) {
                    const keys = [...state.pressed].map(keyName).join("+");
                    console.log(`${InputListener.LOG_PREFIX} ${state.actions.join(", ")} fired on [${keys}].`);
                }
            }),
            mergeMap(state => (state.actions.length > 0 ? from(state.actions) : EMPTY)),
            takeWhile(action => action !== "quit", true),
        );
    }

    private evaluate(state: ListenerState, pressed: PressedSet): ListenerState {
        let quit = state.quit;
        if (this.quit !== null) {
            quit = nextEdge(quit, isSatisfied(pressed, this.quit));
            if (quit.fired) {
                return { pressed, quit, trigger: state.trigger, actions: ["quit"] };
            }
        }
        const trigger = nextEdge(state.trigger, isSatisfied(pressed, this.trigger));
        return { pressed, quit, trigger, actions: trigger.fired ? ["trigger"] : [] };
    }
}
