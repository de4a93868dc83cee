/**
 * Terminal front panel: computer keyboard as a latched piano plus the
 * panel's switches and sliders.
 *
 *   a w s e d f t g y h u j k o l p ;   piano, C to E over 17 semitones
 *   z / x        octave down / up
 *   m            toggle mono / poly
 *   b / n        select the next test note / sound it (A2, A3, A4, A1)
 *   space        panic (release every voice)
 *   [ / ]        select previous / next parameter
 *   - / =        nudge the selected parameter down / up
 *   r            reboot the engine
 *   q, Ctrl-C    quit
 *
 * A terminal reports key presses but no key releases, so piano keys
 * always latch: the first press sounds the note, the next press of the
 * same key releases it.
 */

import { emitKeypressEvents } from "node:readline";
import {
    DEFAULT_MIDI_CHANNEL,
    DEFAULT_VELOCITY,
    KEYBOARD_BASE_NOTE,
    MAX_MIDI_NOTE,
    MIN_MIDI_NOTE,
    PARAM_NUDGE_STEPS,
    TEST_NOTES,
} from "../constants";
import type { SynthController } from "../engine/SynthController";
import { DEFAULT_PARAMS, PARAM_SPECS, type ParamSpec } from "../synth/ParameterStore";
import type { ParameterSet } from "../types/engine";
import { clamp, midiToNoteName } from "../utils/midiUtils";
import { log } from "../utils/log";
import type { MidiBus } from "./MidiBus";

/** Semitone offset from the keyboard's base note, per key. */
const PIANO_KEYS: ReadonlyMap<string, number> = new Map(
    [..."awsedftgyhujkolp;"].map((key, offset): [string, number] => [key, offset]),
);

const HIGHEST_KEY_OFFSET = PIANO_KEYS.size - 1;
const MIN_OCTAVE = Math.ceil((MIN_MIDI_NOTE - KEYBOARD_BASE_NOTE) / 12);
const MAX_OCTAVE = Math.floor((MAX_MIDI_NOTE - HIGHEST_KEY_OFFSET - KEYBOARD_BASE_NOTE) / 12);

/** The part of a readline keypress the panel looks at. */
export interface Keypress {
    name?: string;
    sequence?: string;
    ctrl?: boolean;
}

export interface PanelState {
    polyMode: boolean;
    octave: number;
    selected: ParamSpec;
    value: number;
    held: number[];
    /** Index into TEST_NOTES; stored in presets as `note_index`. */
    noteIndex: number;
}

export interface TerminalKeyboardOptions {
    bus: MidiBus;
    controller: SynthController;
    /** Called on q or Ctrl-C. */
    onQuit: () => void;
    /** Called after every key that changes what the panel shows. */
    onChange?: (state: PanelState) => void;
    /** Initially selected test note. Out-of-range values select the first. */
    noteIndex?: number;
    input?: NodeJS.ReadStream;
}

export class TerminalKeyboard {
    private bus: MidiBus;
    private controller: SynthController;
    private onQuit: () => void;
    private onChange: ((state: PanelState) => void) | undefined;
    private input: NodeJS.ReadStream;

    private held = new Set<number>();
    private params: ParameterSet = { ...DEFAULT_PARAMS };
    private polyMode = false;
    private octave = 0;
    private selectedIndex = 0;
    private noteIndex: number;
    private listening = false;

    constructor(opts: TerminalKeyboardOptions) {
        this.bus = opts.bus;
        this.controller = opts.controller;
        this.onQuit = opts.onQuit;
        this.onChange = opts.onChange;
        this.input = opts.input ?? process.stdin;
        const { noteIndex = 0 } = opts;
        this.noteIndex = Number.isInteger(noteIndex) && noteIndex >= 0 && noteIndex < TEST_NOTES.length
            ? noteIndex
            : 0;
    }

    /** Align the panel with the engine, e.g. after a preset was applied. */
    sync(params: ParameterSet, polyMode: boolean) {
        this.params = { ...params };
        this.polyMode = polyMode;
        this.notify();
    }

    get state(): PanelState {
        const selected = PARAM_SPECS[this.selectedIndex];
        return {
            polyMode: this.polyMode,
            octave: this.octave,
            selected,
            value: this.params[selected.name],
            held: [...this.held].sort((a, b) => a - b),
            noteIndex: this.noteIndex,
        };
    }

    start() {
        if (this.listening) return;
        if (!this.input.isTTY) {
            log.warn("[Panel] Input is not a terminal; keys arrive line by line");
        }
        emitKeypressEvents(this.input);
        if (this.input.isTTY) this.input.setRawMode(true);
        this.input.on("keypress", this.onKeypress);
        this.input.resume();
        this.listening = true;
        this.notify();
    }

    stop() {
        if (!this.listening) return;
        this.input.off("keypress", this.onKeypress);
        if (this.input.isTTY) this.input.setRawMode(false);
        this.input.pause();
        this.listening = false;
    }

    handleKey(key: Keypress) {
        if (key.ctrl && key.name === "c") {
            this.onQuit();
            return;
        }

        const ch = key.sequence ?? key.name ?? "";
        const offset = PIANO_KEYS.get(ch);
        if (offset !== undefined) {
            this.toggleNote(KEYBOARD_BASE_NOTE + this.octave * 12 + offset);
            this.notify();
            return;
        }

        switch (ch) {
            case "z":
                this.octave = Math.max(MIN_OCTAVE, this.octave - 1);
                break;
            case "x":
                this.octave = Math.min(MAX_OCTAVE, this.octave + 1);
                break;
            case "m":
                this.polyMode = !this.polyMode;
                this.controller.setPolyMode(this.polyMode);
                break;
            case "b":
                this.noteIndex = (this.noteIndex + 1) % TEST_NOTES.length;
                break;
            case "n":
                this.toggleNote(TEST_NOTES[this.noteIndex]);
                break;
            case " ":
                this.held.clear();
                this.controller.noteOffAll();
                break;
            case "[":
                this.selectedIndex = (this.selectedIndex + PARAM_SPECS.length - 1) % PARAM_SPECS.length;
                break;
            case "]":
                this.selectedIndex = (this.selectedIndex + 1) % PARAM_SPECS.length;
                break;
            case "-":
                this.nudge(-1);
                break;
            case "=":
                this.nudge(1);
                break;
            case "r":
                // Reboot releases every voice
                this.held.clear();
                this.controller.reboot();
                break;
            case "q":
                this.onQuit();
                return;
            default:
                return;
        }
        this.notify();
    }

    private onKeypress = (_str: string | undefined, key: Keypress | undefined) => {
        if (key) this.handleKey(key);
    };

    private toggleNote(note: number) {
        if (this.held.has(note)) {
            this.held.delete(note);
            this.bus.emit({ type: "noteoff", channel: DEFAULT_MIDI_CHANNEL, note, velocity: 0 });
            return;
        }
        // A mono voice is replaced by the next note, so it is no longer held
        if (!this.polyMode) this.held.clear();
        this.held.add(note);
        this.bus.emit({ type: "noteon", channel: DEFAULT_MIDI_CHANNEL, note, velocity: DEFAULT_VELOCITY });
    }

    private nudge(direction: 1 | -1) {
        const spec = PARAM_SPECS[this.selectedIndex];
        const step = (spec.max - spec.min) / PARAM_NUDGE_STEPS;
        const value = clamp(this.params[spec.name] + direction * step, spec.min, spec.max);
        this.params[spec.name] = value;
        this.controller.setParam(spec.name, value);
    }

    private notify() {
        this.onChange?.(this.state);
    }
}

/** One-line rendering of the panel state. */
export function formatPanelState(state: PanelState): string {
    const mode = state.polyMode ? "POLY" : "MONO";
    const octave = state.octave >= 0 ? `+${state.octave}` : String(state.octave);
    const held = state.held.length > 0 ? state.held.map(midiToNoteName).join(" ") : "-";
    const { bank, label } = state.selected;
    const testNote = midiToNoteName(TEST_NOTES[state.noteIndex]);
    return `${mode} | oct ${octave} | ${bank} ${label}: ${state.value.toFixed(3)} | held ${held} | test ${testNote}`;
}
