/**
 * MIDI utility helpers: convert MIDI note numbers to frequencies, etc.
 */

import {
    MAX_MIDI_NOTE,
    MAX_VELOCITY,
    MIN_MIDI_NOTE,
    MIN_VELOCITY,
} from "../constants";

/** Convert MIDI note number to frequency (12-TET, A4 = 440 Hz) */
export function midiToHz(note: number): number {
    return 440 * Math.pow(2, (note - 69) / 12);
}

export function clamp01(value: number): number {
    return Math.max(0, Math.min(1, value));
}

export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}

/** True for an integer note number the engine can address (0-127). */
export function isMidiNote(note: number): boolean {
    return Number.isInteger(note) && note >= MIN_MIDI_NOTE && note <= MAX_MIDI_NOTE;
}

export function clampVelocity(velocity: number): number {
    if (Number.isNaN(velocity)) return MIN_VELOCITY;
    return clamp(Math.round(velocity), MIN_VELOCITY, MAX_VELOCITY);
}

/** Note names for display */
const NOTE_NAMES = [
    "C",
    "C#",
    "D",
    "D#",
    "E",
    "F",
    "F#",
    "G",
    "G#",
    "A",
    "A#",
    "B",
] as const;

export function midiToNoteName(note: number): string {
    const octave = Math.floor(note / 12) - 1;
    return `${NOTE_NAMES[note % 12]}${octave}`;
}
