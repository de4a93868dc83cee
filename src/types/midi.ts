/**
 * Shared MIDI type definitions.
 *
 * Every input (terminal keyboard, raw MIDI device, MIDI file player)
 * produces these events; the controller is the only consumer that turns
 * them into engine commands.
 */

// ─── MIDI Events ─────────────────────────────────────────────────────────────

export type MidiEvent =
    | { type: "noteon"; channel: number; note: number; velocity: number }
    | { type: "noteoff"; channel: number; note: number; velocity: number }
    | {
        type: "cc";
        channel: number;
        note: number;
        velocity: number;
        cc: number;
        value: number;
    };

export type MidiSubscriber = (e: MidiEvent) => void;
