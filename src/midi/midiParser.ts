/**
 * Raw MIDI byte stream → MidiEvent.
 *
 * Device files deliver an unframed byte stream, so messages can be split
 * across reads and senders may use running status (data bytes that reuse
 * the previous status byte).  Only note and control-change messages
 * become events; everything else is consumed and dropped.
 */

import type { MidiEvent } from "../types/midi";

const NOTE_OFF = 0x8;
const NOTE_ON = 0x9;
const CONTROL_CHANGE = 0xb;

const SYSEX_START = 0xf0;
const REALTIME_FIRST = 0xf8;

/** Data bytes that follow a channel status byte. */
function dataLength(status: number): number {
    const cmd = status >> 4;
    return cmd === 0xc || cmd === 0xd ? 1 : 2;
}

function toEvent(status: number, d1: number, d2: number): MidiEvent | null {
    const channel = status & 0x0f;
    const cmd = status >> 4;

    if (cmd === NOTE_ON && d2 > 0) {
        return { type: "noteon", channel, note: d1, velocity: d2 };
    }
    if (cmd === NOTE_OFF || cmd === NOTE_ON) {
        return { type: "noteoff", channel, note: d1, velocity: 0 };
    }
    if (cmd === CONTROL_CHANGE) {
        return { type: "cc", channel, note: 0, velocity: 0, cc: d1, value: d2 };
    }
    return null;
}

export class MidiByteParser {
    private runningStatus: number | null = null;
    private data: number[] = [];
    private inSysex = false;

    /** Feed one byte; returns the event it completes, if any. */
    push(byte: number): MidiEvent | null {
        // Realtime bytes may appear anywhere, even mid-message
        if (byte >= REALTIME_FIRST) return null;

        if (byte & 0x80) {
            this.data = [];
            this.inSysex = byte === SYSEX_START;
            // System common messages cancel running status
            this.runningStatus = byte >= SYSEX_START ? null : byte;
            return null;
        }

        if (this.inSysex || this.runningStatus === null) return null;

        this.data.push(byte);
        if (this.data.length < dataLength(this.runningStatus)) return null;

        const [d1, d2 = 0] = this.data;
        this.data = [];
        return toEvent(this.runningStatus, d1, d2);
    }

    /** Feed a chunk; returns every event completed by it. */
    feed(bytes: Iterable<number>): MidiEvent[] {
        const events: MidiEvent[] = [];
        for (const byte of bytes) {
            const event = this.push(byte);
            if (event) events.push(event);
        }
        return events;
    }

    reset() {
        this.runningStatus = null;
        this.data = [];
        this.inSysex = false;
    }
}

/** Parse a complete byte sequence. */
export function parseMidiBytes(bytes: Iterable<number>): MidiEvent[] {
    return new MidiByteParser().feed(bytes);
}
