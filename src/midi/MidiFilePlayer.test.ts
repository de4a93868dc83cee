/**
 * Tests for the MIDI file player.
 *
 * Uses @tonejs/midi's Midi class to construct small .mid files in memory
 * and fake timers to drive the look-ahead loop.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Midi } from "@tonejs/midi";
import { MidiBus } from "./MidiBus";
import {
    filterNotesByTracks,
    findNextNoteIndex,
    MidiFilePlayer,
    type MidiFileNote,
} from "./MidiFilePlayer";
import type { MidiEvent } from "../types/midi";

interface TrackDef {
    name?: string;
    channel?: number;
    notes: Array<{ midi: number; time: number; duration: number; velocity: number }>;
}

function buildTestMidi(tracks?: TrackDef[]): Uint8Array {
    const midi = new Midi();
    midi.header.setTempo(120);

    const trackDefs = tracks ?? [
        {
            name: "Piano",
            channel: 0,
            notes: [
                { midi: 60, time: 0, duration: 0.5, velocity: 1 },
                { midi: 64, time: 1.0, duration: 0.5, velocity: 1 },
            ],
        },
    ];

    for (const def of trackDefs) {
        const track = midi.addTrack();
        track.name = def.name ?? "";
        track.channel = def.channel ?? 0;
        for (const n of def.notes) {
            track.addNote(n);
        }
    }
    return midi.toArray();
}

function note(overrides: Partial<MidiFileNote>): MidiFileNote {
    return {
        note: 60,
        velocity: 100,
        time: 0,
        duration: 0.5,
        trackIndex: 0,
        channel: 0,
        ...overrides,
    };
}

describe("MidiFilePlayer helpers", () => {
    it("filters notes by selected track set", () => {
        const notes = [
            note({ note: 60, trackIndex: 0 }),
            note({ note: 61, trackIndex: 1 }),
            note({ note: 62, trackIndex: 2 }),
        ];

        const filtered = filterNotesByTracks(notes, new Set([0, 2]));

        expect(filtered.map((n) => n.note)).toEqual([60, 62]);
    });

    it("finds first note not fully elapsed for a cursor time", () => {
        const notes = [
            note({ note: 60, time: 0, duration: 0.25 }),
            note({ note: 62, time: 0.25, duration: 0.25 }),
            note({ note: 64, time: 0.5, duration: 0.25 }),
        ];

        expect(findNextNoteIndex(notes, 0)).toBe(0);
        expect(findNextNoteIndex(notes, 0.2)).toBe(0);
        expect(findNextNoteIndex(notes, 0.26)).toBe(1);
        expect(findNextNoteIndex(notes, 0.8)).toBe(3);
    });
});

describe("MidiFilePlayer", () => {
    let bus: MidiBus;
    let events: MidiEvent[];
    let start: number;
    const clock = () => (Date.now() - start) / 1000;

    beforeEach(() => {
        vi.useFakeTimers();
        vi.spyOn(console, "info").mockImplementation(() => { });
        start = Date.now();
        bus = new MidiBus();
        events = [];
        bus.subscribe((e) => events.push(e));
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    describe("load", () => {
        it("collects tracks, notes and duration", () => {
            const player = new MidiFilePlayer(bus, { clock });

            player.load(buildTestMidi(), "tune.mid");

            expect(player.fileName).toBe("tune.mid");
            expect(player.tracks).toHaveLength(1);
            expect(player.tracks[0]).toMatchObject({ name: "Piano", channel: 0, noteCount: 2 });
            expect(player.duration).toBeCloseTo(1.5, 3);
        });

        it("rejects data that is not a MIDI file", () => {
            const player = new MidiFilePlayer(bus, { clock });

            expect(() => player.load(new Uint8Array([1, 2, 3, 4]), "junk.mid")).toThrow();
        });
    });

    describe("playback", () => {
        it("emits each note on and off at its file time", () => {
            const onEnd = vi.fn();
            const player = new MidiFilePlayer(bus, { clock, onEnd });
            player.load(buildTestMidi(), "tune.mid");

            player.play();
            vi.advanceTimersByTime(10);
            expect(events).toEqual([{ type: "noteon", channel: 0, note: 60, velocity: 127 }]);

            vi.advanceTimersByTime(500);
            expect(events.map((e) => `${e.type} ${e.note}`)).toEqual(["noteon 60", "noteoff 60"]);

            vi.advanceTimersByTime(500);
            expect(events.map((e) => `${e.type} ${e.note}`)).toEqual(["noteon 60", "noteoff 60", "noteon 64"]);

            vi.advanceTimersByTime(1000);
            expect(events.map((e) => `${e.type} ${e.note}`)).toEqual([
                "noteon 60",
                "noteoff 60",
                "noteon 64",
                "noteoff 64",
            ]);
            expect(player.playing).toBe(false);
            expect(onEnd).toHaveBeenCalledTimes(1);
        });

        it("stop releases sounding notes and cancels the rest", () => {
            const onEnd = vi.fn();
            const player = new MidiFilePlayer(bus, { clock, onEnd });
            player.load(buildTestMidi(), "tune.mid");

            player.play();
            vi.advanceTimersByTime(10);
            player.stop();
            vi.advanceTimersByTime(3000);

            expect(events.map((e) => `${e.type} ${e.note}`)).toEqual(["noteon 60", "noteoff 60"]);
            expect(player.position).toBe(0);
            expect(onEnd).not.toHaveBeenCalled();
        });

        it("pause holds the position and play resumes from it", () => {
            const player = new MidiFilePlayer(bus, { clock });
            player.load(buildTestMidi(), "tune.mid");

            player.play();
            vi.advanceTimersByTime(600);
            player.pause();
            expect(player.position).toBeCloseTo(0.6, 3);

            vi.advanceTimersByTime(5000);
            expect(events).toHaveLength(2);

            player.play();
            vi.advanceTimersByTime(410);
            expect(events.map((e) => `${e.type} ${e.note}`)).toEqual(["noteon 60", "noteoff 60", "noteon 64"]);
            player.stop();
        });

        it("plays only the selected tracks, on their own channels", () => {
            const player = new MidiFilePlayer(bus, { clock });
            player.load(
                buildTestMidi([
                    { name: "Lead", channel: 0, notes: [{ midi: 72, time: 0, duration: 1, velocity: 1 }] },
                    { name: "Bass", channel: 1, notes: [{ midi: 36, time: 0, duration: 1, velocity: 1 }] },
                ]),
                "duo.mid",
            );
            const bass = player.tracks.find((t) => t.name === "Bass");
            if (!bass) throw new Error("bass track missing");

            player.selectTracks([bass.index]);
            player.play();
            vi.advanceTimersByTime(10);

            expect(events).toEqual([{ type: "noteon", channel: 1, note: 36, velocity: 127 }]);
            player.stop();
        });

        it("sends every note on the output channel when one is set", () => {
            const player = new MidiFilePlayer(bus, { clock, outputChannel: 0 });
            player.load(
                buildTestMidi([{ name: "Bass", channel: 5, notes: [{ midi: 36, time: 0, duration: 1, velocity: 1 }] }]),
                "bass.mid",
            );

            player.play();
            vi.advanceTimersByTime(10);

            expect(events[0]).toEqual({ type: "noteon", channel: 0, note: 36, velocity: 127 });
            player.stop();
        });

        it("does nothing for a file without notes", () => {
            const player = new MidiFilePlayer(bus, { clock });
            player.load(buildTestMidi([]), "empty.mid");

            player.play();
            vi.advanceTimersByTime(100);

            expect(player.duration).toBe(0);
            expect(player.playing).toBe(false);
            expect(events).toEqual([]);
        });
    });
});
