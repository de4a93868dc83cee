/**
 * MIDI file player: parses .mid files and plays them through the MidiBus.
 *
 * Uses @tonejs/midi for parsing. Playback is driven by a look-ahead
 * scheduler: a setTimeout loop wakes every MIDI_PLAYER_LOOKAHEAD_MS and
 * schedules the notes that start within the next
 * MIDI_PLAYER_SCHEDULE_AHEAD_S, each as a noteOn / noteOff timeout pair.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { Midi } from "@tonejs/midi";
import {
    DEFAULT_MIDI_CHANNEL,
    MAX_VELOCITY,
    MIDI_PLAYER_LOOKAHEAD_MS,
    MIDI_PLAYER_SCHEDULE_AHEAD_S,
} from "../constants";
import { log } from "../utils/log";
import type { MidiBus } from "./MidiBus";

export interface MidiFileTrackInfo {
    index: number;
    name: string;
    channel: number;
    noteCount: number;
}

export interface MidiFileNote {
    /** MIDI note number 0-127 */
    note: number;
    /** Velocity 0-127 */
    velocity: number;
    /** Start time in seconds */
    time: number;
    /** Duration in seconds */
    duration: number;
    /** Track index the note belongs to */
    trackIndex: number;
    /** Source MIDI channel */
    channel: number;
}

export interface MidiFilePlayerOptions {
    /** Send every note on this channel instead of the track's own. */
    outputChannel?: number;
    /** Restart from the top when the file ends. */
    loop?: boolean;
    /** Called when playback reaches the end of the file (not when looping). */
    onEnd?: () => void;
    /** Seconds on a monotonic clock. */
    clock?: () => number;
}

export function filterNotesByTracks(
    notes: MidiFileNote[],
    selectedTracks: ReadonlySet<number>,
): MidiFileNote[] {
    return notes.filter((note) => selectedTracks.has(note.trackIndex));
}

/** Index of the first note still sounding (or yet to start) at `time`. */
export function findNextNoteIndex(
    notes: MidiFileNote[],
    time: number,
): number {
    let idx = 0;
    while (idx < notes.length && notes[idx].time + notes[idx].duration < time) {
        idx++;
    }
    return idx;
}

export class MidiFilePlayer {
    private bus: MidiBus;
    private outputChannel: number | undefined;
    private onEnd: (() => void) | undefined;
    private clock: () => number;

    loop: boolean;

    private _fileName = "";
    private _tracks: MidiFileTrackInfo[] = [];
    private _duration = 0;
    private allNotes: MidiFileNote[] = [];
    private selectedTracks = new Set<number>();
    private selectedNotes: MidiFileNote[] = [];

    private _playing = false;
    /** Clock time when playback started or resumed */
    private playStartClock = 0;
    /** File time at which playback started or resumed */
    private cursorOffset = 0;
    /** Index into selectedNotes of the next note to schedule */
    private nextNoteIndex = 0;
    private timer: ReturnType<typeof setTimeout> | null = null;
    private pendingTimeouts = new Set<ReturnType<typeof setTimeout>>();
    /** Sounding notes, keyed "channel:note" */
    private activeNotes = new Map<string, { channel: number; note: number }>();

    constructor(bus: MidiBus, opts: MidiFilePlayerOptions = {}) {
        this.bus = bus;
        this.outputChannel = opts.outputChannel;
        this.loop = opts.loop ?? false;
        this.onEnd = opts.onEnd;
        this.clock = opts.clock ?? (() => performance.now() / 1000);
    }

    get fileName() {
        return this._fileName;
    }

    get tracks(): readonly MidiFileTrackInfo[] {
        return this._tracks;
    }

    get duration() {
        return this._duration;
    }

    get playing() {
        return this._playing;
    }

    /** Current file time in seconds. */
    get position(): number {
        if (!this._playing) return this.cursorOffset;
        return this.cursorOffset + (this.clock() - this.playStartClock);
    }

    async loadFile(path: string) {
        const data = await readFile(path);
        this.load(data, basename(path));
    }

    /** Parse a Standard MIDI File. Throws when the data is not one. */
    load(data: ArrayLike<number> | ArrayBuffer, name: string) {
        this.stop();

        const midi = new Midi(data);
        const trackInfos: MidiFileTrackInfo[] = [];
        const notes: MidiFileNote[] = [];

        midi.tracks.forEach((track, i) => {
            if (track.notes.length === 0) return; // skip empty tracks
            const channel = track.channel >= 0 ? track.channel : DEFAULT_MIDI_CHANNEL;
            trackInfos.push({
                index: i,
                name: track.name || `Track ${i + 1} (ch ${channel + 1})`,
                channel,
                noteCount: track.notes.length,
            });
            for (const n of track.notes) {
                notes.push({
                    note: n.midi,
                    velocity: Math.round(n.velocity * MAX_VELOCITY),
                    time: n.time,
                    duration: n.duration,
                    trackIndex: i,
                    channel,
                });
            }
        });

        notes.sort((a, b) => a.time - b.time);

        this._fileName = name;
        this._tracks = trackInfos;
        // Empty files report -Infinity
        this._duration = Number.isFinite(midi.duration) && midi.duration > 0 ? midi.duration : 0;
        this.allNotes = notes;
        this.selectedTracks = new Set(trackInfos.map((t) => t.index));
        this.selectedNotes = notes;
        this.cursorOffset = 0;
        this.nextNoteIndex = 0;

        log.info(`[MIDI] Loaded ${name}: ${notes.length} notes in ${trackInfos.length} track(s), ${this._duration.toFixed(1)} s`);
    }

    /** Play only the given tracks. */
    selectTracks(indices: Iterable<number>) {
        this.applySelection(new Set(indices));
    }

    toggleTrack(index: number) {
        const next = new Set(this.selectedTracks);
        if (next.has(index)) next.delete(index);
        else next.add(index);
        this.applySelection(next);
    }

    play() {
        if (this._playing || this.allNotes.length === 0) return;
        if (this.cursorOffset >= this._duration) {
            // At the end: restart from the beginning
            this.cursorOffset = 0;
        }

        this.nextNoteIndex = findNextNoteIndex(this.selectedNotes, this.cursorOffset);
        this._playing = true;
        this.playStartClock = this.clock();
        this.tick();
    }

    pause() {
        if (!this._playing) return;
        this.cursorOffset = this.position;
        this._playing = false;
        this.stopScheduler();
        this.clearPendingTimeouts();
        this.flushActiveNotes();
    }

    /** Stop, silence every sounding note and rewind. */
    stop() {
        this._playing = false;
        this.stopScheduler();
        this.clearPendingTimeouts();
        this.flushActiveNotes();
        this.cursorOffset = 0;
        this.nextNoteIndex = 0;
    }

    /** Jump to a fraction (0-1) of the file. */
    seek(fraction: number) {
        const clamped = Math.max(0, Math.min(1, fraction));
        this.restartAt(clamped * this._duration);
    }

    private applySelection(selected: Set<number>) {
        const now = this.position;
        this.selectedTracks = selected;
        this.selectedNotes = filterNotesByTracks(this.allNotes, selected);
        this.restartAt(now);
    }

    private restartAt(time: number) {
        this.clearPendingTimeouts();
        this.flushActiveNotes();
        this.cursorOffset = time;
        this.nextNoteIndex = findNextNoteIndex(this.selectedNotes, time);

        if (this._playing) {
            this.stopScheduler();
            this.playStartClock = this.clock();
            this.tick();
        }
    }

    private tick = () => {
        if (!this._playing) return;

        const now = this.position;
        const horizon = now + MIDI_PLAYER_SCHEDULE_AHEAD_S;
        const notes = this.selectedNotes;

        while (this.nextNoteIndex < notes.length) {
            const n = notes[this.nextNoteIndex];
            if (n.time > horizon) break; // outside look-ahead window
            this.nextNoteIndex++;

            // Skip notes that are already past
            if (n.time + n.duration < now) continue;
            this.scheduleNote(n, now);
        }

        if (now >= this._duration) {
            if (this.loop && this._duration > 0) {
                this.cursorOffset = 0;
                this.nextNoteIndex = 0;
                this.playStartClock = this.clock();
                this.timer = setTimeout(this.tick, MIDI_PLAYER_LOOKAHEAD_MS);
                return;
            }

            // Pending noteOffs finish on their own
            this._playing = false;
            this.cursorOffset = this._duration;
            this.timer = null;
            log.info(`[MIDI] Finished ${this._fileName}`);
            this.onEnd?.();
            return;
        }

        this.timer = setTimeout(this.tick, MIDI_PLAYER_LOOKAHEAD_MS);
    };

    private scheduleNote(n: MidiFileNote, now: number) {
        const noteOnDelay = Math.max(0, (n.time - now) * 1000);
        const noteOffDelay = noteOnDelay + n.duration * 1000;
        const channel = this.outputChannel ?? n.channel;
        const key = `${channel}:${n.note}`;

        const onId = setTimeout(() => {
            this.pendingTimeouts.delete(onId);
            if (!this._playing) return;
            this.activeNotes.set(key, { channel, note: n.note });
            this.bus.emit({ type: "noteon", channel, note: n.note, velocity: n.velocity });
        }, noteOnDelay);
        this.pendingTimeouts.add(onId);

        const offId = setTimeout(() => {
            this.pendingTimeouts.delete(offId);
            this.activeNotes.delete(key);
            this.bus.emit({ type: "noteoff", channel, note: n.note, velocity: 0 });
        }, noteOffDelay);
        this.pendingTimeouts.add(offId);
    }

    private flushActiveNotes() {
        for (const { channel, note } of this.activeNotes.values()) {
            this.bus.emit({ type: "noteoff", channel, note, velocity: 0 });
        }
        this.activeNotes.clear();
    }

    private clearPendingTimeouts() {
        this.pendingTimeouts.forEach((id) => clearTimeout(id));
        this.pendingTimeouts.clear();
    }

    private stopScheduler() {
        if (this.timer !== null) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}
