/**
 * Voice allocator: decides which server voices receive which messages.
 *
 * Mono mode reuses a single slot: every note-on releases the previous
 * voice first, and a note-off only releases the slot when it names the
 * note currently in it (a late note-off for a key that was already
 * replaced is ignored).
 *
 * Poly mode keeps one voice per held note:
 *   1. Re-triggering a held note releases its old voice first.
 *   2. At `maxVoices`, the oldest allocation is released (FIFO steal).
 *   3. The new voice is created and keyed by its note.
 *
 * Releases are gate-offs, not frees: the server reclaims the node when
 * the release envelope ends.  The adapter is fire-and-forget, so the
 * registry is updated whether or not a message actually arrived.
 *
 * Not thread-safe by construction; only the engine worker calls it.
 */

import { MAX_VELOCITY, MAX_VOICES } from "../constants";
import type { EngineAdapter } from "../engine/EngineAdapter";
import type { Voice, VoiceControls, VoiceMode } from "../types/engine";
import { clamp01, midiToHz } from "../utils/midiUtils";
import { log } from "../utils/log";
import { NodeIdAllocator } from "./NodeIdAllocator";
import { ParameterStore } from "./ParameterStore";
import { VoiceRegistry } from "./VoiceRegistry";

export interface VoiceAllocatorOptions {
    adapter: EngineAdapter;
    store?: ParameterStore;
    registry?: VoiceRegistry;
    nodeIds?: NodeIdAllocator;
    /** Poly-mode voice limit. Defaults to 8. */
    maxVoices?: number;
    /** Starting mode. Defaults to mono. */
    mode?: VoiceMode;
}

export class VoiceAllocator {
    readonly store: ParameterStore;
    readonly registry: VoiceRegistry;
    readonly maxVoices: number;
    private adapter: EngineAdapter;
    private nodeIds: NodeIdAllocator;
    private mode: VoiceMode;

    constructor(opts: VoiceAllocatorOptions) {
        this.adapter = opts.adapter;
        this.store = opts.store ?? new ParameterStore();
        this.registry = opts.registry ?? new VoiceRegistry();
        this.nodeIds = opts.nodeIds ?? new NodeIdAllocator();
        this.maxVoices = opts.maxVoices ?? MAX_VOICES;
        this.mode = opts.mode ?? "mono";

        if (!Number.isInteger(this.maxVoices) || this.maxVoices < 1) {
            throw new RangeError(`maxVoices must be a positive integer, got ${this.maxVoices}`);
        }
    }

    get voiceMode(): VoiceMode {
        return this.mode;
    }

    get polyMode(): boolean {
        return this.mode === "poly";
    }

    /** Notes the panel believes are sounding: mono first, then poly oldest first. */
    activeNotes(): number[] {
        return this.registry.activeVoices().map((v) => v.note);
    }

    /** Start node ids over; called whenever a new server connection is opened. */
    resetNodeIds() {
        this.nodeIds.reset();
    }

    noteOn(note: number, velocity: number) {
        // MIDI convention: note-on with zero velocity is a note-off
        if (velocity <= 0) {
            this.noteOff(note);
            return;
        }

        if (!this.adapter.ready) {
            log.debug(`[Engine] Engine not ready, dropping note ${note}`);
            return;
        }

        if (this.mode === "mono") {
            const previous = this.registry.clearMono();
            if (previous) this.release(previous);

            this.registry.setMono(this.spawn(note, velocity));
            return;
        }

        // Re-trigger: release the voice already sounding this note
        const existing = this.registry.popPoly(note);
        if (existing) this.release(existing);

        // Voice stealing: at capacity, release the oldest allocation
        if (this.registry.polyCount >= this.maxVoices) {
            const oldest = this.registry.oldestPolyNote();
            const stolen = oldest === undefined ? undefined : this.registry.popPoly(oldest);
            if (stolen) this.release(stolen);
        }

        this.registry.putPoly(note, this.spawn(note, velocity));
    }

    noteOff(note: number) {
        if (this.mode === "mono") {
            const mono = this.registry.getMono();
            if (mono && mono.note === note) {
                this.registry.clearMono();
                this.release(mono);
            }
            return;
        }

        const voice = this.registry.popPoly(note);
        if (voice) this.release(voice);
    }

    /** Release every voice in both slots, regardless of mode. */
    noteOffAll() {
        const mono = this.registry.clearMono();
        if (mono) this.release(mono);

        for (const voice of this.registry.clearAllPoly()) {
            this.release(voice);
        }
    }

    /**
     * Store the value, then push it to every sounding voice.  With nothing
     * sounding this is a store update only, so the next voice picks it up.
     */
    setParam(name: string, value: number) {
        if (!this.store.set(name, value)) return;

        for (const voice of this.registry.activeVoices()) {
            this.adapter.setParam(voice.nodeId, name, value);
        }
    }

    /** Flip the mode. Voices in the other slot keep sounding until released. */
    setPolyMode(isPoly: boolean) {
        this.mode = isPoly ? "poly" : "mono";
    }

    private voiceControls(note: number, velocity: number): VoiceControls {
        const params = this.store.snapshot();
        return {
            ...params,
            frequency: midiToHz(note),
            amp: clamp01(velocity / MAX_VELOCITY) * params.amp,
            gate: 1.0,
        };
    }

    private spawn(note: number, velocity: number): Voice {
        const voice: Voice = {
            nodeId: this.nodeIds.next(),
            note,
            params: this.voiceControls(note, velocity),
        };
        this.adapter.createVoice(voice.nodeId, voice.params);
        return voice;
    }

    private release(voice: Voice) {
        this.adapter.release(voice.nodeId);
    }
}
