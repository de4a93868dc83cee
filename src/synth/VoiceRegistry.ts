/**
 * Voice registry: which voices the panel believes are sounding.
 *
 * Two independent slots:
 *   - **mono**: at most one voice, tagged with the note it plays.
 *   - **poly**: one voice per held note.  Map insertion order is the
 *     allocation order, so the first key is always the steal candidate.
 *
 * No I/O.  Switching modes does not touch either slot.
 */

import type { Voice } from "../types/engine";

export class VoiceRegistry {
    private mono: Voice | null = null;
    private poly = new Map<number, Voice>(); // oldest first

    getMono(): Voice | null {
        return this.mono;
    }

    setMono(voice: Voice) {
        this.mono = voice;
    }

    /** Clear the mono slot, returning what was in it. */
    clearMono(): Voice | null {
        const voice = this.mono;
        this.mono = null;
        return voice;
    }

    getPoly(note: number): Voice | undefined {
        return this.poly.get(note);
    }

    /**
     * Record `voice` for `note` as the newest allocation.  An existing entry
     * for the note is replaced and moves to the back of the steal order.
     */
    putPoly(note: number, voice: Voice) {
        this.poly.delete(note);
        this.poly.set(note, voice);
    }

    popPoly(note: number): Voice | undefined {
        const voice = this.poly.get(note);
        if (voice) this.poly.delete(note);
        return voice;
    }

    oldestPolyNote(): number | undefined {
        for (const note of this.poly.keys()) return note;
        return undefined;
    }

    allPolyVoices(): IterableIterator<Voice> {
        return this.poly.values();
    }

    /** Held poly notes, oldest first. */
    polyNotes(): number[] {
        return Array.from(this.poly.keys());
    }

    get polyCount(): number {
        return this.poly.size;
    }

    /** Remove every poly voice, returning them oldest first. */
    clearAllPoly(): Voice[] {
        const voices = Array.from(this.poly.values());
        this.poly.clear();
        return voices;
    }

    /** Mono voice (if any) followed by the poly voices, oldest first. */
    activeVoices(): Voice[] {
        const voices = this.mono ? [this.mono] : [];
        return voices.concat(Array.from(this.poly.values()));
    }
}
