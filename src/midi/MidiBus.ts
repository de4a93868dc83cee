/**
 * Centralised MIDI event bus.
 *
 * Every note source of the panel (terminal keyboard, raw MIDI device,
 * MIDI file player) emits MidiEvent objects through a single bus.  The
 * synth controller subscribes and turns them into engine commands.
 */

import { DEFAULT_MIDI_CHANNEL, MAX_MIDI_NOTE } from "../constants";
import type { MidiEvent, MidiSubscriber } from "../types/midi";
import { log } from "../utils/log";

export class MidiBus {
  private listeners = new Set<MidiSubscriber>();

  /** Emit an event to all subscribers. */
  emit(event: MidiEvent) {
    this.listeners.forEach((fn) => {
      try {
        fn(event);
      } catch (err) {
        log.error("[MidiBus] Subscriber error:", err);
      }
    });
  }

  /** Subscribe to all events. Returns an unsubscribe function. */
  subscribe(fn: MidiSubscriber): () => void {
    this.listeners.add(fn);
    return () => {
      this.listeners.delete(fn);
    };
  }

  /** Send noteOff for every note on `channel`. */
  allNotesOff(channel = DEFAULT_MIDI_CHANNEL) {
    for (let note = 0; note <= MAX_MIDI_NOTE; note++) {
      this.emit({ type: "noteoff", channel, note, velocity: 0 });
    }
  }

  get size() {
    return this.listeners.size;
  }
}
