/**
 * Producer-side facade over the engine command channel.
 *
 * Every input of the panel (terminal keyboard, MIDI devices, file player,
 * preset loader) talks to the engine through this class.  Nothing here
 * touches engine state: calls validate their arguments and enqueue one
 * command each, and the worker applies them in call order.
 */

import { CC_ALL_NOTES_OFF, DEFAULT_VELOCITY } from "../constants";
import type { MidiBus } from "../midi/MidiBus";
import type { EngineCommand, ParameterSet } from "../types/engine";
import type { Preset } from "../utils/presetStore";
import { clampVelocity, isMidiNote } from "../utils/midiUtils";
import { log } from "../utils/log";
import type { CommandChannel } from "./CommandChannel";

export class SynthController {
    private stopped = false;

    constructor(private readonly channel: CommandChannel<EngineCommand>) { }

    /** True once shutdown() was called or the worker closed the channel. */
    get isShutdown() {
        return this.stopped || this.channel.closed;
    }

    noteOn(note: number, velocity: number = DEFAULT_VELOCITY) {
        if (!this.checkNote(note)) return;
        this.enqueue({ kind: "noteOn", note, velocity: clampVelocity(velocity) });
    }

    noteOff(note: number) {
        if (!this.checkNote(note)) return;
        this.enqueue({ kind: "noteOff", note });
    }

    /** Release every sounding voice, in both modes. */
    noteOffAll() {
        this.enqueue({ kind: "noteOffAll" });
    }

    setParam(name: string, value: number) {
        if (!Number.isFinite(value)) {
            log.warn(`[Engine] Ignoring non-finite value for ${name}`);
            return;
        }
        this.enqueue({ kind: "setParam", name, value });
    }

    setPolyMode(isPoly: boolean) {
        this.enqueue({ kind: "setMode", poly: isPoly });
    }

    /** Parameter values as the worker sees them once every earlier command has applied. */
    snapshot(): Promise<ParameterSet> {
        return new Promise((resolve, reject) => {
            if (!this.enqueue({ kind: "snapshot", reply: resolve })) {
                reject(new Error("Engine is shut down"));
            }
        });
    }

    /** Release all voices and reconnect to the server. */
    reboot() {
        this.enqueue({ kind: "reboot" });
    }

    /**
     * Ask the worker to stop after the commands already queued.  Later
     * calls on this controller are ignored.
     */
    shutdown() {
        if (this.stopped) return;
        this.enqueue({ kind: "shutdown" });
        this.stopped = true;
    }

    applyPreset(preset: Preset) {
        this.setPolyMode(preset.poly_mode);
        this.setParam("lfo_target", preset.lfo_target);
        for (const [name, value] of Object.entries(preset.sliders)) {
            this.setParam(name, value);
        }
    }

    /** Drive the engine from a MIDI bus. Returns the unsubscribe function. */
    attachMidiBus(bus: MidiBus): () => void {
        return bus.subscribe((event) => {
            switch (event.type) {
                case "noteon":
                    this.noteOn(event.note, event.velocity);
                    break;
                case "noteoff":
                    this.noteOff(event.note);
                    break;
                case "cc":
                    if (event.cc === CC_ALL_NOTES_OFF) this.noteOffAll();
                    break;
            }
        });
    }

    private checkNote(note: number): boolean {
        if (isMidiNote(note)) return true;
        log.warn(`[Engine] Ignoring out-of-range note ${note}`);
        return false;
    }

    private enqueue(command: EngineCommand): boolean {
        if (this.stopped) {
            log.debug(`[Engine] Controller shut down, ignoring "${command.kind}"`);
            return false;
        }
        return this.channel.push(command);
    }
}
