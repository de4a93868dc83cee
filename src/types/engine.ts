/**
 * Shared engine type definitions.
 *
 * Canonical home for the parameter surface, voice handles and the command
 * union that flows from the producers (terminal keyboard, MIDI inputs,
 * preset loader) to the engine worker.
 */

// ─── Parameters ──────────────────────────────────────────────────────────────

export const PARAM_NAMES = [
    "vco_mix",
    "vco1_wave",
    "vco2_wave",
    "detune",
    "cutoff",
    "res",
    "env_amt",
    "noise_mix",
    "lfo_freq",
    "lfo_depth",
    "lfo_target",
    "atk",
    "dec",
    "sus",
    "rel",
    "amp",
] as const;

export type ParamName = (typeof PARAM_NAMES)[number];

export type ParameterSet = Record<ParamName, number>;

/** Controls every voice is created with on top of the parameter snapshot. */
export interface VoiceControls extends ParameterSet {
    frequency: number;
    gate: number;
}

// ─── Voices ──────────────────────────────────────────────────────────────────

export interface Voice {
    /** Node id on the server; every later message addresses the voice by it */
    nodeId: number;
    /** MIDI note the voice sounds */
    note: number;
    /** Controls the voice was created with */
    params: VoiceControls;
}

export type VoiceMode = "mono" | "poly";

// ─── Engine status ───────────────────────────────────────────────────────────

export type EngineStatus = "down" | "booting" | "up";

export type StatusListener = (status: EngineStatus) => void;

// ─── Commands ────────────────────────────────────────────────────────────────

/**
 * Everything the worker can be asked to do. Applied strictly in the
 * order they were enqueued.
 */
export type EngineCommand =
    | { kind: "noteOn"; note: number; velocity: number }
    | { kind: "noteOff"; note: number }
    | { kind: "noteOffAll" }
    | { kind: "setParam"; name: string; value: number }
    | { kind: "setMode"; poly: boolean }
    | { kind: "snapshot"; reply: (params: ParameterSet) => void }
    | { kind: "reboot" }
    | { kind: "shutdown" };

export type EngineCommandKind = EngineCommand["kind"];
