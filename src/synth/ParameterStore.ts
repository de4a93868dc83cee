/**
 * Parameter store: current value of every synth control.
 *
 * Seeds every new voice and answers reads from the panel.  Only the
 * canonical controls of `peppermint_voice` are accepted: names from older
 * or newer presets are dropped without complaint.
 *
 * Owned by the engine worker; nothing else mutates it.
 */

import { PARAM_NAMES, type ParamName, type ParameterSet } from "../types/engine";

/** Must match the SynthDef's own control defaults. */
export const DEFAULT_PARAMS: Readonly<ParameterSet> = Object.freeze({
    vco_mix: 0.5,
    vco1_wave: 0.0,
    vco2_wave: 0.0,
    detune: 1.01,
    cutoff: 1200.0,
    res: 0.2,
    env_amt: 0.5,
    noise_mix: 0.0,
    lfo_freq: 5.0,
    lfo_depth: 0.0,
    lfo_target: 0.0,
    atk: 0.01,
    dec: 0.1,
    sus: 0.7,
    rel: 0.3,
    amp: 0.2,
});

export type ParamBank = "VCO" | "FILTER" | "LFO" | "ENV" | "AMP";

export interface ParamSpec {
    name: ParamName;
    label: string;
    bank: ParamBank;
    min: number;
    max: number;
}

/** Slider ranges of the front panel, in panel order. */
export const PARAM_SPECS: readonly ParamSpec[] = [
    { name: "vco_mix", label: "VCO Mix", bank: "VCO", min: 0, max: 1 },
    { name: "vco1_wave", label: "VCO1 Wave", bank: "VCO", min: 0, max: 1 },
    { name: "vco2_wave", label: "VCO2 Wave", bank: "VCO", min: 0, max: 1 },
    { name: "detune", label: "Detune Ratio", bank: "VCO", min: 0.98, max: 1.08 },
    { name: "cutoff", label: "Cutoff (Hz)", bank: "FILTER", min: 100, max: 8000 },
    { name: "res", label: "Resonance", bank: "FILTER", min: 0, max: 1 },
    { name: "env_amt", label: "Filter Env Amount", bank: "FILTER", min: 0, max: 1 },
    { name: "noise_mix", label: "Noise Mix", bank: "FILTER", min: 0, max: 1 },
    { name: "lfo_freq", label: "LFO Freq (Hz)", bank: "LFO", min: 0.1, max: 20 },
    { name: "lfo_depth", label: "LFO Depth", bank: "LFO", min: 0, max: 1 },
    // 0 = pitch, 1 = filter
    { name: "lfo_target", label: "LFO Target", bank: "LFO", min: 0, max: 1 },
    { name: "atk", label: "Attack (s)", bank: "ENV", min: 0.001, max: 2 },
    { name: "dec", label: "Decay (s)", bank: "ENV", min: 0.01, max: 2 },
    { name: "sus", label: "Sustain", bank: "ENV", min: 0, max: 1 },
    { name: "rel", label: "Release (s)", bank: "ENV", min: 0.01, max: 4 },
    { name: "amp", label: "Level", bank: "AMP", min: 0, max: 0.8 },
];

export function isParamName(name: string): name is ParamName {
    return PARAM_NAMES.some((n) => n === name);
}

export class ParameterStore {
    private values: ParameterSet;

    constructor(initial: Partial<ParameterSet> = {}) {
        this.values = { ...DEFAULT_PARAMS, ...initial };
    }

    /** The fixed default mapping, as a fresh copy. */
    static getDefaults(): ParameterSet {
        return { ...DEFAULT_PARAMS };
    }

    has(name: string): name is ParamName {
        return isParamName(name);
    }

    get(name: ParamName): number {
        return this.values[name];
    }

    /**
     * Store `value` under `name`.  Unknown names are ignored.
     * Returns true when the value was stored.
     */
    set(name: string, value: number): boolean {
        if (!isParamName(name)) return false;
        this.values[name] = value;
        return true;
    }

    snapshot(): ParameterSet {
        return { ...this.values };
    }
}
