/**
 * Preset persistence: JSON files on disk.
 *
 * A preset is the panel state worth restoring: every slider value, the
 * voice mode, the LFO routing and the note / MIDI port selections.
 * lfo_target lives beside the sliders because the panel presents it as a
 * switch, not a slider.
 */

import { readFile, writeFile } from "node:fs/promises";
import type { ParameterSet } from "../types/engine";
import { PARAM_NAMES } from "../types/engine";
import { log } from "./log";

export interface Preset {
    sliders: Record<string, number>;
    poly_mode: boolean;
    lfo_target: number;
    note_index: number;
    midi_port?: string | null;
}

export class PresetFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "PresetFormatError";
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value);
}

/**
 * Validate a preset read from disk.  Missing fields fall back to their
 * defaults and non-numeric slider values are dropped; a preset that is
 * not an object, or whose sliders are not an object, is rejected.
 */
export function parsePreset(raw: unknown): Preset {
    if (!isRecord(raw)) {
        throw new PresetFormatError("Preset must be a JSON object");
    }

    const rawSliders = raw.sliders ?? {};
    if (!isRecord(rawSliders)) {
        throw new PresetFormatError('Preset "sliders" must be an object');
    }

    const sliders: Record<string, number> = {};
    for (const [name, value] of Object.entries(rawSliders)) {
        if (isFiniteNumber(value)) sliders[name] = value;
        else log.warn(`[Preset] Ignoring non-numeric slider "${name}"`);
    }

    const preset: Preset = {
        sliders,
        poly_mode: typeof raw.poly_mode === "boolean" ? raw.poly_mode : false,
        lfo_target: isFiniteNumber(raw.lfo_target) ? raw.lfo_target : 0,
        note_index: isFiniteNumber(raw.note_index) ? Math.trunc(raw.note_index) : 0,
    };
    if (typeof raw.midi_port === "string" || raw.midi_port === null) {
        preset.midi_port = raw.midi_port;
    }
    return preset;
}

export async function loadPresetFromFile(path: string): Promise<Preset> {
    const text = await readFile(path, "utf8");

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new PresetFormatError(`${path} is not valid JSON: ${reason}`);
    }

    const preset = parsePreset(raw);
    log.info(`[Preset] Loaded preset from ${path}`);
    return preset;
}

export async function savePresetToFile(path: string, preset: Preset): Promise<void> {
    await writeFile(path, JSON.stringify(preset, null, 2) + "\n", "utf8");
    log.info(`[Preset] Saved preset to ${path}`);
}

/** Build a preset from a parameter snapshot. */
export function capturePreset(
    params: ParameterSet,
    polyMode: boolean,
    extras: { note_index?: number; midi_port?: string | null } = {},
): Preset {
    const sliders: Record<string, number> = {};
    for (const name of PARAM_NAMES) {
        if (name !== "lfo_target") sliders[name] = params[name];
    }
    return {
        sliders,
        poly_mode: polyMode,
        lfo_target: params.lfo_target,
        note_index: extras.note_index ?? 0,
        midi_port: extras.midi_port ?? null,
    };
}
