/**
 * Runtime configuration: defaults from constants.ts, overridden by
 * environment variables, overridden by command-line flags.
 */

import { parseArgs } from "node:util";
import {
    COMMAND_POLL_INTERVAL_MS,
    DEFAULT_GROUP_ID,
    DEFAULT_SCSYNTH_HOST,
    DEFAULT_SCSYNTH_PORT,
    DEFAULT_SYNTHDEF,
    MAX_GROUP_ID,
    MAX_VOICES,
    MIN_GROUP_ID,
} from "./constants";
import { isLogLevel, type LogLevel } from "./utils/log";

export interface AppConfig {
    host: string;
    port: number;
    maxVoices: number;
    synthDef: string;
    /** .scsyndef file to load on boot, as a path on the server's machine */
    synthDefPath?: string;
    groupId: number;
    pollIntervalMs: number;
    /** Start in poly mode */
    poly: boolean;
    presetPath?: string;
    /** Write the panel state to this preset file on quit */
    savePresetPath?: string;
    /** Raw MIDI device to open, e.g. /dev/snd/midiC1D0 */
    midiDevice?: string;
    /** Standard MIDI File to play on start */
    midiFile?: string;
    logLevel: LogLevel;
    listMidi: boolean;
    help: boolean;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export const USAGE = `Usage: scsynth-front-panel [options]

  --host <addr>           scsynth host (SCSYNTH_HOST, default ${DEFAULT_SCSYNTH_HOST})
  --port <n>              scsynth UDP port (SCSYNTH_PORT, default ${DEFAULT_SCSYNTH_PORT})
  --max-voices <n>        poly voice limit (SYNTH_MAX_VOICES, default ${MAX_VOICES})
  --synthdef <name>       SynthDef to play (SYNTH_DEF, default ${DEFAULT_SYNTHDEF})
  --synthdef-path <file>  .scsyndef to load on boot (SYNTH_DEF_PATH)
  --group <id>            private group id for voices, ${MIN_GROUP_ID}-${MAX_GROUP_ID} (SYNTH_GROUP_ID, default ${DEFAULT_GROUP_ID})
  --poly                  start in poly mode
  --preset <file>         apply a preset file on start
  --save-preset <file>    save the panel state to a preset file on quit
  --midi-device <path>    raw MIDI device to read
  --midi-file <file>      play a MIDI file on start
  --log-level <level>     debug | info | warn | error (SYNTH_LOG_LEVEL, default info)
  --list-midi             list raw MIDI devices and exit
  --help                  show this help`;

interface IntRange {
    min: number;
    max: number;
}

function parseInteger(raw: string, source: string, { min, max }: IntRange): number {
    const value = /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : Number.NaN;
    if (!Number.isSafeInteger(value) || value < min || value > max) {
        throw new ConfigError(`Invalid ${source}: "${raw}" (expected an integer from ${min} to ${max})`);
    }
    return value;
}

/** Flag value first, then the environment variable, then the default. */
function pickInteger(
    flag: string | undefined,
    flagName: string,
    envValue: string | undefined,
    envName: string,
    fallback: number,
    range: IntRange,
): number {
    if (flag !== undefined) return parseInteger(flag, `--${flagName}`, range);
    if (envValue !== undefined && envValue !== "") return parseInteger(envValue, envName, range);
    return fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
    return value === undefined || value === "" ? undefined : value;
}

function parseFlags(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            strict: true,
            allowPositionals: false,
            options: {
                host: { type: "string" },
                port: { type: "string" },
                "max-voices": { type: "string" },
                synthdef: { type: "string" },
                "synthdef-path": { type: "string" },
                group: { type: "string" },
                poly: { type: "boolean" },
                preset: { type: "string" },
                "save-preset": { type: "string" },
                "midi-device": { type: "string" },
                "midi-file": { type: "string" },
                "log-level": { type: "string" },
                "list-midi": { type: "boolean" },
                help: { type: "boolean" },
            },
        }).values;
    } catch (err) {
        // parseArgs rejects unknown flags and missing values
        throw new ConfigError(err instanceof Error ? err.message : String(err));
    }
}

export function loadConfig(
    argv: string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env,
): AppConfig {
    const values = parseFlags(argv);

    const logLevel = values["log-level"] ?? nonEmpty(env.SYNTH_LOG_LEVEL) ?? "info";
    if (!isLogLevel(logLevel)) {
        throw new ConfigError(`Invalid log level "${logLevel}" (expected debug, info, warn or error)`);
    }

    return {
        host: values.host ?? nonEmpty(env.SCSYNTH_HOST) ?? DEFAULT_SCSYNTH_HOST,
        port: pickInteger(values.port, "port", env.SCSYNTH_PORT, "SCSYNTH_PORT", DEFAULT_SCSYNTH_PORT, {
            min: 1,
            max: 65535,
        }),
        maxVoices: pickInteger(
            values["max-voices"],
            "max-voices",
            env.SYNTH_MAX_VOICES,
            "SYNTH_MAX_VOICES",
            MAX_VOICES,
            { min: 1, max: 128 },
        ),
        synthDef: values.synthdef ?? nonEmpty(env.SYNTH_DEF) ?? DEFAULT_SYNTHDEF,
        synthDefPath: values["synthdef-path"] ?? nonEmpty(env.SYNTH_DEF_PATH),
        // The group is freed on quit, so it must not be the root node, the
        // shared default group, or collide with voice node ids
        groupId: pickInteger(values.group, "group", env.SYNTH_GROUP_ID, "SYNTH_GROUP_ID", DEFAULT_GROUP_ID, {
            min: MIN_GROUP_ID,
            max: MAX_GROUP_ID,
        }),
        pollIntervalMs: COMMAND_POLL_INTERVAL_MS,
        poly: values.poly ?? false,
        presetPath: values.preset,
        savePresetPath: values["save-preset"],
        midiDevice: values["midi-device"],
        midiFile: values["midi-file"],
        logLevel,
        listMidi: values["list-midi"] ?? false,
        help: values.help ?? false,
    };
}
