/**
 * Front panel entry point.
 *
 * Wires the inputs (terminal keyboard, raw MIDI device, MIDI file) to one
 * MidiBus, the bus to the SynthController, and the controller's channel
 * to the engine worker that owns the scsynth connection.
 *
 * First q / Ctrl-C / SIGINT asks the worker to finish its queue and shut
 * down; a second one aborts it at the next poll.
 */

import { isAbsolute, join } from "node:path";
import { ConfigError, USAGE, loadConfig, type AppConfig } from "./config";
import { CommandChannel } from "./engine/CommandChannel";
import { EngineWorker } from "./engine/EngineWorker";
import { OscEngineAdapter } from "./engine/OscEngineAdapter";
import { SynthController } from "./engine/SynthController";
import { UdpTransport } from "./engine/udpTransport";
import { MidiBus } from "./midi/MidiBus";
import { MidiFilePlayer } from "./midi/MidiFilePlayer";
import { RAW_MIDI_DIR, RawMidiInput, listRawMidiPorts } from "./midi/RawMidiInput";
import { TerminalKeyboard, formatPanelState, type PanelState } from "./midi/TerminalKeyboard";
import type { EngineCommand, EngineStatus } from "./types/engine";
import { log, setLogLevel } from "./utils/log";
import {
    PresetFormatError,
    capturePreset,
    loadPresetFromFile,
    savePresetToFile,
    type Preset,
} from "./utils/presetStore";

function resolveMidiDevice(nameOrPath: string): string {
    return isAbsolute(nameOrPath) ? nameOrPath : join(RAW_MIDI_DIR, nameOrPath);
}

async function listMidi() {
    const ports = await listRawMidiPorts();
    if (ports.length === 0) {
        console.log("No raw MIDI devices found");
        return;
    }
    for (const port of ports) console.log(port);
}

async function run(config: AppConfig) {
    const preset: Preset | undefined = config.presetPath
        ? await loadPresetFromFile(config.presetPath)
        : undefined;

    const channel = new CommandChannel<EngineCommand>();
    const adapter = new OscEngineAdapter({
        transport: new UdpTransport(config.host, config.port),
        synthDef: config.synthDef,
        groupId: config.groupId,
        synthDefPath: config.synthDefPath,
    });
    const worker = new EngineWorker({
        channel,
        adapter,
        maxVoices: config.maxVoices,
        mode: config.poly ? "poly" : "mono",
        pollIntervalMs: config.pollIntervalMs,
    });
    const controller = new SynthController(channel);
    const bus = new MidiBus();
    controller.attachMidiBus(bus);

    log.info(`[Engine] Connecting to scsynth at ${config.host}:${config.port}`);
    const abort = new AbortController();
    const running = worker.run(abort.signal);

    if (preset) controller.applyPreset(preset);

    // ── Status line ──
    let engineStatus: EngineStatus = worker.status;
    let panelState: PanelState | null = null;
    const render = () => {
        if (!process.stdout.isTTY || !panelState) return;
        process.stdout.write(`\r\x1b[2K[${engineStatus}] ${formatPanelState(panelState)}`);
    };
    worker.onStatusChange((status) => {
        engineStatus = status;
        render();
    });

    // ── Inputs ──
    const midiInput = new RawMidiInput(bus);
    const player = new MidiFilePlayer(bus, {
        onEnd: () => log.info("[MIDI] Playback finished"),
    });

    let stopping = false;
    const quit = () => {
        if (stopping) {
            abort.abort();
            return;
        }
        stopping = true;
        player.stop();
        void saveOnQuit()
            .catch((err: unknown) => log.error("[Preset] Could not save preset:", err))
            .finally(() => controller.shutdown());
    };

    const panel = new TerminalKeyboard({
        bus,
        controller,
        onQuit: quit,
        noteIndex: preset?.note_index,
        onChange: (state) => {
            panelState = state;
            render();
        },
    });

    const saveOnQuit = async () => {
        if (!config.savePresetPath) return;
        const params = await controller.snapshot();
        const saved = capturePreset(params, panel.state.polyMode, {
            note_index: panel.state.noteIndex,
            midi_port: midiInput.portName,
        });
        await savePresetToFile(config.savePresetPath, saved);
    };

    panel.sync(await controller.snapshot(), preset?.poly_mode ?? config.poly);
    if (process.stdin.isTTY) {
        panel.start();
    } else {
        log.warn("[Panel] stdin is not a terminal; keyboard disabled");
    }

    const device = config.midiDevice ?? preset?.midi_port;
    if (device) midiInput.open(resolveMidiDevice(device));

    if (config.midiFile) {
        try {
            await player.loadFile(config.midiFile);
            player.play();
        } catch (err) {
            log.error(`[MIDI] Could not play ${config.midiFile}:`, err);
        }
    }

    process.on("SIGINT", quit);
    process.on("SIGTERM", quit);

    try {
        await running;
    } finally {
        process.off("SIGINT", quit);
        process.off("SIGTERM", quit);
        panel.stop();
        midiInput.close();
        player.stop();
        if (process.stdout.isTTY) process.stdout.write("\n");
    }
}

async function main() {
    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error(err.message);
            console.error(USAGE);
            process.exitCode = 1;
            return;
        }
        throw err;
    }

    if (config.help) {
        console.log(USAGE);
        return;
    }
    setLogLevel(config.logLevel);

    if (config.listMidi) {
        await listMidi();
        return;
    }

    try {
        await run(config);
    } catch (err) {
        if (err instanceof PresetFormatError) {
            console.error(err.message);
            process.exitCode = 1;
            return;
        }
        throw err;
    }
}

main().catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exitCode = 1;
});
