/**
 * Engine worker: the only code that touches engine state.
 *
 * Owns the parameter store, the voice registry and the server connection,
 * and applies commands from the channel strictly one at a time.  Every
 * other part of the panel only enqueues commands, so no state here is
 * ever shared.
 *
 * Lifecycle of `run()`:
 *   boot → loop { next(poll) → dispatch } → release all voices → quit
 *
 * The loop ends on a `shutdown` command or when the AbortSignal given to
 * `run()` fires; the bounded poll is what lets it notice the latter.
 * Reboot is an ordinary command, so it cannot interleave with a note or
 * parameter change.
 */

import { COMMAND_POLL_INTERVAL_MS } from "../constants";
import type { EngineAdapter } from "./EngineAdapter";
import type { CommandChannel } from "./CommandChannel";
import type {
    EngineCommand,
    EngineStatus,
    StatusListener,
    VoiceMode,
} from "../types/engine";
import { VoiceAllocator } from "../synth/VoiceAllocator";
import { log } from "../utils/log";

export interface EngineWorkerOptions {
    channel: CommandChannel<EngineCommand>;
    adapter: EngineAdapter;
    /** Poly-mode voice limit. Defaults to 8. */
    maxVoices?: number;
    /** Starting mode. Defaults to mono. */
    mode?: VoiceMode;
    /** Bounded wait on an empty channel, in ms. */
    pollIntervalMs?: number;
}

export class EngineWorker {
    readonly allocator: VoiceAllocator;
    private channel: CommandChannel<EngineCommand>;
    private adapter: EngineAdapter;
    private pollIntervalMs: number;
    private listeners = new Set<StatusListener>();
    private _status: EngineStatus = "down";
    private running = false;

    constructor(opts: EngineWorkerOptions) {
        this.channel = opts.channel;
        this.adapter = opts.adapter;
        this.pollIntervalMs = opts.pollIntervalMs ?? COMMAND_POLL_INTERVAL_MS;
        this.allocator = new VoiceAllocator({
            adapter: opts.adapter,
            maxVoices: opts.maxVoices,
            mode: opts.mode,
        });
    }

    get status(): EngineStatus {
        return this._status;
    }

    /** Subscribe to engine up/down changes. Returns an unsubscribe function. */
    onStatusChange(fn: StatusListener): () => void {
        this.listeners.add(fn);
        return () => {
            this.listeners.delete(fn);
        };
    }

    /** Boot, process commands until shutdown, then tear down. */
    async run(signal?: AbortSignal): Promise<void> {
        if (this.running) throw new Error("Engine worker is already running");
        this.running = true;

        try {
            await this.boot();

            while (!signal?.aborted) {
                const command = await this.channel.next(this.pollIntervalMs);
                if (command === undefined) {
                    if (this.channel.closed) break;
                    continue;
                }

                let keepRunning = true;
                try {
                    keepRunning = await this.dispatch(command);
                } catch (err) {
                    log.error(`[Engine] "${command.kind}" failed:`, err);
                }
                if (!keepRunning) break;
            }
        } finally {
            await this.teardown();
            this.running = false;
        }
    }

    /** Apply one command. Resolves false when the loop should stop. */
    private async dispatch(command: EngineCommand): Promise<boolean> {
        switch (command.kind) {
            case "noteOn":
                this.allocator.noteOn(command.note, command.velocity);
                return true;
            case "noteOff":
                this.allocator.noteOff(command.note);
                return true;
            case "noteOffAll":
                this.allocator.noteOffAll();
                return true;
            case "setParam":
                this.allocator.setParam(command.name, command.value);
                return true;
            case "setMode":
                this.allocator.setPolyMode(command.poly);
                return true;
            case "snapshot":
                command.reply(this.allocator.store.snapshot());
                return true;
            case "reboot":
                await this.reboot();
                return true;
            case "shutdown":
                return false;
            default: {
                const unreachable: never = command;
                throw new Error(`Unknown engine command: ${JSON.stringify(unreachable)}`);
            }
        }
    }

    private async boot() {
        this.setStatus("booting");
        this.allocator.resetNodeIds();
        try {
            await this.adapter.boot();
            this.setStatus("up");
            log.info("[Engine] Engine is up");
        } catch (err) {
            log.error("[Engine] Failed to boot engine:", err);
            this.setStatus("down");
        }
    }

    private async reboot() {
        log.info("[Engine] Rebooting engine");
        // No voice handle may outlive the connection it was created on
        this.allocator.noteOffAll();
        await this.adapter.quit();
        this.setStatus("down");
        await this.boot();
    }

    private async teardown() {
        this.allocator.noteOffAll();
        await this.adapter.quit();
        this.setStatus("down");

        this.channel.close();
        const dropped = this.channel.drain();
        for (const command of dropped) {
            // Readers waiting on a snapshot still get an answer
            if (command.kind === "snapshot") command.reply(this.allocator.store.snapshot());
        }
        if (dropped.length > 0) {
            log.debug(`[Engine] Discarded ${dropped.length} command(s) after shutdown`);
        }
        log.info("[Engine] Engine worker stopped");
    }

    private setStatus(status: EngineStatus) {
        if (this._status === status) return;
        this._status = status;
        this.listeners.forEach((fn) => {
            try {
                fn(status);
            } catch (err) {
                console.error("[Engine] Status listener error:", err);
            }
        });
    }
}
