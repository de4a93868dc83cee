/**
 * scsynth adapter: turns voice decisions into OSC server commands.
 *
 *   boot        /status → wait for /status.reply
 *               [/d_load <path> → wait for /done]
 *               /g_new <group> 0 0, /sync → wait for /synced
 *   createVoice /s_new <def> <node> 0 <group> name value ...
 *   setParam    /n_set <node> <name> <value>
 *   release     /n_set <node> gate 0
 *   quit        /n_free <group>, close socket
 *
 * Voice messages are fire-and-forget: scsynth acknowledges none of them,
 * so failures (encoding, socket) are logged here and never reach the
 * caller.  Only boot waits for replies, to learn whether a server is
 * actually listening and whether the voice group exists.  A `/fail` for
 * a boot command fails the boot.
 */

import osc from "osc-min";
import type { OscArgument, OscPacket } from "osc-min";
import { DEFAULT_GROUP_ID, DEFAULT_SYNTHDEF } from "../constants";
import type { VoiceControls } from "../types/engine";
import { log } from "../utils/log";
import type { EngineAdapter } from "./EngineAdapter";
import type { OscTransport } from "./udpTransport";

/** scsynth add actions */
const ADD_TO_HEAD = 0;
const ROOT_NODE_ID = 0;

/** /sync id used to confirm the voice group was created */
const GROUP_SYNC_ID = 1;

const DEFAULT_REPLY_TIMEOUT_MS = 2000;

export interface OscEngineAdapterOptions {
    transport: OscTransport;
    /** SynthDef every voice instantiates. */
    synthDef?: string;
    /** Group the voices are created in. */
    groupId?: number;
    /** Optional .scsyndef file (path on the server's machine) loaded on boot. */
    synthDefPath?: string;
    /** How long boot waits for each server reply. */
    replyTimeoutMs?: number;
}

type ArgValue = OscArgument["value"];

interface PendingReply {
    address: string;
    match: (args: ArgValue[]) => boolean;
    /** Command whose /fail reply rejects this wait. */
    failsOn: string | undefined;
    resolve: (args: ArgValue[]) => void;
    reject: (err: Error) => void;
    timer: ReturnType<typeof setTimeout>;
}

const int = (value: number): OscArgument => ({ type: "integer", value });
const float = (value: number): OscArgument => ({ type: "float", value });
const str = (value: string): OscArgument => ({ type: "string", value });

export class OscEngineAdapter implements EngineAdapter {
    private transport: OscTransport;
    private synthDef: string;
    private groupId: number;
    private synthDefPath: string | undefined;
    private replyTimeoutMs: number;
    private pending = new Set<PendingReply>();
    private _ready = false;

    constructor(opts: OscEngineAdapterOptions) {
        this.transport = opts.transport;
        this.synthDef = opts.synthDef ?? DEFAULT_SYNTHDEF;
        this.groupId = opts.groupId ?? DEFAULT_GROUP_ID;
        this.synthDefPath = opts.synthDefPath;
        this.replyTimeoutMs = opts.replyTimeoutMs ?? DEFAULT_REPLY_TIMEOUT_MS;
    }

    get ready() {
        return this._ready;
    }

    async boot() {
        await this.transport.open(this.handlePacket);

        try {
            const status = this.awaitReply("/status.reply");
            this.send("/status", []);
            await status;

            if (this.synthDefPath) {
                const done = this.awaitReply("/done", (args) => args[0] === "/d_load", "/d_load");
                this.send("/d_load", [str(this.synthDefPath)]);
                await done;
            }

            // /g_new is silent on success; /sync answers once it was handled
            const synced = this.awaitReply("/synced", (args) => args[0] === GROUP_SYNC_ID, "/g_new");
            this.send("/g_new", [int(this.groupId), int(ADD_TO_HEAD), int(ROOT_NODE_ID)]);
            this.send("/sync", [int(GROUP_SYNC_ID)]);
            await synced;

            this._ready = true;
        } catch (err) {
            this.rejectPending(new Error("Boot aborted"));
            await this.transport.close();
            throw err;
        }
    }

    async quit() {
        if (this._ready) {
            this.send("/n_free", [int(this.groupId)]);
        }
        this._ready = false;
        this.rejectPending(new Error("Engine connection closed"));
        try {
            await this.transport.close();
        } catch (err) {
            log.error("[OscEngine] Failed to close transport:", err);
        }
    }

    createVoice(nodeId: number, controls: VoiceControls) {
        if (!this.assertReady("/s_new")) return;

        const args: OscArgument[] = [
            str(this.synthDef),
            int(nodeId),
            int(ADD_TO_HEAD),
            int(this.groupId),
        ];
        for (const [name, value] of Object.entries(controls)) {
            args.push(str(name), float(value));
        }
        this.send("/s_new", args);
    }

    setParam(nodeId: number, name: string, value: number) {
        if (!this.assertReady("/n_set")) return;
        this.send("/n_set", [int(nodeId), str(name), float(value)]);
    }

    release(nodeId: number) {
        this.setParam(nodeId, "gate", 0.0);
    }

    private assertReady(address: string): boolean {
        if (this._ready) return true;
        log.warn(`[OscEngine] Not connected, skipping ${address}`);
        return false;
    }

    private send(address: string, args: OscArgument[]) {
        let packet: Buffer;
        try {
            packet = osc.toBuffer({ oscType: "message", address, args });
        } catch (err) {
            log.error(`[OscEngine] Could not encode ${address}:`, err);
            return;
        }

        this.transport.send(packet).catch((err: unknown) => {
            log.error(`[OscEngine] Failed to send ${address}:`, err);
        });
    }

    private awaitReply(
        address: string,
        match: (args: ArgValue[]) => boolean = () => true,
        failsOn?: string,
    ): Promise<ArgValue[]> {
        return new Promise((resolve, reject) => {
            const entry: PendingReply = {
                address,
                match,
                failsOn,
                resolve,
                reject,
                timer: setTimeout(() => {
                    this.pending.delete(entry);
                    reject(new Error(`No ${address} from scsynth within ${this.replyTimeoutMs} ms`));
                }, this.replyTimeoutMs),
            };
            this.pending.add(entry);
        });
    }

    private rejectPending(err: Error) {
        for (const entry of this.pending) {
            clearTimeout(entry.timer);
            entry.reject(err);
        }
        this.pending.clear();
    }

    private handlePacket = (buffer: Buffer) => {
        let packet: OscPacket;
        try {
            packet = osc.fromBuffer(buffer);
        } catch (err) {
            log.warn("[OscEngine] Ignoring malformed packet:", err);
            return;
        }
        if (packet.oscType === "bundle") return;

        const args = (packet.args ?? []).map((a) => a.value);

        const failed = packet.address === "/fail";
        if (failed) {
            log.warn("[OscEngine] scsynth reported failure:", args.join(" "));
        }

        for (const entry of this.pending) {
            if (failed && entry.failsOn !== undefined && args[0] === entry.failsOn) {
                clearTimeout(entry.timer);
                this.pending.delete(entry);
                entry.reject(new Error(`scsynth rejected ${args.join(" ")}`));
            } else if (entry.address === packet.address && entry.match(args)) {
                clearTimeout(entry.timer);
                this.pending.delete(entry);
                entry.resolve(args);
            }
        }
    };
}
