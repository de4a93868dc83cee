/**
 * In-process OSC transport that records outgoing packets and plays the
 * part of scsynth for the few commands that get a reply.
 */

import osc from "osc-min";
import type { OscArgument } from "osc-min";
import type { OscTransport, PacketHandler } from "../engine/udpTransport";

export interface DecodedMessage {
    address: string;
    types: string[];
    values: unknown[];
}

export function decode(packet: Buffer): DecodedMessage {
    const decoded = osc.fromBuffer(packet);
    if (decoded.oscType === "bundle") throw new Error("unexpected bundle");
    const args = decoded.args ?? [];
    return {
        address: decoded.address,
        types: args.map((a) => a.type),
        values: args.map((a) => a.value),
    };
}

export class FakeOscTransport implements OscTransport {
    isOpen = false;
    sent: Buffer[] = [];
    /** Answer /status with /status.reply, like a live server. */
    answerStatus = true;
    /** Make every send reject. */
    failSends = false;
    /** Answer /g_new with /fail, as scsynth does for a node id in use. */
    failGroupCreation = false;
    private onPacket: PacketHandler | null = null;

    async open(onPacket: PacketHandler) {
        this.onPacket = onPacket;
        this.isOpen = true;
    }

    async send(packet: Buffer) {
        if (this.failSends) throw new Error("EHOSTUNREACH");
        this.sent.push(packet);

        const { address } = decode(packet);
        if (address === "/status" && this.answerStatus) {
            this.deliver("/status.reply", [
                { type: "integer", value: 1 },
                { type: "integer", value: 0 },
                { type: "integer", value: 0 },
                { type: "integer", value: 1 },
                { type: "integer", value: 0 },
            ]);
        } else if (address === "/d_load") {
            this.deliver("/done", [{ type: "string", value: "/d_load" }]);
        } else if (address === "/g_new" && this.failGroupCreation) {
            this.deliver("/fail", [
                { type: "string", value: "/g_new" },
                { type: "string", value: "duplicate node ID" },
            ]);
        } else if (address === "/sync") {
            const [id] = decode(packet).values;
            this.deliver("/synced", [{ type: "integer", value: typeof id === "number" ? id : 0 }]);
        }
    }

    async close() {
        this.isOpen = false;
        this.onPacket = null;
    }

    /** Send a packet "from the server" on the next microtask. */
    deliver(address: string, args: OscArgument[]) {
        const packet = osc.toBuffer({ oscType: "message", address, args });
        queueMicrotask(() => this.onPacket?.(packet));
    }

    messages(): DecodedMessage[] {
        return this.sent.map(decode);
    }

    addresses(): string[] {
        return this.messages().map((m) => m.address);
    }
}
