/**
 * A UDP socket on 127.0.0.1 in the test process that records every OSC
 * message it receives and answers /status and /sync the way scsynth does.
 */

import { createSocket } from "node:dgram";
import osc from "osc-min";
import type { OscArgument } from "osc-min";
import { decode, type DecodedMessage } from "./FakeOscTransport";

export class LoopbackScsynth {
    received: DecodedMessage[] = [];
    errors: Error[] = [];
    private socket = createSocket("udp4");

    /** Bind to an ephemeral port and resolve with it. */
    listen(): Promise<number> {
        this.socket.on("error", (err) => this.errors.push(err));
        this.socket.on("message", (msg, rinfo) => {
            const message = decode(msg);
            this.received.push(message);
            const reply = this.replyTo(message);
            if (reply) this.socket.send(reply, rinfo.port, rinfo.address);
        });
        return new Promise((resolve) => {
            this.socket.bind(0, "127.0.0.1", () => resolve(this.socket.address().port));
        });
    }

    close(): Promise<void> {
        return new Promise((resolve) => this.socket.close(() => resolve()));
    }

    addresses(): string[] {
        return this.received.map((m) => m.address);
    }

    /** Values of every received message sent to `address`. */
    valuesOf(address: string): unknown[][] {
        return this.received.filter((m) => m.address === address).map((m) => m.values);
    }

    private replyTo({ address, values }: DecodedMessage): Buffer | null {
        if (address === "/status") {
            return osc.toBuffer({
                oscType: "message",
                address: "/status.reply",
                args: [1, 0, 0, 1, 0].map((value): OscArgument => ({ type: "integer", value })),
            });
        }
        if (address === "/sync") {
            const [id] = values;
            return osc.toBuffer({
                oscType: "message",
                address: "/synced",
                args: [{ type: "integer", value: typeof id === "number" ? id : 0 }],
            });
        }
        return null;
    }
}
