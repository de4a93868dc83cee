/**
 * Datagram transport for OSC packets.
 *
 * scsynth answers on the address a command came from, so one bound
 * socket both sends commands and receives replies.
 *
 * dgram hands a datagram to the socket only after an address lookup on a
 * later tick, and silently drops it if the socket is closed by then.
 * `close()` therefore waits for every send already started.
 */

import { createSocket, type Socket } from "node:dgram";
import { log } from "../utils/log";

export type PacketHandler = (packet: Buffer) => void;

export interface OscTransport {
    /** Open the transport; `onPacket` receives every incoming datagram. */
    open(onPacket: PacketHandler): Promise<void>;
    send(packet: Buffer): Promise<void>;
    close(): Promise<void>;
    readonly isOpen: boolean;
}

export class UdpTransport implements OscTransport {
    private socket: Socket | null = null;
    private inFlight = new Set<Promise<void>>();

    constructor(
        private readonly host: string,
        private readonly port: number,
    ) { }

    get isOpen() {
        return this.socket !== null;
    }

    open(onPacket: PacketHandler): Promise<void> {
        if (this.socket) return Promise.resolve();

        return new Promise((resolve, reject) => {
            const socket = createSocket("udp4");

            const onBindError = (err: Error) => {
                socket.close();
                reject(err);
            };
            socket.once("error", onBindError);

            socket.bind(0, () => {
                socket.off("error", onBindError);
                socket.on("error", (err) => {
                    log.error("[OscEngine] Socket error:", err);
                });
                socket.on("message", (msg) => onPacket(msg));
                this.socket = socket;
                resolve();
            });
        });
    }

    send(packet: Buffer): Promise<void> {
        const socket = this.socket;
        if (!socket) return Promise.reject(new Error("UDP socket is not open"));

        const sending = new Promise<void>((resolve, reject) => {
            socket.send(packet, this.port, this.host, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
        this.inFlight.add(sending);
        const settle = () => this.inFlight.delete(sending);
        sending.then(settle, settle);
        return sending;
    }

    async close(): Promise<void> {
        const socket = this.socket;
        if (!socket) return;
        this.socket = null;

        // Failures were already reported to each sender
        await Promise.allSettled([...this.inFlight]);

        await new Promise<void>((resolve) => {
            socket.close(() => resolve());
        });
    }
}
