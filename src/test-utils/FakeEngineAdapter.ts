/**
 * In-process stand-in for the synthesis server.
 *
 * Records every message in order so tests can assert exactly which
 * voices were created, updated and released, and in what sequence.
 */

import type { EngineAdapter } from "../engine/EngineAdapter";
import type { VoiceControls } from "../types/engine";

export type EngineMessage =
    | { op: "create"; nodeId: number; controls: VoiceControls }
    | { op: "set"; nodeId: number; name: string; value: number }
    | { op: "release"; nodeId: number }
    | { op: "boot" }
    | { op: "quit" };

export class FakeEngineAdapter implements EngineAdapter {
    ready: boolean;
    messages: EngineMessage[] = [];
    /** Reject the next boot() calls while true. */
    failBoot = false;

    constructor({ ready = true }: { ready?: boolean } = {}) {
        this.ready = ready;
    }

    async boot() {
        this.messages.push({ op: "boot" });
        if (this.failBoot) {
            this.ready = false;
            throw new Error("server unreachable");
        }
        this.ready = true;
    }

    async quit() {
        this.messages.push({ op: "quit" });
        this.ready = false;
    }

    createVoice(nodeId: number, controls: VoiceControls) {
        this.messages.push({ op: "create", nodeId, controls });
    }

    setParam(nodeId: number, name: string, value: number) {
        this.messages.push({ op: "set", nodeId, name, value });
    }

    release(nodeId: number) {
        this.messages.push({ op: "release", nodeId });
    }

    /** Node ids created, in order. */
    created(): number[] {
        return this.messages.flatMap((m) => (m.op === "create" ? [m.nodeId] : []));
    }

    /** Node ids released, in order. */
    released(): number[] {
        return this.messages.flatMap((m) => (m.op === "release" ? [m.nodeId] : []));
    }

    /** Compact log, e.g. ["create 1000", "release 1000", "set 1001 cutoff=300"]. */
    trace(): string[] {
        return this.messages.map((m) => {
            switch (m.op) {
                case "create":
                    return `create ${m.nodeId}`;
                case "set":
                    return `set ${m.nodeId} ${m.name}=${m.value}`;
                case "release":
                    return `release ${m.nodeId}`;
                case "boot":
                case "quit":
                    return m.op;
            }
        });
    }

    clear() {
        this.messages = [];
    }
}
