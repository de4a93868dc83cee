/**
 * Boundary to the external synthesis server.
 *
 * Three message shapes cross it: create a voice, set a control on a voice,
 * release a voice.  Every call is fire-and-forget; implementations log
 * their own failures and never throw into the caller, and nothing is
 * acknowledged, so the caller's bookkeeping is the source of truth.
 */

import type { VoiceControls } from "../types/engine";

export interface EngineAdapter {
    /** True once the connection is up and voices can be created. */
    readonly ready: boolean;

    /** Open the connection and prepare the voice group. Rejects on failure. */
    boot(): Promise<void>;

    /** Free the voice group and close the connection. Never rejects. */
    quit(): Promise<void>;

    /** Instantiate the voice SynthDef as node `nodeId` with `controls`. */
    createVoice(nodeId: number, controls: VoiceControls): void;

    /** Set one control on a running node. */
    setParam(nodeId: number, name: string, value: number): void;

    /** Close the gate; the server frees the node when its envelope ends. */
    release(nodeId: number): void;
}
