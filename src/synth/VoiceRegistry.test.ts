import { describe, expect, it } from "vitest";
import { VoiceRegistry } from "./VoiceRegistry";
import { DEFAULT_PARAMS } from "./ParameterStore";
import type { Voice } from "../types/engine";

function voice(nodeId: number, note: number): Voice {
    return {
        nodeId,
        note,
        params: { ...DEFAULT_PARAMS, frequency: 440, gate: 1 },
    };
}

describe("VoiceRegistry", () => {
    it("holds at most one mono voice", () => {
        const registry = new VoiceRegistry();

        registry.setMono(voice(1000, 60));
        registry.setMono(voice(1001, 64));

        expect(registry.getMono()?.nodeId).toBe(1001);
        expect(registry.activeVoices()).toHaveLength(1);
    });

    it("clearMono returns the cleared voice", () => {
        const registry = new VoiceRegistry();
        registry.setMono(voice(1000, 60));

        expect(registry.clearMono()?.note).toBe(60);
        expect(registry.getMono()).toBeNull();
        expect(registry.clearMono()).toBeNull();
    });

    it("tracks poly voices in insertion order, not note order", () => {
        const registry = new VoiceRegistry();
        registry.putPoly(67, voice(1000, 67));
        registry.putPoly(60, voice(1001, 60));
        registry.putPoly(64, voice(1002, 64));

        expect(registry.oldestPolyNote()).toBe(67);
        expect(registry.polyNotes()).toEqual([67, 60, 64]);
        expect(registry.polyCount).toBe(3);
    });

    it("popPoly removes and returns a voice, undefined when absent", () => {
        const registry = new VoiceRegistry();
        registry.putPoly(60, voice(1000, 60));

        expect(registry.popPoly(60)?.nodeId).toBe(1000);
        expect(registry.popPoly(60)).toBeUndefined();
        expect(registry.oldestPolyNote()).toBeUndefined();
    });

    it("re-putting a note moves it to the newest position", () => {
        const registry = new VoiceRegistry();
        registry.putPoly(60, voice(1000, 60));
        registry.putPoly(62, voice(1001, 62));
        registry.putPoly(60, voice(1002, 60));

        expect(registry.polyNotes()).toEqual([62, 60]);
        expect(registry.getPoly(60)?.nodeId).toBe(1002);
    });

    it("clearAllPoly empties the poly slot and leaves mono alone", () => {
        const registry = new VoiceRegistry();
        registry.setMono(voice(999, 48));
        registry.putPoly(60, voice(1000, 60));
        registry.putPoly(62, voice(1001, 62));

        const cleared = registry.clearAllPoly();

        expect(cleared.map((v) => v.nodeId)).toEqual([1000, 1001]);
        expect(registry.polyCount).toBe(0);
        expect(Array.from(registry.allPolyVoices())).toEqual([]);
        expect(registry.getMono()?.nodeId).toBe(999);
    });

    it("activeVoices lists mono first, then poly oldest first", () => {
        const registry = new VoiceRegistry();
        registry.putPoly(60, voice(1000, 60));
        registry.setMono(voice(1001, 72));
        registry.putPoly(62, voice(1002, 62));

        expect(registry.activeVoices().map((v) => v.nodeId)).toEqual([1001, 1000, 1002]);
    });
});
