import { describe, expect, it } from "vitest";
import { VoiceAllocator } from "./VoiceAllocator";
import { FakeEngineAdapter } from "../test-utils/FakeEngineAdapter";
import type { VoiceMode } from "../types/engine";

function setup(mode: VoiceMode = "poly", maxVoices = 8) {
    const adapter = new FakeEngineAdapter();
    const allocator = new VoiceAllocator({ adapter, mode, maxVoices });
    return { adapter, allocator, registry: allocator.registry };
}

describe("VoiceAllocator", () => {
    describe("voice seeding", () => {
        it("creates a voice from the parameter snapshot plus frequency, amp and gate", () => {
            const { adapter, allocator } = setup("mono");

            allocator.noteOn(69, 127);

            const [msg] = adapter.messages;
            expect(msg.op).toBe("create");
            if (msg.op !== "create") return;
            expect(msg.nodeId).toBe(1000);
            expect(msg.controls.frequency).toBe(440);
            expect(msg.controls.amp).toBe(0.2);
            expect(msg.controls.gate).toBe(1);
            expect(msg.controls.cutoff).toBe(1200);
            expect(msg.controls.lfo_target).toBe(0);
        });

        it("scales amp by velocity / 127", () => {
            const { adapter, allocator } = setup();

            allocator.noteOn(60, 100);

            const msg = adapter.messages[0];
            if (msg.op !== "create") throw new Error("expected a create");
            expect(msg.controls.amp).toBeCloseTo((100 / 127) * 0.2, 12);
        });

        it("clamps velocities above 127", () => {
            const { adapter, allocator } = setup();

            allocator.noteOn(60, 300);

            const msg = adapter.messages[0];
            if (msg.op !== "create") throw new Error("expected a create");
            expect(msg.controls.amp).toBe(0.2);
        });

        it("uses parameters set before any note was played", () => {
            const { adapter, allocator } = setup();

            allocator.setParam("cutoff", 300);
            expect(adapter.messages).toEqual([]);

            allocator.noteOn(60, 100);

            const msg = adapter.messages[0];
            if (msg.op !== "create") throw new Error("expected a create");
            expect(msg.controls.cutoff).toBe(300);
        });
    });

    describe("zero velocity", () => {
        it("treats note-on with velocity 0 exactly like note-off", () => {
            const a = setup();
            const b = setup();
            a.allocator.noteOn(60, 100);
            b.allocator.noteOn(60, 100);

            a.allocator.noteOn(60, 0);
            b.allocator.noteOff(60);

            expect(a.adapter.trace()).toEqual(b.adapter.trace());
            expect(a.adapter.trace()).toEqual(["create 1000", "release 1000"]);
            expect(a.registry.polyCount).toBe(0);
        });

        it("never creates a voice for non-positive velocity", () => {
            const { adapter, allocator, registry } = setup("mono");

            allocator.noteOn(60, 0);
            allocator.noteOn(62, -5);

            expect(adapter.created()).toEqual([]);
            expect(registry.getMono()).toBeNull();
        });
    });

    describe("mono mode", () => {
        it("releases the previous voice before creating the next", () => {
            const { adapter, allocator, registry } = setup("mono");

            allocator.noteOn(60, 100);
            allocator.noteOn(64, 100);

            expect(adapter.trace()).toEqual(["create 1000", "release 1000", "create 1001"]);
            expect(registry.getMono()?.note).toBe(64);
            expect(registry.activeVoices()).toHaveLength(1);
        });

        it("ignores a stale note-off for a note that lost the slot", () => {
            const { adapter, allocator, registry } = setup("mono");
            allocator.noteOn(60, 100);
            allocator.noteOn(64, 100);
            adapter.clear();

            allocator.noteOff(60);

            expect(adapter.messages).toEqual([]);
            expect(registry.getMono()?.nodeId).toBe(1001);

            allocator.noteOff(64);

            expect(adapter.trace()).toEqual(["release 1001"]);
            expect(registry.getMono()).toBeNull();
        });

        it("keeps only the most recent note after a run of note-ons", () => {
            const { allocator, registry } = setup("mono");

            for (const note of [48, 52, 55, 60, 55]) allocator.noteOn(note, 90);

            expect(registry.activeVoices()).toHaveLength(1);
            expect(registry.getMono()?.note).toBe(55);
        });
    });

    describe("poly mode", () => {
        it("retriggering a held note leaves exactly one voice for it", () => {
            const { adapter, allocator, registry } = setup();

            allocator.noteOn(60, 100);
            allocator.noteOn(60, 100);

            expect(adapter.trace()).toEqual(["create 1000", "release 1000", "create 1001"]);
            expect(registry.polyCount).toBe(1);
            expect(registry.getPoly(60)?.nodeId).toBe(1001);
        });

        it("steals the oldest voice when full (A, B, C with max 2)", () => {
            const { adapter, allocator, registry } = setup("poly", 2);

            allocator.noteOn(60, 100); // A
            allocator.noteOn(64, 100); // B
            allocator.noteOn(67, 100); // C

            expect(adapter.trace()).toEqual([
                "create 1000",
                "create 1001",
                "release 1000",
                "create 1002",
            ]);
            expect(registry.polyNotes()).toEqual([64, 67]);
        });

        it("steals by allocation order, not by pitch", () => {
            const { allocator, registry } = setup("poly", 2);

            allocator.noteOn(72, 100);
            allocator.noteOn(48, 100);
            allocator.noteOn(60, 100);

            expect(registry.polyNotes()).toEqual([48, 60]);
        });

        it("evicts note 60 when note 68 joins a full set of eight", () => {
            const { adapter, allocator, registry } = setup("poly", 8);

            for (let note = 60; note <= 67; note++) allocator.noteOn(note, 100);
            expect(registry.polyCount).toBe(8);
            adapter.clear();

            allocator.noteOn(68, 100);

            expect(adapter.trace()).toEqual(["release 1000", "create 1008"]);
            expect(registry.polyNotes()).toEqual([61, 62, 63, 64, 65, 66, 67, 68]);
        });

        it("never holds more than maxVoices voices", () => {
            const { allocator, registry } = setup("poly", 4);
            let seed = 7;
            const rand = () => {
                seed = (seed * 16807) % 2147483647;
                return seed;
            };

            for (let i = 0; i < 500; i++) {
                const note = 40 + (rand() % 24);
                const roll = rand() % 10;
                if (roll < 6) allocator.noteOn(note, 1 + (rand() % 127));
                else if (roll < 9) allocator.noteOff(note);
                else allocator.noteOn(note, 0);

                expect(registry.polyCount).toBeLessThanOrEqual(4);
            }
        });

        it("note-off for an untracked note is a silent no-op", () => {
            const { adapter, allocator } = setup();
            allocator.noteOn(60, 100);
            adapter.clear();

            allocator.noteOff(61);

            expect(adapter.messages).toEqual([]);
        });
    });

    describe("parameters", () => {
        it("pushes a change to every sounding voice, mono and poly", () => {
            const { adapter, allocator } = setup("mono");
            allocator.noteOn(48, 100); // mono, 1000
            allocator.setPolyMode(true);
            allocator.noteOn(60, 100); // 1001
            allocator.noteOn(62, 100); // 1002
            adapter.clear();

            allocator.setParam("cutoff", 500);

            expect(adapter.trace()).toEqual([
                "set 1000 cutoff=500",
                "set 1001 cutoff=500",
                "set 1002 cutoff=500",
            ]);
            expect(allocator.store.get("cutoff")).toBe(500);
        });

        it("ignores unknown parameter names entirely", () => {
            const { adapter, allocator } = setup();
            allocator.noteOn(60, 100);
            adapter.clear();

            allocator.setParam("vco2_detune", 0.4);

            expect(adapter.messages).toEqual([]);
            expect(Object.keys(allocator.store.snapshot())).not.toContain("vco2_detune");
        });
    });

    describe("mode switching and teardown", () => {
        it("switching to poly keeps a sounding mono voice registered", () => {
            const { adapter, allocator, registry } = setup("mono");
            allocator.noteOn(60, 100);

            allocator.setPolyMode(true);

            expect(allocator.voiceMode).toBe("poly");
            expect(registry.getMono()?.note).toBe(60);
            expect(adapter.released()).toEqual([]);
        });

        it("noteOffAll releases both slots", () => {
            const { adapter, allocator, registry } = setup("mono");
            allocator.noteOn(48, 100); // 1000
            allocator.setPolyMode(true);
            allocator.noteOn(60, 100); // 1001
            allocator.noteOn(64, 100); // 1002

            allocator.noteOffAll();

            expect(adapter.released()).toEqual([1000, 1001, 1002]);
            expect(registry.activeVoices()).toEqual([]);
            expect(allocator.activeNotes()).toEqual([]);
        });

        it("activeNotes lists mono then poly notes", () => {
            const { allocator } = setup("mono");
            allocator.noteOn(48, 100);
            allocator.setPolyMode(true);
            allocator.noteOn(64, 100);
            allocator.noteOn(60, 100);

            expect(allocator.activeNotes()).toEqual([48, 64, 60]);
        });
    });

    describe("engine not ready", () => {
        it("drops note-ons without touching existing voices", () => {
            const { adapter, allocator, registry } = setup("mono");
            allocator.noteOn(60, 100);
            adapter.ready = false;
            adapter.clear();

            allocator.noteOn(64, 100);

            expect(adapter.messages).toEqual([]);
            expect(registry.getMono()?.note).toBe(60);
        });

        it("resetNodeIds restarts the id sequence", () => {
            const { adapter, allocator } = setup();
            allocator.noteOn(60, 100);
            allocator.noteOffAll();

            allocator.resetNodeIds();
            allocator.noteOn(62, 100);

            expect(adapter.created()).toEqual([1000, 1000]);
        });
    });

    it("rejects a non-positive voice limit", () => {
        const adapter = new FakeEngineAdapter();
        expect(() => new VoiceAllocator({ adapter, maxVoices: 0 })).toThrow(RangeError);
    });
});
