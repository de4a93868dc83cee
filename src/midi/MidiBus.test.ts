import { describe, expect, it, vi } from "vitest";
import { MidiBus } from "./MidiBus";
import type { MidiEvent } from "../types/midi";

describe("MidiBus", () => {
    it("delivers events to subscribers", () => {
        const bus = new MidiBus();
        const handler = vi.fn();
        bus.subscribe(handler);

        const event: MidiEvent = {
            type: "noteon",
            channel: 0,
            note: 60,
            velocity: 100,
        };
        bus.emit(event);

        expect(handler).toHaveBeenCalledTimes(1);
        expect(handler).toHaveBeenCalledWith(event);
    });

    it("delivers events to multiple subscribers in subscription order", () => {
        const bus = new MidiBus();
        const order: string[] = [];
        bus.subscribe(() => order.push("first"));
        bus.subscribe(() => order.push("second"));

        bus.emit({ type: "noteoff", channel: 0, note: 64, velocity: 0 });

        expect(order).toEqual(["first", "second"]);
    });

    it("unsubscribe removes the listener", () => {
        const bus = new MidiBus();
        const handler = vi.fn();
        const unsub = bus.subscribe(handler);

        unsub();
        bus.emit({ type: "noteon", channel: 0, note: 60, velocity: 80 });

        expect(handler).not.toHaveBeenCalled();
        expect(bus.size).toBe(0);
    });

    it("allNotesOff emits a noteoff for every note", () => {
        const bus = new MidiBus();
        const events: MidiEvent[] = [];
        bus.subscribe((e) => events.push(e));

        bus.allNotesOff();

        expect(events).toHaveLength(128);
        expect(events.every((e) => e.type === "noteoff" && e.velocity === 0 && e.channel === 0)).toBe(true);
        expect(events.map((e) => e.note)).toEqual(Array.from({ length: 128 }, (_, i) => i));
    });

    it("allNotesOff targets the given channel", () => {
        const bus = new MidiBus();
        const channels = new Set<number>();
        bus.subscribe((e) => channels.add(e.channel));

        bus.allNotesOff(9);

        expect([...channels]).toEqual([9]);
    });

    it("isolates subscriber errors so other listeners still fire", () => {
        const bus = new MidiBus();
        const spy = vi.spyOn(console, "error").mockImplementation(() => { });
        const badHandler = vi.fn(() => {
            throw new Error("boom");
        });
        const goodHandler = vi.fn();

        bus.subscribe(badHandler);
        bus.subscribe(goodHandler);

        bus.emit({ type: "noteon", channel: 0, note: 60, velocity: 100 });

        expect(badHandler).toHaveBeenCalledTimes(1);
        expect(goodHandler).toHaveBeenCalledTimes(1);
        expect(spy).toHaveBeenCalledWith("[MidiBus] Subscriber error:", expect.any(Error));
        spy.mockRestore();
    });

    it("handles CC events", () => {
        const bus = new MidiBus();
        const handler = vi.fn();
        bus.subscribe(handler);

        const ccEvent: MidiEvent = {
            type: "cc",
            channel: 0,
            note: 0,
            velocity: 0,
            cc: 123,
            value: 0,
        };
        bus.emit(ccEvent);

        expect(handler).toHaveBeenCalledWith(ccEvent);
    });
});
