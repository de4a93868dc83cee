/**
 * Raw MIDI device input.
 *
 * ALSA exposes each hardware port as a character device under /dev/snd
 * (midiC<card>D<device>) that yields the unframed byte stream.  Bytes go
 * through MidiByteParser and the resulting events into the shared bus.
 */

import { createReadStream, type ReadStream } from "node:fs";
import { readdir } from "node:fs/promises";
import { basename, join } from "node:path";
import type { MidiBus } from "./MidiBus";
import { MidiByteParser } from "./midiParser";
import { log } from "../utils/log";

export const RAW_MIDI_DIR = "/dev/snd";

function isMissing(err: unknown): boolean {
    return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Device paths of the raw MIDI ports, sorted by name. */
export async function listRawMidiPorts(dir = RAW_MIDI_DIR): Promise<string[]> {
    try {
        const entries = await readdir(dir);
        return entries
            .filter((name) => name.startsWith("midi"))
            .sort()
            .map((name) => join(dir, name));
    } catch (err) {
        if (isMissing(err)) return [];
        throw err;
    }
}

export class RawMidiInput {
    private stream: ReadStream | null = null;
    private path: string | null = null;
    private parser = new MidiByteParser();

    constructor(private readonly bus: MidiBus) { }

    /** Device name of the open port, e.g. "midiC1D0". */
    get portName(): string | null {
        return this.path === null ? null : basename(this.path);
    }

    /** Open a device, closing whichever one was open before. */
    open(path: string) {
        this.close();

        const stream = createReadStream(path);
        this.stream = stream;
        this.path = path;
        this.parser.reset();

        stream.on("data", (chunk: Buffer | string) => {
            const bytes = typeof chunk === "string" ? Buffer.from(chunk, "latin1") : chunk;
            for (const event of this.parser.feed(bytes)) {
                this.bus.emit(event);
            }
        });
        stream.on("error", (err) => {
            log.error(`[MIDI] Error reading ${path}:`, err);
            this.closeStream(stream);
        });
        stream.on("end", () => {
            log.info(`[MIDI] ${path} closed`);
            this.closeStream(stream);
        });

        log.info(`[MIDI] Listening on ${path}`);
    }

    close() {
        if (this.stream) this.closeStream(this.stream);
    }

    private closeStream(stream: ReadStream) {
        stream.removeAllListeners("data");
        stream.destroy();
        if (this.stream === stream) {
            this.stream = null;
            this.path = null;
        }
    }
}
