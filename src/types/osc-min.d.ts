// osc-min ships no type declarations and has no @types package.
// Only the parts of its API this project calls are declared.
declare module "osc-min" {
    namespace oscMin {
        type OscArgument =
            | { type: "integer"; value: number }
            | { type: "float"; value: number }
            | { type: "double"; value: number }
            | { type: "string"; value: string }
            | { type: "blob"; value: Buffer }
            | { type: "true"; value?: boolean }
            | { type: "false"; value?: boolean }
            | { type: "null"; value?: null }
            | { type: "bang"; value?: unknown }
            | { type: "timetag"; value: [number, number] }
            | { type: "array"; value: OscArgument[] };

        interface OscMessage {
            oscType?: "message";
            address: string;
            args?: OscArgument[];
        }

        interface OscBundle {
            oscType: "bundle";
            timetag: number | [number, number];
            elements: OscPacket[];
        }

        type OscPacket = OscMessage | OscBundle;

        function toBuffer(packet: OscPacket, strict?: boolean): Buffer;
        function fromBuffer(buffer: Buffer, strict?: boolean): OscPacket;
    }

    export = oscMin;
}
