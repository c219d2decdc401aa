import { Codepage, decodeByte } from "../codepage/Codepage";
import { pack_u16, unpack_u16 } from "./BinaryUtils";

//byte value 0x80..0xFF -> code point, ascending by byte
export type HighHalfMap = ReadonlyMap<number, number>;

const HIGH_HALF_SLOTS = 128;

/**
 * Collects every byte >= 0x80 that the archive actually contains and what it
 * stands for. Returns undefined when the output is pure 7-bit.
 */
export function deriveHighHalfMap(sources: Uint8Array[], codepage: Codepage) : HighHalfMap | undefined
{
    const used = new Set<number>();
    for (const source of sources) {
        for (const byte of source) {
            if (byte >= 0x80) used.add(byte);
        }
    }
    if (used.size === 0) return undefined;

    const map = new Map<number, number>();
    for (const byte of [...used].sort((a, b) => a - b)) {
        map.set(byte, decodeByte(byte, codepage));
    }
    return map;
}

//UNICODE.MAP layout: 128 little-endian u16 code points for bytes 0x80..0xFF, 0 for bytes never emitted
export function serializeHighHalfMap(map: HighHalfMap) : Uint8Array
{
    const output = new Uint8Array(HIGH_HALF_SLOTS * 2);
    for (const [byte, codepoint] of map) {
        //code points above the BMP have no slot in a u16 table
        output.set(pack_u16(codepoint > 0xFFFF ? 0xFFFD : codepoint), (byte - 0x80) * 2);
    }
    return output;
}

export function parseHighHalfMap(bytes: Uint8Array) : HighHalfMap
{
    const map = new Map<number, number>();
    for (let slot = 0; slot < HIGH_HALF_SLOTS && slot * 2 + 1 < bytes.length; slot++) {
        const codepoint = unpack_u16(bytes, slot * 2);
        if (codepoint !== 0) map.set(slot + 0x80, codepoint);
    }
    return map;
}
