export const MAX_UINT16 = 65535;
export const MAX_UINT32 = 4294967295;

//all multi-byte fields in an AMB archive are little-endian
export function pack_u16(value: number) : Uint8Array
{
    if (!Number.isInteger(value) || value < 0 || value > MAX_UINT16) throw new RangeError(`${value} does not fit in a uint16`);
    return new Uint8Array([value & 0xFF, (value >> 8) & 0xFF]);
}

export function pack_u32(value: number) : Uint8Array
{
    if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) throw new RangeError(`${value} does not fit in a uint32`);
    return new Uint8Array([
        value & 0xFF,
        (value >>> 8) & 0xFF,
        (value >>> 16) & 0xFF,
        (value >>> 24) & 0xFF,
    ]);
}

export function unpack_u16(bytes: Uint8Array, offset: number) : number
{
    return (bytes[offset] | (bytes[offset + 1] << 8)) & 0xFFFF;
}

export function unpack_u32(bytes: Uint8Array, offset: number) : number
{
    //>>> 0 keeps the top bit from turning the result negative
    return (bytes[offset] | (bytes[offset + 1] << 8) | (bytes[offset + 2] << 16) | (bytes[offset + 3] << 24)) >>> 0;
}

export function concat_bytes(parts: Uint8Array[]) : Uint8Array
{
    const length = parts.reduce((total, part) => total + part.length, 0);
    const output = new Uint8Array(length);
    let offset = 0;
    for (const part of parts) {
        output.set(part, offset);
        offset += part.length;
    }
    return output;
}

//only for text known to be 7-bit: archive names, link markup
export function ascii_bytes(text: string) : Uint8Array
{
    return Uint8Array.from(text, character => character.charCodeAt(0) & 0x7F);
}

export function ascii_string(bytes: Uint8Array) : string
{
    return String.fromCharCode(...bytes);
}

//16-bit BSD rotating checksum, stored per directory record
export function bsd_checksum(data: Uint8Array) : number
{
    let checksum = 0;
    for (const byte of data) {
        checksum = (checksum >> 1) | ((checksum & 1) << 15);
        checksum = (checksum + byte) & 0xFFFF;
    }
    return checksum;
}
