import * as iconv from "iconv-lite";
import { UnmappableCharacterError, UnsupportedCodepageError } from "../Errors";
import { fail, ok, Outcome } from "../Outcome";
import derived_codepages from "./codepage_overrides.json";

export const DEFAULT_CODEPAGE = "cp437";

const REPLACEMENT_CHARACTER = 0xFFFD;

//immutable once resolved, every build resolves its own copy
export interface Codepage
{
    readonly name: string,
    //code point for each byte 0x80..0xFF, 0 where the codepage leaves the slot undefined
    readonly unicodeMap: readonly number[],
    //reverse of unicodeMap for code points >= 0x80, lowest byte wins
    readonly encodeMap: ReadonlyMap<number, number>
}

type DerivedCodepage = {
    base: string,
    overrides: Record<string, number>
}

const DERIVED_CODEPAGES : Record<string, DerivedCodepage> = derived_codepages;

const CODEPAGE_ALIASES : Record<string, string> = {
    ibm437: "cp437",
    dos437: "cp437",
    windows1250: "cp1250",
    win1250: "cp1250",
    windows1252: "cp1252",
    win1252: "cp1252",
    kamenicky: "kam",
    kamenickyencoding: "kam",
    mazovia: "maz",
};

const NUMBERED_PREFIXES = ["windows", "win", "ibm", "dos", "cp"];

export function normalizeCodepageName(raw: string) : string
{
    const token = raw.trim().toLowerCase().replace(/[-_]/g, "");
    if (Object.hasOwn(CODEPAGE_ALIASES, token)) return CODEPAGE_ALIASES[token];
    if (/^\d+$/.test(token)) return `cp${token}`;

    for (const prefix of NUMBERED_PREFIXES) {
        const number = token.slice(prefix.length);
        if (token.startsWith(prefix) && /^\d+$/.test(number)) return `cp${number}`;
    }
    return token;
}

export function resolveCodepage(raw: string = DEFAULT_CODEPAGE) : Outcome<Codepage, UnsupportedCodepageError>
{
    const name = normalizeCodepageName(raw);
    if (name.length === 0) return fail(new UnsupportedCodepageError(raw, "empty codepage name"));

    if (!Object.hasOwn(DERIVED_CODEPAGES, name)) return buildLibraryCodepage(name);

    const derived = DERIVED_CODEPAGES[name];

    const base = buildLibraryCodepage(derived.base);
    if (!base.ok) return base;

    const unicode_map = [...base.value.unicodeMap];
    for (const [byte, codepoint] of Object.entries(derived.overrides)) {
        unicode_map[Number(byte) - 0x80] = codepoint;
    }
    return ok(createCodepage(name, unicode_map));
}

//single-byte codepages with an ASCII low half, decoded through iconv-lite
function buildLibraryCodepage(name: string) : Outcome<Codepage, UnsupportedCodepageError>
{
    if (!iconv.encodingExists(name)) return fail(new UnsupportedCodepageError(name));

    const all_bytes = Buffer.from(Array.from({ length: 256 }, (_, byte) => byte));
    const decoded = Array.from(iconv.decode(all_bytes, name));
    if (decoded.length !== 256) return fail(new UnsupportedCodepageError(name, "not an 8-bit single-byte encoding"));

    for (let byte = 0; byte < 0x80; byte++) {
        if (decoded[byte] !== String.fromCharCode(byte)) return fail(new UnsupportedCodepageError(name, "low half is not ASCII"));
    }

    const unicode_map = decoded.slice(0x80).map(character => {
        const codepoint = character.codePointAt(0) ?? REPLACEMENT_CHARACTER;
        return codepoint === REPLACEMENT_CHARACTER ? 0 : codepoint;
    });
    if (unicode_map.every(codepoint => codepoint === 0)) return fail(new UnsupportedCodepageError(name, "not an 8-bit single-byte encoding"));

    return ok(createCodepage(name, unicode_map));
}

function createCodepage(name: string, unicode_map: number[]) : Codepage
{
    const encode_map = new Map<number, number>();
    unicode_map.forEach((codepoint, index) => {
        if (codepoint >= 0x80 && !encode_map.has(codepoint)) encode_map.set(codepoint, index + 0x80);
    });

    return Object.freeze({
        name: name,
        unicodeMap: Object.freeze(unicode_map),
        encodeMap: encode_map
    });
}

export function encodeCodepoint(codepoint: number, codepage: Codepage) : number | undefined
{
    if (codepoint < 0x80) return codepoint;
    return codepage.encodeMap.get(codepoint);
}

export function canEncode(character: string, codepage: Codepage) : boolean
{
    const codepoint = character.codePointAt(0);
    return codepoint !== undefined && encodeCodepoint(codepoint, codepage) !== undefined;
}

//encodes the whole text or reports the first character the codepage cannot represent
export function encodeText(text: string, codepage: Codepage, document: string) : Outcome<Uint8Array, UnmappableCharacterError>
{
    const bytes = new Uint8Array(Array.from(text).length);
    let line = 1;
    let column = 1;
    let offset = 0;

    for (const character of text) {
        const byte = encodeCodepoint(character.codePointAt(0) ?? REPLACEMENT_CHARACTER, codepage);
        if (byte === undefined) {
            return fail(new UnmappableCharacterError(character, { document, line, column, offset }, codepage.name));
        }
        bytes[offset++] = byte;

        if (character === "\n") {
            line++;
            column = 1;
        } else {
            column++;
        }
    }
    return ok(bytes);
}

export function decodeByte(byte: number, codepage: Codepage) : number
{
    if (byte < 0x80) return byte;
    return codepage.unicodeMap[byte - 0x80] || REPLACEMENT_CHARACTER;
}

export function decodeBytes(bytes: Uint8Array, codepage: Codepage) : string
{
    let text = "";
    for (const byte of bytes) text += String.fromCodePoint(decodeByte(byte, codepage));
    return text;
}
