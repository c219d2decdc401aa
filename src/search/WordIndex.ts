import BTree from "sorted-btree";
import { Chunk, IndexOverflowWarning, WordOccurrence } from "../AmbTypes";
import { concat_bytes, MAX_UINT16, pack_u16, unpack_u16 } from "../archive/BinaryUtils";
import { Codepage, decodeByte, decodeBytes, encodeCodepoint, encodeText } from "../codepage/Codepage";

export const MIN_WORD_LENGTH = 2;
export const MAX_WORD_LENGTH = 17;

//the index is stored as a single archive entry, whose length field is a uint16
export const MAX_INDEX_BYTES = MAX_UINT16;

const WORD_CHARACTER = /^[\p{L}\p{N}]$/u;

export type WordIndexEntry = {
    bytes: Uint8Array, //folded word in the target codepage
    occurrences: WordOccurrence[] //in scan order
}

//keyed by the folded word, iteration order is the serialized order
export type WordIndex = BTree<string, WordIndexEntry>;

export type WordIndexResult =
    | { index: WordIndex, bytes: Uint8Array, warning?: undefined }
    | { index?: undefined, bytes?: undefined, warning: IndexOverflowWarning };

export function isWordCharacter(character: string | undefined) : boolean
{
    return character !== undefined && WORD_CHARACTER.test(character);
}

//lower-cases one byte when the lower-case form is a single character the codepage can still encode
export function foldByte(byte: number, codepage: Codepage) : number
{
    const lower = Array.from(String.fromCodePoint(decodeByte(byte, codepage)).toLowerCase());
    if (lower.length !== 1) return byte;
    return encodeCodepoint(lower[0].codePointAt(0) ?? 0, codepage) ?? byte;
}

//words as maximal runs of word characters, with their byte offsets
export function tokenize(bytes: Uint8Array, codepage: Codepage) : { bytes: Uint8Array, offset: number }[]
{
    const tokens : { bytes: Uint8Array, offset: number }[] = [];
    let start = -1;

    for (let offset = 0; offset <= bytes.length; offset++) {
        const is_word = offset < bytes.length && isWordCharacter(String.fromCodePoint(decodeByte(bytes[offset], codepage)));
        if (is_word && start === -1) start = offset;
        if (!is_word && start !== -1) {
            tokens.push({ bytes: bytes.subarray(start, offset), offset: start });
            start = -1;
        }
    }
    return tokens;
}

export function buildWordIndex(chunks: Chunk[], codepage: Codepage) : WordIndex
{
    const index : WordIndex = new BTree<string, WordIndexEntry>();

    for (const chunk of chunks) {
        //the continuation link after the text is markup, not content
        const text_length = Array.from(chunk.text).length;

        for (const token of tokenize(chunk.bytes.subarray(0, text_length), codepage)) {
            if (token.bytes.length < MIN_WORD_LENGTH || token.bytes.length > MAX_WORD_LENGTH) continue;

            const folded = token.bytes.map(byte => foldByte(byte, codepage));
            const key = decodeBytes(folded, codepage);
            const occurrence : WordOccurrence = { chunk: chunk.ordinal, offset: token.offset };

            const entry = index.get(key);
            if (entry) entry.occurrences.push(occurrence);
            else index.set(key, { bytes: folded, occurrences: [occurrence] });
        }
    }
    return index;
}

//exact size of serializeWordIndex's output, computed without building it
export function wordIndexSize(index: WordIndex) : number
{
    let size = 2;
    for (const entry of index.values()) {
        size += 1 + entry.bytes.length + 2 + 4 * entry.occurrences.length;
    }
    return size;
}

/**
 * Layout, little-endian:
 * u16 word count, then per word in key order:
 * u8 length, the folded word bytes, u16 occurrence count,
 * and per occurrence u16 chunk ordinal followed by u16 byte offset.
 */
export function serializeWordIndex(index: WordIndex) : Uint8Array
{
    const parts : Uint8Array[] = [pack_u16(index.size)];

    for (const entry of index.values()) {
        parts.push(new Uint8Array([entry.bytes.length]), entry.bytes, pack_u16(entry.occurrences.length));
        for (const occurrence of entry.occurrences) {
            parts.push(pack_u16(occurrence.chunk), pack_u16(occurrence.offset));
        }
    }
    return concat_bytes(parts);
}

export function deserializeWordIndex(bytes: Uint8Array, codepage: Codepage) : WordIndex
{
    const index : WordIndex = new BTree<string, WordIndexEntry>();
    const word_count = unpack_u16(bytes, 0);
    let offset = 2;

    for (let word = 0; word < word_count; word++) {
        const length = bytes[offset];
        const word_bytes = bytes.slice(offset + 1, offset + 1 + length);
        offset += 1 + length;

        const occurrence_count = unpack_u16(bytes, offset);
        offset += 2;

        const occurrences : WordOccurrence[] = [];
        for (let i = 0; i < occurrence_count; i++) {
            occurrences.push({ chunk: unpack_u16(bytes, offset), offset: unpack_u16(bytes, offset + 2) });
            offset += 4;
        }
        index.set(decodeBytes(word_bytes, codepage), { bytes: word_bytes, occurrences: occurrences });
    }
    return index;
}

/**
 * Builds the index over every chunk and keeps it only when the whole of it
 * fits in one archive entry. An index that does not fit is dropped entirely.
 */
export function buildIndex(chunks: Chunk[], codepage: Codepage) : WordIndexResult
{
    const index = buildWordIndex(chunks, codepage);
    const size = wordIndexSize(index);

    if (size > MAX_INDEX_BYTES) {
        return {
            warning: {
                kind: "IndexOverflow",
                size: size,
                limit: MAX_INDEX_BYTES,
                message: `Word index needs ${size} bytes, more than the ${MAX_INDEX_BYTES} an archive entry can hold. Indexing was skipped.`
            }
        };
    }
    return { index: index, bytes: serializeWordIndex(index) };
}

//case-insensitive lookup, words the codepage cannot encode are simply not found
export function lookupWord(index: WordIndex, word: string, codepage: Codepage) : WordOccurrence[]
{
    const encoded = encodeText(word, codepage, "query");
    if (!encoded.ok) return [];

    const key = decodeBytes(encoded.value.map(byte => foldByte(byte, codepage)), codepage);
    return index.get(key)?.occurrences ?? [];
}
