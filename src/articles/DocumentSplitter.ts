import { Chunk } from "../AmbTypes";
import { ascii_bytes, concat_bytes, MAX_UINT16 } from "../archive/BinaryUtils";
import { isWordCharacter } from "../search/WordIndex";
import { continuationName } from "./ArticleNames";
import { continuationLink, LINK_TARGET_PLACEHOLDER } from "./ArticleText";

//the largest article an archive entry can record
export const PLATFORM_MAX_CHUNK_BYTES = MAX_UINT16;

//room kept free in every chunk that is not the last one of its article
export const LINK_RESERVE = continuationLink(LINK_TARGET_PLACEHOLDER, false).length;

export const MIN_CHUNK_BYTES = LINK_RESERVE + 1;

//columns of one rendered line, a newline break may fall at most this far before the limit
export const RENDERED_LINE_WIDTH = 78;

export interface EncodedArticle
{
    name: string, //article name, also the name of the first chunk
    document: string, //slug
    text: string,
    bytes: Uint8Array //one byte per code point of text
}

/**
 * Splits an article into chunks of at most maxChunkBytes, each but the last
 * ending in a "Continue" link to the next. Breaks go after a newline within one
 * rendered line of the limit, else after the last whitespace, else at the last
 * word boundary.
 * A single word longer than the budget becomes a chunk of its own.
 *
 * Names of continuation chunks are added to used_names.
 */
export function splitArticle(article: EncodedArticle, maxChunkBytes: number, used_names: Set<string>, first_ordinal: number) : Chunk[]
{
    if (maxChunkBytes < MIN_CHUNK_BYTES) throw new RangeError(`maxChunkBytes must be at least ${MIN_CHUNK_BYTES}`);

    const characters = Array.from(article.text);
    if (characters.length !== article.bytes.length) throw new RangeError(`Encoded bytes of '${article.name}' do not match its text`);

    const ranges = splitRanges(characters, maxChunkBytes);

    const names = ranges.map((_, index) => {
        const name = continuationName(article.name, index, used_names);
        used_names.add(name);
        return name;
    });

    return ranges.map(([start, end], index) => {
        const text = characters.slice(start, end).join("");
        const text_bytes = article.bytes.subarray(start, end);
        const next : string | undefined = names[index + 1];

        const chunk : Chunk = {
            name: names[index],
            ordinal: first_ordinal + index,
            document: article.document,
            text: text,
            bytes: text_bytes.slice()
        };
        if (next !== undefined) {
            chunk.bytes = concat_bytes([text_bytes, ascii_bytes(continuationLink(next, text.endsWith("\n")))]);
            chunk.next = next;
        }
        return chunk;
    });
}

//[start, end) code point ranges covering the whole text in order
export function splitRanges(characters: string[], maxChunkBytes: number) : [number, number][]
{
    const ranges : [number, number][] = [];
    const length = characters.length;
    let start = 0;

    while (start < length) {
        //what is left fits without a link
        if (length - start <= maxChunkBytes) {
            ranges.push([start, length]);
            break;
        }

        const limit = start + maxChunkBytes - LINK_RESERVE;
        const end = findBreak(characters, start, limit) ?? endOfWord(characters, limit);
        ranges.push([start, end]);
        start = end;
    }
    return ranges;
}

//best break in (start, limit], undefined when the whole window is one word
export function findBreak(characters: string[], start: number, limit: number) : number | undefined
{
    let whitespace : number | undefined;
    let boundary : number | undefined;

    for (let position = limit; position > start; position--) {
        const before = characters[position - 1];
        if (before === "\n" && limit - position <= RENDERED_LINE_WIDTH) return position;
        if (whitespace === undefined && /\s/u.test(before)) whitespace = position;
        if (boundary === undefined && !(isWordCharacter(before) && isWordCharacter(characters[position]))) boundary = position;
    }
    return whitespace ?? boundary;
}

function endOfWord(characters: string[], from: number) : number
{
    let position = from;
    while (position < characters.length && isWordCharacter(characters[position - 1]) && isWordCharacter(characters[position])) {
        position++;
    }
    return position;
}
