import { Chunk, MapPlacement } from "../AmbTypes";
import { ArchiveLayoutError } from "../Errors";
import { fail, ok, Outcome } from "../Outcome";
import { ascii_bytes, ascii_string, bsd_checksum, concat_bytes, MAX_UINT16, pack_u16, pack_u32, unpack_u16, unpack_u32 } from "./BinaryUtils";

export const AMB_MAGIC = "AMB1";
export const TITLE_ENTRY = "TITLE";
export const INDEX_ENTRY = "WORDS.IDX";
export const MAP_ENTRY = "UNICODE.MAP";

export const MAX_TITLE_BYTES = 64;
export const MAX_ENTRY_NAME_LENGTH = 12;
export const MAX_ENTRY_BYTES = MAX_UINT16;
export const MAX_ENTRIES = MAX_UINT16;

const HEADER_SIZE = 6; //magic + u16 entry count
const DIRECTORY_RECORD_SIZE = 20; //12 byte name, u32 offset, u16 length, u16 checksum

export type ArchiveEntry = {
    name: string,
    data: Uint8Array
}

export type ArchiveRecord = ArchiveEntry & {
    offset: number,
    checksum: number
}

export interface ArchiveContents
{
    title: Uint8Array, //empty when there is no title
    chunks: Chunk[],
    index?: Uint8Array,
    map?: Uint8Array, //serialized high-half map
    mapPlacement: MapPlacement
}

//printable ASCII only, anything else is dropped, then cut to 64 bytes
export function encodeTitle(title: string | undefined) : Uint8Array
{
    const printable = Array.from(title ?? "").filter(character => /^[\x20-\x7E]$/.test(character)).join("");
    return ascii_bytes(printable.trim()).slice(0, MAX_TITLE_BYTES);
}

//TITLE, then every chunk in order, then the index, then an embedded map
export function archiveEntries(contents: ArchiveContents) : ArchiveEntry[]
{
    const entries : ArchiveEntry[] = [];
    if (contents.title.length > 0) entries.push({ name: TITLE_ENTRY, data: contents.title });

    for (const chunk of contents.chunks) entries.push({ name: chunk.name, data: chunk.bytes });

    if (contents.index !== undefined) entries.push({ name: INDEX_ENTRY, data: contents.index });
    if (contents.map !== undefined && contents.mapPlacement === "embedded") entries.push({ name: MAP_ENTRY, data: contents.map });
    return entries;
}

export function validateEntries(entries: ArchiveEntry[]) : Outcome<ArchiveEntry[], ArchiveLayoutError>
{
    if (entries.length > MAX_ENTRIES) return fail(new ArchiveLayoutError(`Archive holds ${entries.length} entries, at most ${MAX_ENTRIES} fit`));

    const seen = new Set<string>();
    for (const entry of entries) {
        const name = entry.name.toUpperCase();
        if (name.length === 0 || name.length > MAX_ENTRY_NAME_LENGTH || !/^[\x21-\x7E]+$/.test(name)) {
            return fail(new ArchiveLayoutError(`Entry name '${entry.name}' does not fit 8.3 constraints`));
        }
        if (seen.has(name)) return fail(new ArchiveLayoutError(`Duplicate entry name '${name}'`));
        if (entry.data.length > MAX_ENTRY_BYTES) {
            return fail(new ArchiveLayoutError(`Entry '${name}' is ${entry.data.length} bytes, more than ${MAX_ENTRY_BYTES}`));
        }
        seen.add(name);
    }
    return ok(entries);
}

/**
 * Serializes entries into an AMB container:
 * "AMB1", u16 entry count, one 20 byte directory record per entry, then the payloads.
 * The output depends only on the entries, so identical input gives identical bytes.
 */
export function packArchive(entries: ArchiveEntry[]) : Outcome<Uint8Array, ArchiveLayoutError>
{
    const valid = validateEntries(entries);
    if (!valid.ok) return valid;

    const directory : Uint8Array[] = [];
    let offset = HEADER_SIZE + DIRECTORY_RECORD_SIZE * entries.length;

    for (const entry of entries) {
        const name = new Uint8Array(MAX_ENTRY_NAME_LENGTH);
        name.set(ascii_bytes(entry.name.toUpperCase()));

        directory.push(name, pack_u32(offset), pack_u16(entry.data.length), pack_u16(bsd_checksum(entry.data)));
        offset += entry.data.length;
    }

    return ok(concat_bytes([
        ascii_bytes(AMB_MAGIC),
        pack_u16(entries.length),
        ...directory,
        ...entries.map(entry => entry.data),
    ]));
}

export function pack(contents: ArchiveContents) : Outcome<Uint8Array, ArchiveLayoutError>
{
    return packArchive(archiveEntries(contents));
}

//parses and verifies an archive, the inverse of packArchive
export function readArchive(bytes: Uint8Array) : Outcome<ArchiveRecord[], ArchiveLayoutError>
{
    if (bytes.length < HEADER_SIZE || ascii_string(bytes.subarray(0, 4)) !== AMB_MAGIC) {
        return fail(new ArchiveLayoutError("Not an AMB archive"));
    }

    const count = unpack_u16(bytes, 4);
    if (bytes.length < HEADER_SIZE + DIRECTORY_RECORD_SIZE * count) return fail(new ArchiveLayoutError("Truncated directory"));

    const records : ArchiveRecord[] = [];
    for (let index = 0; index < count; index++) {
        const position = HEADER_SIZE + DIRECTORY_RECORD_SIZE * index;
        const raw_name = bytes.subarray(position, position + MAX_ENTRY_NAME_LENGTH);
        const name_end = raw_name.indexOf(0);
        const name = ascii_string(name_end === -1 ? raw_name : raw_name.subarray(0, name_end));

        const offset = unpack_u32(bytes, position + 12);
        const length = unpack_u16(bytes, position + 16);
        const checksum = unpack_u16(bytes, position + 18);

        if (offset + length > bytes.length) return fail(new ArchiveLayoutError(`Entry '${name}' points past the end of the archive`));
        const data = bytes.slice(offset, offset + length);
        if (bsd_checksum(data) !== checksum) return fail(new ArchiveLayoutError(`Checksum mismatch in entry '${name}'`));

        records.push({ name, data, offset, checksum });
    }
    return ok(records);
}
