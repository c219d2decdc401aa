//a document as the upstream renderer hands it over, read-only to the packer
export interface RenderedDocument
{
    slug: string,
    title?: string,
    blocks: string[] //rendered text blocks, joined with "\n"
}

//documents[0] is the root article and always becomes INDEX.AMA
export interface Bundle
{
    title?: string,
    documents: RenderedDocument[]
}

export interface Chunk
{
    name: string, //8.3 article name inside the archive
    ordinal: number, //position among all chunks of the archive
    document: string, //slug of the source document
    text: string, //slice of the rendered text, without the continuation link
    bytes: Uint8Array, //encoded text followed by the encoded continuation link
    next?: string //name of the chunk the "Continue" link points at
}

export type WordOccurrence = {
    chunk: number, //chunk ordinal
    offset: number //byte offset within the chunk payload
}

export type MapPlacement = "companion" | "embedded";

export type IndexOverflowWarning = {
    kind: "IndexOverflow",
    size: number,
    limit: number,
    message: string
}

export type BuildWarning = IndexOverflowWarning;

export interface BuildOptions
{
    title?: string,
    codepage: string,
    maxChunkBytes: number,
    index: boolean,
    mapPlacement: MapPlacement,
    mapFileName: string
}
