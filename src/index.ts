export { AmbPacker, AmbBuild, WriteReport } from "./AmbPacker";
export * from "./AmbTypes";
export * from "./Errors";
export { Outcome, ok, fail } from "./Outcome";
export { Logger, consoleLogger, silentLogger } from "./Logger";
export { loadConfig, BuildOptionsSchema } from "./Config";
export { Codepage, DEFAULT_CODEPAGE, resolveCodepage, normalizeCodepageName, encodeText, decodeBytes } from "./codepage/Codepage";
export { assignArticleName, assignArticleNames, ROOT_ARTICLE_NAME } from "./articles/ArticleNames";
export { renderDocumentText, continuationLink, CONTINUE_LABEL } from "./articles/ArticleText";
export { splitArticle, LINK_RESERVE, MIN_CHUNK_BYTES, PLATFORM_MAX_CHUNK_BYTES } from "./articles/DocumentSplitter";
export { WordIndex, WordIndexEntry, buildIndex, deserializeWordIndex, lookupWord, MAX_INDEX_BYTES } from "./search/WordIndex";
export { HighHalfMap, deriveHighHalfMap, serializeHighHalfMap, parseHighHalfMap } from "./archive/HighHalfMap";
export { ArchiveEntry, ArchiveRecord, pack, packArchive, readArchive, AMB_MAGIC, TITLE_ENTRY, INDEX_ENTRY, MAP_ENTRY } from "./archive/ArchivePacker";
export { ArchiveSink, Artifact } from "./archive/ArchiveSink";
export { FileArchiveSink } from "./archive/SinkAdapters/FileArchiveSink";
export { MemoryArchiveSink } from "./archive/SinkAdapters/MemoryArchiveSink";
