import path from "node:path";
import { sha256 } from "js-sha256";
import { BuildOptions, BuildWarning, Bundle, Chunk } from "./AmbTypes";
import { assignArticleNames } from "./articles/ArticleNames";
import { validateDocument } from "./articles/ArticleText";
import { EncodedArticle, MIN_CHUNK_BYTES, PLATFORM_MAX_CHUNK_BYTES, splitArticle } from "./articles/DocumentSplitter";
import { ArchiveSink, Artifact } from "./archive/ArchiveSink";
import { encodeTitle, MAX_ENTRIES, MAX_ENTRY_BYTES, pack } from "./archive/ArchivePacker";
import { deriveHighHalfMap, HighHalfMap, serializeHighHalfMap } from "./archive/HighHalfMap";
import { FileArchiveSink } from "./archive/SinkAdapters/FileArchiveSink";
import { MemoryArchiveSink } from "./archive/SinkAdapters/MemoryArchiveSink";
import { Codepage, encodeText, resolveCodepage } from "./codepage/Codepage";
import { loadConfig } from "./Config";
import { ArchiveLayoutError, BuildError, ConfigError, MalformedDocumentError } from "./Errors";
import { consoleLogger, Logger } from "./Logger";
import { fail, ok, Outcome } from "./Outcome";
import { buildIndex, WordIndex } from "./search/WordIndex";

//everything a build produced, nothing of it is on disk yet
export interface AmbBuild
{
    archive: Uint8Array,
    companionMap?: Uint8Array, //set when a map file has to be written beside the archive
    chunks: Chunk[],
    index?: WordIndex,
    map?: HighHalfMap,
    warnings: BuildWarning[],
    sha256: string
}

export interface WriteReport
{
    archivePath: string,
    mapPath?: string,
    sha256: string,
    chunkCount: number,
    indexed: boolean,
    warnings: BuildWarning[]
}

export class AmbPacker<S extends ArchiveSink = ArchiveSink>
{
    readonly codepage: Codepage;
    readonly options: BuildOptions;
    sink: S;
    logger: Logger;

    constructor(codepage: Codepage, options: BuildOptions, sink: S, logger: Logger = consoleLogger)
    {
        this.codepage = codepage;
        this.options = options;
        this.sink = sink;
        this.logger = logger;
    }

    static fromConfig<S extends ArchiveSink>(options: BuildOptions, sink: S, logger?: Logger) : Outcome<AmbPacker<S>, BuildError>
    {
        const codepage = resolveCodepage(options.codepage);
        if (!codepage.ok) return codepage;
        return ok(new AmbPacker<S>(codepage.value, options, sink, logger));
    }

    //options from the overrides, AMB_* environment variables and defaults
    static fromFileSystem(overrides: Partial<BuildOptions> = {}, logger?: Logger) : Outcome<AmbPacker<FileArchiveSink>, BuildError>
    {
        const options = loadConfig(overrides);
        if (!options.ok) return options;
        return AmbPacker.fromConfig(options.value, new FileArchiveSink(), logger);
    }

    //ignores the environment, only the overrides and defaults apply
    static fromMemory(overrides: Partial<BuildOptions> = {}, logger?: Logger) : Outcome<AmbPacker<MemoryArchiveSink>, BuildError>
    {
        const options = loadConfig(overrides, {});
        if (!options.ok) return options;
        return AmbPacker.fromConfig(options.value, new MemoryArchiveSink(), logger);
    }

    /**
     * Runs the whole pipeline in memory: validate, encode, split, index, map, pack.
     * Stops at the first fatal error. An index that outgrows its entry is dropped
     * and reported in warnings instead.
     */
    build(bundle: Bundle) : Outcome<AmbBuild, BuildError>
    {
        const { maxChunkBytes } = this.options;
        if (!Number.isInteger(maxChunkBytes) || maxChunkBytes < MIN_CHUNK_BYTES || maxChunkBytes > PLATFORM_MAX_CHUNK_BYTES) {
            return fail(new ConfigError(`maxChunkBytes must be an integer between ${MIN_CHUNK_BYTES} and ${PLATFORM_MAX_CHUNK_BYTES}`));
        }

        const articles = this.encodeArticles(bundle);
        if (!articles.ok) return articles;

        const used_names = new Set(articles.value.map(article => article.name));
        const chunks : Chunk[] = [];
        for (const article of articles.value) {
            chunks.push(...splitArticle(article, maxChunkBytes, used_names, chunks.length));
        }

        const oversized = chunks.find(chunk => chunk.bytes.length > MAX_ENTRY_BYTES);
        if (oversized) {
            return fail(new ArchiveLayoutError(`Article '${oversized.name}' is ${oversized.bytes.length} bytes, more than ${MAX_ENTRY_BYTES}`));
        }
        //TITLE, WORDS.IDX and UNICODE.MAP
        if (chunks.length + 3 > MAX_ENTRIES) {
            return fail(new ArchiveLayoutError(`${chunks.length} articles do not fit in one archive`));
        }
        this.logger.info(`Split ${articles.value.length} document(s) into ${chunks.length} article(s)`);

        const warnings : BuildWarning[] = [];
        let index : WordIndex | undefined;
        let index_bytes : Uint8Array | undefined;
        let index_words : Uint8Array[] = [];

        if (this.options.index) {
            const result = buildIndex(chunks, this.codepage);
            if (result.warning) {
                warnings.push(result.warning);
                this.logger.warn(result.warning.message);
            } else {
                index = result.index;
                index_bytes = result.bytes;
                index_words = Array.from(index.values(), entry => entry.bytes);
                this.logger.info(`Indexed ${index.size} word(s) in ${index_bytes.length} bytes`);
            }
        }

        const title = encodeTitle(this.options.title ?? bundle.title ?? bundle.documents[0].title);
        const map = deriveHighHalfMap([title, ...chunks.map(chunk => chunk.bytes), ...index_words], this.codepage);
        const map_bytes = map ? serializeHighHalfMap(map) : undefined;
        if (map) this.logger.info(`Archive uses ${map.size} high-half byte(s) of ${this.codepage.name}`);

        const archive = pack({
            title: title,
            chunks: chunks,
            index: index_bytes,
            map: map_bytes,
            mapPlacement: this.options.mapPlacement
        });
        if (!archive.ok) return archive;

        const build : AmbBuild = {
            archive: archive.value,
            chunks: chunks,
            warnings: warnings,
            sha256: sha256(archive.value)
        };
        if (index) build.index = index;
        if (map) build.map = map;
        if (map_bytes && this.options.mapPlacement === "companion") build.companionMap = map_bytes;
        return ok(build);
    }

    /**
     * Builds, then hands the archive and its companion map to the sink.
     * Nothing is written unless the build succeeded.
     */
    async write(bundle: Bundle, archivePath: string) : Promise<Outcome<WriteReport, BuildError>>
    {
        const build = this.build(bundle);
        if (!build.ok) {
            this.logger.error(build.error.message);
            return build;
        }

        const artifacts : Artifact[] = [{ path: archivePath, data: build.value.archive }];
        let map_path : string | undefined;
        if (build.value.companionMap) {
            map_path = path.join(path.dirname(archivePath), this.options.mapFileName);
            artifacts.push({ path: map_path, data: build.value.companionMap });
        }

        await this.sink.commit(artifacts);
        this.logger.info(`Wrote ${archivePath}${map_path ? ` and ${map_path}` : ""}`);

        const report : WriteReport = {
            archivePath: archivePath,
            sha256: build.value.sha256,
            chunkCount: build.value.chunks.length,
            indexed: build.value.index !== undefined,
            warnings: build.value.warnings
        };
        if (map_path) report.mapPath = map_path;
        return ok(report);
    }

    //every document validated and encoded before any of them is split
    private encodeArticles(bundle: Bundle) : Outcome<EncodedArticle[], BuildError>
    {
        if (bundle.documents.length === 0) return fail(new MalformedDocumentError("(bundle)", "no documents to pack"));

        const names = assignArticleNames(bundle.documents.map(document => document.slug));
        const articles : EncodedArticle[] = [];

        for (const [position, document] of bundle.documents.entries()) {
            const text = validateDocument(document, position === 0);
            if (!text.ok) return text;

            const bytes = encodeText(text.value, this.codepage, document.slug || names[position]);
            if (!bytes.ok) return bytes;

            articles.push({ name: names[position], document: document.slug, text: text.value, bytes: bytes.value });
        }
        return ok(articles);
    }
}
