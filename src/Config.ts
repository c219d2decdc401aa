import dotenv from "dotenv";
import { z } from "zod";
import { BuildOptions } from "./AmbTypes";
import { MIN_CHUNK_BYTES, PLATFORM_MAX_CHUNK_BYTES } from "./articles/DocumentSplitter";
import { MAP_ENTRY } from "./archive/ArchivePacker";
import { DEFAULT_CODEPAGE } from "./codepage/Codepage";
import { ConfigError } from "./Errors";
import { fail, ok, Outcome } from "./Outcome";

//tolerant on/off parsing, anything unrecognised is left for the schema to reject
function parseFlag(value: unknown) : unknown
{
    if (typeof value !== "string") return value;
    const flag = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(flag)) return true;
    if (["0", "false", "no", "off"].includes(flag)) return false;
    return value;
}

//a bare DOS 8.3 name, no directory part
const SHORT_FILE_NAME = /^[A-Za-z0-9_-]{1,8}(\.[A-Za-z0-9_-]{1,3})?$/;

export const BuildOptionsSchema = z.object({
    title: z.string().optional(),
    codepage: z.string().trim().min(1).default(DEFAULT_CODEPAGE),
    maxChunkBytes: z.coerce.number().int().min(MIN_CHUNK_BYTES).max(PLATFORM_MAX_CHUNK_BYTES).default(PLATFORM_MAX_CHUNK_BYTES),
    index: z.preprocess(parseFlag, z.boolean()).default(true),
    mapPlacement: z.enum(["companion", "embedded"]).default("companion"),
    mapFileName: z.string().trim().regex(SHORT_FILE_NAME, "must be an 8.3 file name without a directory").default(MAP_ENTRY),
});

const ENVIRONMENT_KEYS : Record<keyof BuildOptions, string> = {
    title: "AMB_TITLE",
    codepage: "AMB_CODEPAGE",
    maxChunkBytes: "AMB_MAX_CHUNK_BYTES",
    index: "AMB_INDEX",
    mapPlacement: "AMB_MAP_PLACEMENT",
    mapFileName: "AMB_MAP_FILE",
};

/**
 * Resolves build options from explicit overrides, then AMB_* environment
 * variables, then defaults. When reading the real process environment a
 * .env file in the working directory is loaded first.
 */
export function loadConfig(overrides: Partial<BuildOptions> = {}, env: NodeJS.ProcessEnv = process.env) : Outcome<BuildOptions, ConfigError>
{
    if (env === process.env) dotenv.config();

    const raw : Record<string, unknown> = {};
    for (const [option, variable] of Object.entries(ENVIRONMENT_KEYS)) {
        const value = env[variable];
        if (value !== undefined && value.trim() !== "") raw[option] = value;
    }
    for (const [option, value] of Object.entries(overrides)) {
        if (value !== undefined) raw[option] = value;
    }

    const parsed = BuildOptionsSchema.safeParse(raw);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        return fail(new ConfigError(`Invalid configuration: ${problems.join("; ")}`));
    }
    return ok(parsed.data);
}
