export type AmbErrorKind =
    | "UnmappableCharacter"
    | "MalformedDocument"
    | "UnsupportedCodepage"
    | "ArchiveLayout"
    | "Config";

export abstract class AmbError extends Error
{
    abstract readonly kind: AmbErrorKind;

    constructor(message: string)
    {
        super(message);
        this.name = new.target.name;
    }
}

//where in a rendered document a character sits, line and column are 1-based
export interface TextLocation {
    document: string,
    line: number,
    column: number,
    offset: number //0-based code point offset in the rendered text
}

export class UnmappableCharacterError extends AmbError
{
    readonly kind = "UnmappableCharacter";

    constructor(readonly character: string, readonly location: TextLocation, readonly codepage: string)
    {
        super(
            `Character '${character}' (${formatCodepoint(character.codePointAt(0) ?? 0)}) in '${location.document}' ` +
            `at line ${location.line}, column ${location.column} is not representable in codepage '${codepage}'. ` +
            `Try a different codepage.`
        );
    }
}

export class MalformedDocumentError extends AmbError
{
    readonly kind = "MalformedDocument";

    constructor(readonly document: string, reason: string)
    {
        super(`Document '${document}' is malformed: ${reason}`);
    }
}

export class UnsupportedCodepageError extends AmbError
{
    readonly kind = "UnsupportedCodepage";

    constructor(readonly codepage: string, reason: string = "unknown codepage")
    {
        super(`Unsupported codepage '${codepage}': ${reason}`);
    }
}

export class ArchiveLayoutError extends AmbError
{
    readonly kind = "ArchiveLayout";
}

export class ConfigError extends AmbError
{
    readonly kind = "Config";
}

export type BuildError =
    | UnmappableCharacterError
    | MalformedDocumentError
    | UnsupportedCodepageError
    | ArchiveLayoutError
    | ConfigError;

export function formatCodepoint(codepoint: number) : string
{
    return "U+" + codepoint.toString(16).toUpperCase().padStart(4, "0");
}
