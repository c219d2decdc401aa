import { RenderedDocument } from "../AmbTypes";
import { MalformedDocumentError } from "../Errors";
import { fail, ok, Outcome } from "../Outcome";

export const CONTINUE_LABEL = "Continue";

//longest name a link can point at, used to reserve room before the real name is known
export const LINK_TARGET_PLACEHOLDER = "XXXXXXXX.XXX";

/**
 * Joins the rendered blocks into the article text. Trailing newlines collapse
 * into exactly one so every article ends on a complete line.
 */
export function renderDocumentText(document: RenderedDocument) : string
{
    return document.blocks.join("\n").replace(/\n+$/, "") + "\n";
}

export function validateDocument(document: RenderedDocument, is_root: boolean) : Outcome<string, MalformedDocumentError>
{
    const label = document.slug.trim() || "(unnamed)";
    if (!is_root && document.slug.trim().length === 0) {
        return fail(new MalformedDocumentError(label, "non-root documents need a slug"));
    }

    const text = renderDocumentText(document);
    const tab = text.indexOf("\t");
    if (tab !== -1) {
        const line = text.slice(0, tab).split("\n").length;
        return fail(new MalformedDocumentError(label, `tab character on line ${line}`));
    }
    return ok(text);
}

//the "Continue" link appended to every chunk but the last one of an article
export function continuationLink(target: string, text_ends_with_newline: boolean) : string
{
    const separator = text_ends_with_newline ? "\n" : "\n\n";
    return `${separator}%l${target}:${CONTINUE_LABEL}%t\n`;
}
