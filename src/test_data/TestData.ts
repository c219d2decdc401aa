import { RenderedDocument } from "../AmbTypes";
import { EncodedArticle } from "../articles/DocumentSplitter";
import { Codepage, encodeText, resolveCodepage } from "../codepage/Codepage";

export function testCodepage(name: string = "cp437") : Codepage
{
    const resolved = resolveCodepage(name);
    if (!resolved.ok) throw resolved.error;
    return resolved.value;
}

export function testArticle(text: string, name: string = "INDEX.AMA", codepage: Codepage = testCodepage()) : EncodedArticle
{
    const bytes = encodeText(text, codepage, name);
    if (!bytes.ok) throw bytes.error;
    return { name: name, document: name, text: text, bytes: bytes.value };
}

export function testDocument(slug: string, blocks: string[], title?: string) : RenderedDocument
{
    return title === undefined ? { slug, blocks } : { slug, blocks, title };
}

//count distinct lower-case words of exactly `length` letters: "aaaa", "aaab", ...
export function uniqueWords(count: number, length: number) : string[]
{
    const words : string[] = [];
    for (let n = 0; n < count; n++) {
        let word = "";
        let rest = n;
        for (let i = 0; i < length; i++) {
            word = String.fromCharCode(0x61 + (rest % 26)) + word;
            rest = Math.floor(rest / 26);
        }
        words.push(word);
    }
    return words;
}
