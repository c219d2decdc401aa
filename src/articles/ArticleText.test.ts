import { MalformedDocumentError } from "../Errors";
import { testDocument } from "../test_data/TestData";
import { continuationLink, renderDocumentText, validateDocument } from "./ArticleText";

describe('ArticleText', () => {
    test('renderDocumentText joins blocks and ends on exactly one newline', () => {
        expect(renderDocumentText(testDocument("a", ["first", "second\n\n"]))).toBe("first\nsecond\n");
        expect(renderDocumentText(testDocument("a", ["one\n", "", "two"]))).toBe("one\n\n\ntwo\n");
        expect(renderDocumentText(testDocument("a", []))).toBe("\n");
    });

    test('validateDocument rejects tabs', () => {
        const result = validateDocument(testDocument("guide", ["ok", "bad\tline"]), true);

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(MalformedDocumentError);
        expect(result.error.message).toBe("Document 'guide' is malformed: tab character on line 2");
    });

    test('validateDocument wants a slug on every document but the root', () => {
        expect(validateDocument(testDocument("", ["root text"]), true).ok).toBe(true);

        const result = validateDocument(testDocument("  ", ["text"]), false);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.message).toBe("Document '(unnamed)' is malformed: non-root documents need a slug");
    });

    test('continuationLink', () => {
        expect(continuationLink("INDEX01.AMA", true)).toBe("\n%lINDEX01.AMA:Continue%t\n");
        expect(continuationLink("INDEX01.AMA", false)).toBe("\n\n%lINDEX01.AMA:Continue%t\n");
    });
});
