import { decodeBytes } from "../codepage/Codepage";
import { isWordCharacter } from "../search/WordIndex";
import { testArticle, testCodepage } from "../test_data/TestData";
import { findBreak, LINK_RESERVE, MIN_CHUNK_BYTES, splitArticle } from "./DocumentSplitter";

const cp437 = testCodepage();

describe('DocumentSplitter', () => {
    test('link reserve covers the longest possible link', () => {
        expect(LINK_RESERVE).toBe("\n\n%lXXXXXXXX.XXX:Continue%t\n".length);
        expect(LINK_RESERVE).toBe(28);
        expect(MIN_CHUNK_BYTES).toBe(29);
    });

    test('a document within budget is one chunk without a link', () => {
        const text = "Hello world\nSecond line\n";
        const chunks = splitArticle(testArticle(text), 64, new Set(["INDEX.AMA"]), 0);

        expect(chunks.length).toBe(1);
        expect(chunks[0].name).toBe("INDEX.AMA");
        expect(chunks[0].text).toBe(text);
        expect(chunks[0].next).toBeUndefined();
        expect(decodeBytes(chunks[0].bytes, cp437)).toBe(text);
    });

    test('splits after the last line that fits and links the pieces', () => {
        const line = "word ".repeat(12);
        const text = `${line}\n${line}\n${line}\n`;
        const used = new Set(["INDEX.AMA"]);
        const chunks = splitArticle(testArticle(text), 100, used, 0);

        expect(chunks.map(chunk => chunk.name)).toEqual(["INDEX.AMA", "INDEX01.AMA", "INDEX02.AMA"]);
        expect(chunks.map(chunk => chunk.text)).toEqual([`${line}\n`, `${line}\n`, `${line}\n`]);
        expect(chunks.map(chunk => chunk.next)).toEqual(["INDEX01.AMA", "INDEX02.AMA", undefined]);
        expect(chunks.map(chunk => chunk.bytes.length)).toEqual([87, 87, 61]);
        expect(decodeBytes(chunks[0].bytes, cp437)).toBe(`${line}\n\n%lINDEX01.AMA:Continue%t\n`);
        expect(decodeBytes(chunks[2].bytes, cp437)).toBe(`${line}\n`);
        expect(used.has("INDEX01.AMA")).toBe(true);
        expect(used.has("INDEX02.AMA")).toBe(true);
    });

    test('breaks inside a line after whitespace when no newline fits', () => {
        const text = "alpha beta gamma delta epsilon zeta eta theta\n";
        const chunks = splitArticle(testArticle(text), 40, new Set(["INDEX.AMA"]), 0);

        expect(chunks.map(chunk => chunk.text)).toEqual(["alpha beta ", "gamma delta epsilon zeta eta theta\n"]);
        expect(decodeBytes(chunks[0].bytes, cp437)).toBe("alpha beta \n\n%lINDEX01.AMA:Continue%t\n");
        expect(chunks[0].bytes.length).toBe(38);
    });

    test('a heading far before the limit does not cut a long paragraph short', () => {
        const paragraph = "lorem ipsum dolor sit amet ".repeat(6);
        const text = `Intro\n${paragraph}${paragraph}\n`;
        const chunks = splitArticle(testArticle(text), 200, new Set(["INDEX.AMA"]), 0);

        expect(chunks.map(chunk => chunk.text)).toEqual([`Intro\n${paragraph}`, `${paragraph}\n`]);
        expect(chunks.map(chunk => chunk.bytes.length)).toEqual([195, 163]);
        expect(decodeBytes(chunks[0].bytes, cp437)).toBe(`Intro\n${paragraph}\n\n%lINDEX01.AMA:Continue%t\n`);
    });

    test('a word longer than the budget gets a chunk of its own', () => {
        const long_word = "x".repeat(50);
        const text = `ab ${long_word} cd\n`;
        const chunks = splitArticle(testArticle(text), 40, new Set(["INDEX.AMA"]), 0);

        expect(chunks.map(chunk => chunk.text)).toEqual(["ab ", long_word, " cd\n"]);
        expect(chunks[1].next).toBe("INDEX02.AMA");
        expect(chunks[2].next).toBeUndefined();
    });

    test('every non-terminal chunk respects the budget and no break splits a word', () => {
        const sentence = "The quick brown fox jumps over the lazy dog, then naps. ";
        const text = sentence.repeat(20).trim() + "\n";
        const budget = 64;
        const chunks = splitArticle(testArticle(text, "FOX.AMA"), budget, new Set(["INDEX.AMA", "FOX.AMA"]), 5);

        expect(chunks.length).toBeGreaterThan(1);
        expect(chunks.map(chunk => chunk.text).join("")).toBe(text);
        expect(chunks.map(chunk => chunk.ordinal)).toEqual(chunks.map((_, index) => index + 5));

        chunks.forEach((chunk, index) => {
            if (index < chunks.length - 1) {
                expect(chunk.bytes.length).toBeLessThanOrEqual(budget);
                expect(decodeBytes(chunk.bytes, cp437).endsWith(`%l${chunk.next}:Continue%t\n`)).toBe(true);

                const last = Array.from(chunk.text).pop();
                const first = Array.from(chunks[index + 1].text)[0];
                expect(isWordCharacter(last) && isWordCharacter(first)).toBe(false);
            } else {
                expect(chunk.next).toBeUndefined();
                expect(decodeBytes(chunk.bytes, cp437)).toBe(chunk.text);
            }
        });
    });

    test('splitting is deterministic', () => {
        const text = "Lorem ipsum dolor sit amet, consectetur adipiscing elit.\n".repeat(10);
        const first = splitArticle(testArticle(text), 80, new Set(["INDEX.AMA"]), 0);
        const second = splitArticle(testArticle(text), 80, new Set(["INDEX.AMA"]), 0);

        expect(second).toEqual(first);
    });

    test('continuation names avoid names already in the archive', () => {
        const text = "one two three four five six seven eight nine ten\n";
        const chunks = splitArticle(testArticle(text), 40, new Set(["INDEX.AMA", "INDEX01.AMA"]), 0);

        expect(chunks[1].name).toBe("INDEX011.AMA");
        expect(chunks[0].next).toBe("INDEX011.AMA");
    });

    test('high-half characters count as one byte each', () => {
        const text = "café crème brûlée\n";
        const chunks = splitArticle(testArticle(text), 64, new Set(["INDEX.AMA"]), 0);

        expect(chunks.length).toBe(1);
        expect(chunks[0].bytes.length).toBe(18);
    });

    test('findBreak prefers newlines, then whitespace, then word boundaries', () => {
        expect(findBreak(Array.from("ab\ncd ef"), 0, 7)).toBe(3);
        expect(findBreak(Array.from("abcd ef-gh"), 0, 9)).toBe(5);
        expect(findBreak(Array.from("abcdef-ghij"), 0, 9)).toBe(7);
        expect(findBreak(Array.from("abcdefghij"), 0, 9)).toBeUndefined();

        const far = Array.from(`ab\n${"word ".repeat(20)}`);
        expect(findBreak(far, 0, 83)).toBe(83);
        expect(findBreak(far, 0, 81)).toBe(3);
    });

    test('rejects a budget that cannot hold a link', () => {
        expect(() => splitArticle(testArticle("text\n"), 28, new Set(), 0)).toThrow(RangeError);
    });
});
