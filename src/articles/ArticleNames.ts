export const ROOT_ARTICLE_NAME = "INDEX.AMA";
export const ARTICLE_EXTENSION = ".AMA";

const MAX_STEM_LENGTH = 8;

//upper-case 8.3 stem: ASCII letters and digits, anything else becomes '_', never starts with a digit
export function articleStem(slug: string) : string
{
    let base = slug.toUpperCase().replace(/[^A-Z0-9]/g, "_");
    if (base.length === 0) base = "ARTICLE";
    if (/^[0-9]/.test(base)) base = `_${base}`;
    return base.slice(0, MAX_STEM_LENGTH);
}

export function assignArticleName(slug: string, existing: ReadonlySet<string>) : string
{
    const base = articleStem(slug);
    let name = `${base}${ARTICLE_EXTENSION}`;
    let counter = 1;

    while (existing.has(name)) {
        const suffix = String(counter).padStart(2, "0");
        name = `${trimStem(base, suffix)}${suffix}${ARTICLE_EXTENSION}`;
        counter++;
    }
    return name;
}

//root keeps INDEX.AMA, the rest are named after their slugs in input order
export function assignArticleNames(slugs: string[]) : string[]
{
    const assigned = new Set<string>();
    return slugs.map((slug, index) => {
        const name = index === 0 ? ROOT_ARTICLE_NAME : assignArticleName(slug, assigned);
        assigned.add(name);
        return name;
    });
}

//name of the index-th piece of a split article, the first piece keeps the article's own name
export function continuationName(article: string, index: number, existing: ReadonlySet<string>) : string
{
    if (index === 0) return article;

    const stem = article.endsWith(ARTICLE_EXTENSION) ? article.slice(0, -ARTICLE_EXTENSION.length) : article;
    const number = String(index).padStart(2, "0");
    let suffix = number;
    let counter = 1;
    let name = `${trimStem(stem, suffix)}${suffix}${ARTICLE_EXTENSION}`;

    while (existing.has(name)) {
        suffix = `${number}${counter}`;
        name = `${trimStem(stem, suffix)}${suffix}${ARTICLE_EXTENSION}`;
        counter++;
    }
    return name;
}

function trimStem(stem: string, suffix: string) : string
{
    return stem.slice(0, Math.max(1, MAX_STEM_LENGTH - suffix.length));
}
