import * as cheerio from 'cheerio';

export function loadHtml(payload: string): cheerio.CheerioAPI {
    return cheerio.load(payload);
}

export function firstText($: cheerio.CheerioAPI, selector: string): string {
    return $(selector).first().text().trim();
}

export function firstAttr($: cheerio.CheerioAPI, selector: string, attr: string): string | undefined {
    const value = $(selector).first().attr(attr)?.trim();
    return value || undefined;
}

/**
 * Plain text of a problem statement. Example blocks (`<pre>`) are dropped,
 * blank-line runs collapse to one empty line and space runs to a single space.
 */
export function htmlToText(html: string | null | undefined): string {
    if (!html) {
        return '';
    }
    const $ = cheerio.load(html);
    $('pre').remove();
    return $.root().text()
        .replace(/\n\s*\n/g, '\n\n')
        .replace(/ +/g, ' ')
        .trim();
}
