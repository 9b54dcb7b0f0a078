/**
 * Minimal HTML extraction for the scraping providers.
 *
 * Pattern-based, not a DOM: good enough for links and flat infobox rows,
 * and the scraping providers are best effort anyway.
 */

export interface HtmlLink {
  /** Absolute URL */
  href: string;
  /** Link text, tags stripped */
  text: string;
}

export interface InfoboxRow {
  /** Header cell text */
  label: string;
  /** Raw inner HTML of the data cell */
  dataHtml: string;
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '-',
  mdash: '-',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, entity: string) => {
    if (entity.startsWith('#')) {
      const hex = entity[1] === 'x' || entity[1] === 'X';
      const code = parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
      return code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? whole;
  });
}

/** Visible text of an HTML fragment, whitespace collapsed. */
export function textContent(html: string): string {
  return decodeEntities(html.replace(/<[^>]*>/g, ' '))
    .replace(/\s+/g, ' ')
    .trim();
}

/** Drop `<tag ...>...</tag>` elements (non-nested) entirely. */
export function removeElements(html: string, tags: readonly string[]): string {
  let result = html;
  for (const tag of tags) {
    result = result.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}>`, 'gi'), '');
  }
  return result;
}

const ANCHOR = /<a\b[^>]*?\bhref\s*=\s*(["'])(.*?)\1[^>]*>([\s\S]*?)<\/a>/gi;

/** Every anchor with an href, resolved against `baseUrl`. */
export function extractLinks(html: string, baseUrl: string): HtmlLink[] {
  const links: HtmlLink[] = [];
  for (const match of html.matchAll(ANCHOR)) {
    const href = match[2];
    if (!href || href.startsWith('#') || /^(?:javascript|mailto):/i.test(href)) continue;
    try {
      links.push({
        href: new URL(decodeEntities(href), baseUrl).href,
        text: textContent(match[3] ?? ''),
      });
    } catch {
      // not a URL; skip the link
      continue;
    }
  }
  return links;
}

/** Rows of the first `infobox` table that have both a header and a data cell. */
export function infoboxRows(html: string): InfoboxRow[] {
  const start = html.search(/<table\b[^>]*class\s*=\s*["'][^"']*\binfobox\b/i);
  if (start === -1) return [];
  const end = html.indexOf('</table>', start);
  const table = html.slice(start, end === -1 ? undefined : end);

  const rows: InfoboxRow[] = [];
  for (const row of table.matchAll(/<tr\b[^>]*>([\s\S]*?)<\/tr>/gi)) {
    const cells = row[1] ?? '';
    const header = /<th\b[^>]*>([\s\S]*?)<\/th>/i.exec(cells);
    const data = /<td\b[^>]*>([\s\S]*?)<\/td>/i.exec(cells);
    if (!header || !data) continue;
    rows.push({ label: textContent(header[1] ?? ''), dataHtml: data[1] ?? '' });
  }
  return rows;
}
