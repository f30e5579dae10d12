/**
 * Strip HTML to visible text (regex-based, no dependencies). Page chrome
 * (nav, header, footer) is dropped along with scripts and styles.
 */
export function htmlToText(html: string): string {
  let text = html;
  // Remove non-content blocks
  text = text.replace(/<(script|style|noscript|nav|header|footer)\b[\s\S]*?<\/\1\s*>/gi, '');
  // Remove HTML comments
  text = text.replace(/<!--[\s\S]*?-->/g, '');
  // Replace block-level boundaries with newlines
  text = text.replace(/<(?:br|\/p|\/div|\/li|\/tr|\/h[1-6]|\/section|\/article|\/td|\/th)[^>]*>/gi, '\n');
  // Remove remaining tags
  text = text.replace(/<[^>]+>/g, '');
  text = decodeEntities(text);
  // Collapse whitespace
  text = text.replace(/[ \t\r\f\v]+/g, ' ');
  text = text.replace(/ *\n */g, '\n');
  text = text.replace(/\n{3,}/g, '\n\n');
  return text.trim();
}

export function decodeEntities(text: string): string {
  return text
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&ndash;/g, '–')
    .replace(/&mdash;/g, '—')
    .replace(/&#(\d+);/g, (_, code: string) => {
      const point = Number(code);
      return point <= 0x10ffff ? String.fromCodePoint(point) : '';
    })
    .replace(/&amp;/g, '&');
}

export interface PageLink {
  url: string;
  text: string;
  type?: string;
}

const ANCHOR_RE = /<a\b([^>]*)>([\s\S]*?)<\/a\s*>/gi;
const HREF_RE = /\bhref\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/i;
const TYPE_RE = /\btype\s*=\s*(?:"([^"]*)"|'([^']*)')/i;

/**
 * Collect anchor hrefs in document order, resolved against the page URL.
 * Fragments are dropped; links that do not resolve are skipped.
 */
export function extractLinks(html: string, baseUrl: string): PageLink[] {
  const links: PageLink[] = [];
  for (const match of html.matchAll(ANCHOR_RE)) {
    const attrs = match[1] ?? '';
    const href = HREF_RE.exec(attrs);
    const rawHref = href ? (href[1] ?? href[2] ?? href[3] ?? '').trim() : '';
    if (!rawHref) continue;

    let resolved: URL;
    try {
      resolved = new URL(decodeEntities(rawHref), baseUrl);
    } catch {
      continue;
    }
    resolved.hash = '';

    const type = TYPE_RE.exec(attrs);
    links.push({
      url: resolved.toString(),
      text: htmlToText(match[2] ?? ''),
      ...(type ? { type: type[1] ?? type[2] } : {}),
    });
  }
  return links;
}
