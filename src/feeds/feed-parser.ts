/**
 * DealScout — Feed Parser
 *
 * Regex-based reader for RSS 2.0 <item> and Atom <entry> documents.
 * Produces FeedEntry records with optional fields; never throws on
 * malformed markup, it simply finds fewer entries.
 */

import type { FeedEntry } from '../types';

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/**
 * Decode the XML predefined entities plus numeric character references.
 */
export function decodeXmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (whole, ref: string) => {
    if (ref[0] === '#') {
      const code = ref[1] === 'x' || ref[1] === 'X'
        ? parseInt(ref.slice(2), 16)
        : parseInt(ref.slice(1), 10);
      return Number.isInteger(code) && code >= 0 && code <= 0x10ffff
        ? String.fromCodePoint(code)
        : whole;
    }
    return NAMED_ENTITIES[ref.toLowerCase()] ?? whole;
  });
}

/**
 * Markup-free text from an element body.
 * CDATA sections are taken literally, the rest is entity-decoded; any
 * HTML that surfaces (escaped or in CDATA) is stripped.
 */
function toPlainText(raw: string): string {
  const literal = raw
    .split(/(<!\[CDATA\[[\s\S]*?\]\]>)/)
    .map(part => {
      const cdata = part.match(/^<!\[CDATA\[([\s\S]*?)\]\]>$/);
      return cdata ? cdata[1] : decodeXmlEntities(part);
    })
    .join('');

  const withoutMarkup = literal
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<\/?[a-zA-Z][^>]*>/g, ' ');

  // Second decode is intended: escaped-HTML bodies carry entities one level deeper
  return decodeXmlEntities(withoutMarkup).trim();
}

/**
 * Split a document into the raw blocks of one element name.
 */
function splitByTag(xml: string, tag: string): string[] {
  const blocks: string[] = [];
  const re = new RegExp(`<${tag}[\\s>][\\s\\S]*?</${tag}>`, 'gi');
  let match: RegExpExecArray | null;
  while ((match = re.exec(xml)) !== null) {
    blocks.push(match[0]);
  }
  return blocks;
}

/**
 * Body of the first non-self-closing <tag> in a block, or undefined.
 */
function tagBody(block: string, tag: string): string | undefined {
  const re = new RegExp(`<${tag}(?:\\s[^>]*?)?(?<!/)>([\\s\\S]*?)</${tag}>`, 'i');
  const match = block.match(re);
  return match ? match[1] : undefined;
}

function textOf(block: string, ...tags: string[]): string | undefined {
  for (const tag of tags) {
    const body = tagBody(block, tag);
    if (body === undefined) continue;
    const text = toPlainText(body);
    if (text) return text;
  }
  return undefined;
}

function attribute(tag: string, name: string): string | undefined {
  const match = tag.match(new RegExp(`\\s${name}\\s*=\\s*(["'])([\\s\\S]*?)\\1`, 'i'));
  return match ? decodeXmlEntities(match[2]).trim() : undefined;
}

/**
 * Atom <link href> for an entry, preferring rel="alternate" (or no rel).
 */
function atomLink(block: string): string | undefined {
  const links = block.match(/<link\b[^>]*>/gi) ?? [];
  let fallback: string | undefined;

  for (const link of links) {
    const href = attribute(link, 'href');
    if (!href) continue;
    const rel = attribute(link, 'rel');
    if (!rel || rel === 'alternate') return href;
    fallback ??= href;
  }

  return fallback;
}

function rssLink(block: string): string | undefined {
  const link = textOf(block, 'link');
  if (link) return link;
  const guid = textOf(block, 'guid');
  return guid && /^https?:\/\//i.test(guid) ? guid : undefined;
}

function parseRssItem(block: string): FeedEntry {
  return {
    title: textOf(block, 'title'),
    link: rssLink(block),
    summary: textOf(block, 'description', 'content:encoded'),
    published: textOf(block, 'pubDate', 'dc:date'),
    updated: textOf(block, 'atom:updated'),
  };
}

function parseAtomEntry(block: string): FeedEntry {
  return {
    title: textOf(block, 'title'),
    link: atomLink(block) ?? textOf(block, 'link'),
    summary: textOf(block, 'summary', 'content'),
    published: textOf(block, 'published'),
    updated: textOf(block, 'updated'),
  };
}

/**
 * Parse an RSS or Atom document. RSS items win when both are present.
 */
export function parseFeed(xml: string): FeedEntry[] {
  const items = splitByTag(xml, 'item');
  if (items.length > 0) {
    return items.map(parseRssItem);
  }
  return splitByTag(xml, 'entry').map(parseAtomEntry);
}
