/**
 * Regex helpers for the small, predictable XML documents EDGAR serves
 * (Atom feeds, 13F cover pages). Element names may carry a namespace
 * prefix (`<ns1:city>`), which is ignored.
 */

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

/** Single pass, so `&amp;lt;` and `&#38;lt;` both decode to `&lt;` */
export function decodeXmlEntities(text: string): string {
  return text.replace(/&(#[xX][0-9a-fA-F]+|#\d+|amp|lt|gt|quot|apos);/g, (entity, body: string) => {
    if (!body.startsWith('#')) return ENTITIES[body] ?? entity;
    const code = body[1] === 'x' || body[1] === 'X' ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
    return code <= 0x10ffff ? String.fromCodePoint(code) : entity;
  });
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Inner XML of the first `<tag>` element, or null */
export function extractBlock(xml: string, tag: string): string | null {
  const name = escapeRegex(tag);
  const re = new RegExp(`<(?:[\\w-]+:)?${name}(?:\\s[^>]*)?>([\\s\\S]*?)</(?:[\\w-]+:)?${name}>`, 'i');
  const match = xml.match(re);
  return match ? match[1] : null;
}

/** Every `<tag>` element's inner XML, in document order */
export function extractBlocks(xml: string, tag: string): string[] {
  const name = escapeRegex(tag);
  const re = new RegExp(`<(?:[\\w-]+:)?${name}(?:\\s[^>]*)?>([\\s\\S]*?)</(?:[\\w-]+:)?${name}>`, 'gi');
  return Array.from(xml.matchAll(re), match => match[1]);
}

/** Trimmed, entity-decoded text of the first `<tag>` element; null when absent or blank */
export function extractTagValue(xml: string, tag: string): string | null {
  const block = extractBlock(xml, tag);
  if (block === null) return null;
  // CDATA sections are literal text
  const text = block
    .split(/(<!\[CDATA\[[\s\S]*?\]\]>)/)
    .map(part => (part.startsWith('<![CDATA[') ? part.slice(9, -3) : decodeXmlEntities(part)))
    .join('')
    .trim();
  return text === '' ? null : text;
}
