export const DEFAULT_DESCRIPTION_LENGTH = 500;

/**
 * Collapse whitespace runs into single spaces and trim.
 * Null and undefined become the empty string.
 */
export function cleanText(text: string | null | undefined): string {
  if (!text) return '';
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Decode the common named entities plus decimal and hex character references.
 */
export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&#x([0-9a-f]+);/gi, (_, code: string) => String.fromCodePoint(Number.parseInt(code, 16)))
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
}

/**
 * Strip HTML tags from a string. Block-level closers become spaces so that
 * adjacent paragraphs do not run together, then entities are decoded and
 * whitespace collapsed.
 */
export function stripHtml(html: string): string {
  let text = html;

  text = text.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ');
  text = text.replace(/<br\s*\/?>/gi, ' ');
  text = text.replace(/<\/(p|li|div|h[1-6])>/gi, ' ');
  text = text.replace(/<[^>]+>/g, '');

  return cleanText(decodeHtmlEntities(text));
}

export function truncate(text: string, maxLength: number = DEFAULT_DESCRIPTION_LENGTH): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}

/**
 * Resolve a link found on a page into an absolute http(s) URL.
 * Returns undefined for mailto:, javascript:, bare fragments and unparseable input.
 */
export function resolveUrl(href: string | null | undefined, base: string): string | undefined {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return undefined;
  }

  if (/^(mailto|javascript|tel):/i.test(trimmed)) {
    return undefined;
  }

  try {
    const resolved = new URL(trimmed, base);
    return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.toString() : undefined;
  } catch {
    return undefined;
  }
}

