// Lightweight markup helpers. Pages are scanned with regular expressions and
// balanced-tag matching; no DOM is built.

export interface HtmlElement {
  tag: string;
  attrs: string;
  start: number;
  end: number;
  inner: string;
}

const VOID_ELEMENTS = new Set(['area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input', 'link', 'meta', 'source', 'wbr']);

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Drops comments, scripts and styles so that offsets and text scans only see
 * visible markup.
 */
export const prepareMarkup = (html: string): string =>
  html
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<script[\s\S]*?<\/script>/gi, ' ')
    .replace(/<style[\s\S]*?<\/style>/gi, ' ');

export const decodeEntities = (text: string): string =>
  text
    .replace(/&nbsp;/g, ' ')
    .replace(/&ndash;/g, '–')
    .replace(/&mdash;/g, '—')
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&#(\d+);/g, (_match, num: string) => {
      const code = Number(num);
      return Number.isFinite(code) ? String.fromCodePoint(code) : '';
    })
    .replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) => {
      const code = Number.parseInt(hex, 16);
      return Number.isFinite(code) ? String.fromCodePoint(code) : '';
    })
    .replace(/&amp;/g, '&');

export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

export const stripTags = (html: string): string => html.replace(/<[^>]+>/g, ' ');

/** Visible text of a fragment with entities decoded and whitespace collapsed. */
export const textOf = (html: string): string => normalizeWhitespace(decodeEntities(stripTags(html)));

export const getAttribute = (attrs: string, name: string): string | undefined => {
  const re = new RegExp(`\\b${escapeRegExp(name)}\\s*=\\s*(?:"([^"]*)"|'([^']*)'|([^\\s"'>]+))`, 'i');
  const match = attrs.match(re);
  if (!match) return undefined;
  const value = match[1] ?? match[2] ?? match[3];
  return value === undefined ? undefined : decodeEntities(value);
};

export const hasClass = (attrs: string, className: string): boolean => {
  const classes = getAttribute(attrs, 'class');
  return !!classes && classes.split(/\s+/).includes(className);
};

interface CloseRange {
  innerEnd: number;
  end: number;
}

/**
 * A list item's end tag is optional: the item also ends at the next sibling
 * `<li>` or at the end tag of its list. Lists nested inside the item are
 * skipped over.
 */
const findListItemClose = (html: string, openEnd: number): CloseRange => {
  const re = /<(\/?)(li|ul|ol)\b[^>]*>/gi;
  re.lastIndex = openEnd;
  let nestedLists = 0;
  let match: RegExpExecArray | null;
  while ((match = re.exec(html)) !== null) {
    const closing = match[1] === '/';
    const isItem = match[2]?.toLowerCase() === 'li';
    if (!isItem) {
      if (!closing) {
        nestedLists += 1;
      } else if (nestedLists > 0) {
        nestedLists -= 1;
      } else {
        return { innerEnd: match.index, end: match.index };
      }
    } else if (nestedLists === 0) {
      return closing
        ? { innerEnd: match.index, end: match.index + match[0].length }
        : { innerEnd: match.index, end: match.index };
    }
  }
  return { innerEnd: html.length, end: html.length };
};

/**
 * Finds where the element opened at `openEnd` closes, counting nested tags of
 * the same name. An unclosed element runs to the end of the markup.
 */
const findClose = (html: string, tag: string, openEnd: number): CloseRange => {
  if (tag === 'li') return findListItemClose(html, openEnd);
  const re = new RegExp(`<(/?)${tag}\\b[^>]*>`, 'gi');
  re.lastIndex = openEnd;
  let depth = 1;
  let match: RegExpExecArray | null;
  while ((match = re.exec(html)) !== null) {
    if (match[1] === '/') {
      depth -= 1;
      if (depth === 0) {
        return { innerEnd: match.index, end: match.index + match[0].length };
      }
    } else if (!match[0].endsWith('/>')) {
      depth += 1;
    }
  }
  return { innerEnd: html.length, end: html.length };
};

/** First element with one of `tags` opening at or after `from`. */
export const findElement = (html: string, tags: readonly string[], from = 0): HtmlElement | null => {
  if (tags.length === 0) return null;
  const re = new RegExp(`<(${tags.map(escapeRegExp).join('|')})\\b([^>]*)>`, 'gi');
  re.lastIndex = from;
  const match = re.exec(html);
  if (!match?.[1]) return null;

  const tag = match[1].toLowerCase();
  const attrs = match[2] ?? '';
  const openEnd = match.index + match[0].length;
  if (VOID_ELEMENTS.has(tag) || attrs.trim().endsWith('/')) {
    return { tag, attrs, start: match.index, end: openEnd, inner: '' };
  }
  const { innerEnd, end } = findClose(html, tag, openEnd);
  return { tag, attrs, start: match.index, end, inner: html.slice(openEnd, innerEnd) };
};

/**
 * All elements with one of `tags` in document order. With `nested` the
 * descendants of a match are searched too; without it only the outermost
 * matches are returned.
 */
export const findAllElements = (
  html: string,
  tags: readonly string[],
  options: { nested?: boolean; limit?: number } = {}
): HtmlElement[] => {
  const { nested = false, limit = Number.POSITIVE_INFINITY } = options;
  const found: HtmlElement[] = [];
  let from = 0;
  while (found.length < limit) {
    const element = findElement(html, tags, from);
    if (!element) break;
    found.push(element);
    from = nested ? element.start + 1 : element.end;
  }
  return found;
};

/**
 * The element that follows position `index`, skipping whitespace, closing
 * tags of wrappers and inline `span` decorations such as edit links. Returns
 * null when text comes first.
 */
export const nextSiblingElement = (html: string, index: number): HtmlElement | null => {
  let position = index;
  for (;;) {
    const rest = html.slice(position);
    const leading = rest.match(/^\s*/)?.[0].length ?? 0;
    position += leading;

    const closing = html.slice(position).match(/^<\/[a-zA-Z][a-zA-Z0-9]*\s*>/);
    if (closing) {
      position += closing[0].length;
      continue;
    }

    const opening = html.slice(position).match(/^<([a-zA-Z][a-zA-Z0-9]*)\b/);
    if (!opening?.[1]) return null;

    const element = findElement(html, [opening[1].toLowerCase()], position);
    if (!element) return null;
    if (element.tag === 'span') {
      position = element.end;
      continue;
    }
    return element;
  }
};

export const documentTitle = (html: string): string | undefined => {
  const element = findElement(html, ['title']);
  if (!element) return undefined;
  const text = textOf(element.inner);
  return text || undefined;
};

/** Absolute http(s) hrefs of the anchors inside a fragment, in order. */
export const absoluteLinks = (html: string): string[] =>
  findAllElements(html, ['a'], { nested: true })
    .map((anchor) => getAttribute(anchor.attrs, 'href')?.trim() ?? '')
    .filter((href) => /^https?:\/\//i.test(href));

/** True when `url` points at `domain` or one of its subdomains. */
export const isOnDomain = (url: string, domain: string): boolean => {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host === domain || host.endsWith(`.${domain}`);
  } catch (_error) {
    return false;
  }
};
