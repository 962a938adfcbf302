/**
 * Markdown rewriting for exported note bodies
 */

// http(s) URL: letters, digits, the ASCII range $-_ and a few extra punctuation
// characters, or percent-encoded octets
const URL_PATTERN = /https?:\/\/(?:[a-zA-Z]|[0-9]|[~#$-_@.&+]|[!*(),]|(?:%[0-9a-fA-F][0-9a-fA-F]))+/g;

// A link convertUrls already produced: [url](url)
const CONVERTED_LINK_PATTERN = /\[(https?:\/\/\S+?)\]\(\1\)/g;

// Stands in for the 2nd character of a URL while links are being built, so a
// URL repeated later in the text cannot match inside a link built earlier
const URL_SENTINEL = '%%%';
const SENTINEL_PREFIX = `h${URL_SENTINEL}tp`;

const UNCHECKED_BOX = '☐';
const CHECKED_BOX = '☑';

/**
 * Replace each URL occurrence with a [url](url) link
 * Links produced by an earlier run are left as they are.
 */
export function convertUrls(text: string): string {
  let result = '';
  let lastIndex = 0;

  for (const match of text.matchAll(CONVERTED_LINK_PATTERN)) {
    const index = match.index ?? 0;
    result += linkifySegment(text.slice(lastIndex, index));
    result += match[0];
    lastIndex = index + match[0].length;
  }

  return result + linkifySegment(text.slice(lastIndex));
}

function linkifySegment(segment: string): string {
  const urls = segment.match(URL_PATTERN);
  if (!urls) {
    return segment;
  }

  let text = segment;
  for (const url of urls) {
    const masked = `${url.slice(0, 1)}${URL_SENTINEL}${url.slice(2)}`;
    // String replace with a string pattern only touches the first occurrence
    text = text.replace(url, () => `[${masked}](${masked})`);
  }

  return text.split(SENTINEL_PREFIX).join('http');
}

/**
 * Turn ☐ and ☑ glyphs into Markdown task list markers
 */
export function formatCheckBoxes(text: string): string {
  return text.split(UNCHECKED_BOX).join('- [ ]').split(CHECKED_BOX).join('- [x]');
}

/**
 * Full body rewrite: links first, then checkboxes
 */
export function rewriteBody(text: string): string {
  return formatCheckBoxes(convertUrls(text));
}

/**
 * Markdown link to a path; media links render inline (![..](..))
 */
export function formatLink(
  path: string,
  options: { name?: string; media?: boolean } = {}
): string {
  const sigil = options.media ? '!' : '';
  const name = options.name ?? path;
  return `${sigil}[${name}](${path})`;
}
