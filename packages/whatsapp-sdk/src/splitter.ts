/** Longest text WhatsApp reliably delivers as a single message. */
export const WHATSAPP_MAX_MESSAGE_LENGTH = 4000;

/** `*_Header_*` produced by the formatter from markdown headers. */
const HEADER_PATTERN = /\*_[^*_]+_\*/g;
const BOLD_PATTERN = /\*[^*]+\*/g;
const PARAGRAPH_SEPARATOR = /\n\n+/;

/**
 * Split an outbound message into chunks WhatsApp accepts, preferring
 * boundaries that keep the content readable: headers, then bold spans, then
 * paragraphs, and only as a last resort fixed-width windows. Text within the
 * limit is returned untouched.
 */
export function splitMessage(text: string, maxLength = WHATSAPP_MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const headerChunks = splitByHeaders(text, maxLength);
  if (headerChunks.length > 1) {
    return headerChunks;
  }

  const boldChunks = splitByBoldText(text, maxLength);
  if (boldChunks.length > 1) {
    return boldChunks;
  }

  return splitByParagraphs(text, maxLength);
}

export function splitByHeaders(text: string, maxLength: number): string[] {
  return splitAtMarkers(text, maxLength, HEADER_PATTERN, (chunk) => splitByBoldText(chunk, maxLength));
}

export function splitByBoldText(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks = splitAtMarkers(text, maxLength, BOLD_PATTERN, (chunk) =>
    splitByParagraphs(chunk, maxLength),
  );

  return chunks.length > 1 ? chunks : splitByParagraphs(text, maxLength);
}

/**
 * Greedily pack blank-line separated paragraphs into chunks. A paragraph that
 * alone exceeds the limit is cut into fixed-width windows.
 */
export function splitByParagraphs(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const paragraphs = text.split(PARAGRAPH_SEPARATOR);
  if (paragraphs.length <= 1) {
    return splitByFixedWidth(text, maxLength);
  }

  const chunks: string[] = [];
  let current = '';

  for (const paragraph of paragraphs) {
    if (current && current.length + paragraph.length + 2 > maxLength) {
      chunks.push(current);
      current = '';
    }

    if (paragraph.length > maxLength) {
      if (current) {
        chunks.push(current);
        current = '';
      }
      chunks.push(...splitByFixedWidth(paragraph, maxLength));
      continue;
    }

    current = current ? `${current}\n\n${paragraph}` : paragraph;
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
}

/**
 * Cut text into consecutive windows of at most `maxLength` UTF-16 units. A
 * window never ends between the two halves of a surrogate pair.
 */
export function splitByFixedWidth(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + maxLength, text.length);
    if (end < text.length && end - start > 1 && isHighSurrogate(text.charCodeAt(end - 1))) {
      end -= 1;
    }
    chunks.push(text.slice(start, end));
    start = end;
  }

  return chunks;
}

/**
 * Cut `text` at the start of every match of `pattern`. Needs at least two
 * markers to count as a split. Text before the first marker becomes its own
 * chunk(s); oversized pieces go to `splitOversized`, which must only use later
 * tiers.
 */
function splitAtMarkers(
  text: string,
  maxLength: number,
  pattern: RegExp,
  splitOversized: (chunk: string) => string[],
): string[] {
  const starts = Array.from(text.matchAll(pattern), (match) => match.index ?? 0);
  if (starts.length <= 1) {
    return [text];
  }

  const chunks: string[] = [];

  if (starts[0] > 0) {
    const prefix = text.slice(0, starts[0]);
    chunks.push(...(prefix.length <= maxLength ? [prefix] : splitByParagraphs(prefix, maxLength)));
  }

  starts.forEach((start, index) => {
    const end = index < starts.length - 1 ? starts[index + 1] : text.length;
    const chunk = text.slice(start, end);
    chunks.push(...(chunk.length <= maxLength ? [chunk] : splitOversized(chunk)));
  });

  return chunks;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
