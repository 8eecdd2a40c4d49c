import { detectTextDirection } from './text-direction';

/** `*text*` not touching another `*` or `_` on the outside. */
const ITALIC_PATTERN = /(?<![*_])\*([^*_]+?)\*(?![*_])/g;

/** `# Title` followed directly by content on the next line. */
const HEADER_BEFORE_CONTENT = /(?! )#+ \**_*(.*?)\**_*\n(?!\n)/g;

/** `# Title` followed by a blank line. */
const HEADER_BEFORE_BLANK_LINE = /(?! )#+ \**_*(.*?)\**_*\n\n/g;

const NUMBERED_ITEM = /^\s*\d+\.\s/;
const BULLET_ITEM = /^\s*[*-]\s/;
const LEADING_WHITESPACE = /^(\s+)/;

/**
 * Rewrite conventional markdown into WhatsApp's dialect. Steps run in a fixed
 * order: italics are converted before bold so that the `*` left behind by
 * `**bold**` is not mistaken for an italic marker.
 */
export function formatForWhatsApp(markdown: string): string {
  const direction = detectTextDirection(markdown);

  let text = convertItalicSyntax(markdown);
  text = convertBoldSyntax(text);
  text = convertHeaders(text);

  if (direction !== 'unknown') {
    text = formatNestedLists(text);
  }

  return text;
}

export function convertItalicSyntax(text: string): string {
  return text.replace(ITALIC_PATTERN, '_$1_');
}

export function convertBoldSyntax(text: string): string {
  return text.replaceAll('**', '*');
}

/** Turn `#`-style headers into WhatsApp bold italics (`*_Title_*`). */
export function convertHeaders(text: string): string {
  return text
    .replace(HEADER_BEFORE_CONTENT, '*_$1_*\n\n')
    .replace(HEADER_BEFORE_BLANK_LINE, '*_$1_*\n\n');
}

/**
 * Mark indented list items so WhatsApp shows the nesting: `  1. x` becomes
 * `  1 - x` and `  - x` / `  * x` become `  -- x`. Top-level items are left as
 * they are.
 */
export function formatNestedLists(text: string): string {
  return text
    .split('\n')
    .map((line) => {
      const indent = line.trim() ? (LEADING_WHITESPACE.exec(line)?.[1].length ?? 0) : 0;
      if (indent === 0) {
        return line;
      }

      if (NUMBERED_ITEM.test(line)) {
        return line.replace(/^(\s*)(\d+)\.\s/, '$1$2 - ');
      }

      if (BULLET_ITEM.test(line)) {
        return line.replace(/^(\s*)[*-]\s/, '$1-- ');
      }

      return line;
    })
    .join('\n');
}
