// Text cleanup for model output and extracted documents

const ESCAPED_MARKDOWN = /\\([*_`#>\[\]()~|$-])/g;

/**
 * Normalise model output: drop escaped Markdown, collapse `$ 12` / `12 B`
 * style spacing and trim runs of blank lines.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(ESCAPED_MARKDOWN, '$1')
    .replace(/([$€£])\s+(\d)/g, '$1$2')
    .replace(/(\d)\s+(billion|million|bn|B|M)\b/g, '$1 $2')
    .replace(/\b(USD|EUR)\s{2,}/g, '$1 ')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/** Collapse all whitespace to single spaces. */
export function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}

/** First paragraph (up to the first blank line). */
export function firstParagraph(text: string): string {
  const trimmed = text.trim();
  const idx = trimmed.search(/\n\s*\n/);
  return idx === -1 ? trimmed : trimmed.slice(0, idx);
}
