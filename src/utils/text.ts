import { convert } from 'html-to-text';

// HTML 转纯文本
export function htmlToPlainText(html: string): string {
  if (!html) return '';
  return convert(html, {
    wordwrap: false,
    selectors: [
      { selector: 'a', options: { ignoreHref: true } },
      { selector: 'img', format: 'skip' },
    ],
  });
}

/** Trims every line and drops the empty ones. */
export function collapseBlankLines(text: string): string {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean)
    .join('\n');
}

export function firstSentence(text: string, maxLength = 280): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  const match = flat.match(/^.+?[.!?。！？](?=\s|$)/);
  const sentence = match ? match[0] : flat;
  return sentence.length > maxLength ? `${sentence.slice(0, maxLength - 3)}...` : sentence;
}

export function truncate(text: string, maxLength: number, marker = '...'): string {
  return text.length > maxLength ? text.slice(0, maxLength) + marker : text;
}

export function toIsoDate(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}
