import chalk from 'chalk';
import MarkdownIt from 'markdown-it';

const md = new MarkdownIt({ breaks: true, linkify: true });

const NAMED_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  return value
    .replace(/&#x([0-9a-f]+);/gi, (_m: string, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_m: string, dec: string) => String.fromCodePoint(Number.parseInt(dec, 10)))
    .replace(/&[a-z]+;/gi, (entity: string) => NAMED_ENTITIES[entity] ?? entity);
}

/**
 * Renders the presenter's Markdown for a terminal: bold and code through
 * chalk, tables as pipe-separated rows.
 */
export function renderMarkdownToTerminal(markdown: string): string {
  const html = md.render(markdown);

  const formatted = html
    .replace(/<strong>(.*?)<\/strong>/gi, (_m: string, text: string) => chalk.bold(text))
    .replace(/<em>(.*?)<\/em>/gi, (_m: string, text: string) => chalk.italic(text))
    .replace(/<code>(.*?)<\/code>/gi, (_m: string, text: string) => chalk.cyan(text))

    // Tables
    .replace(/<table>[\s\S]*?<\/table>/gi, (table: string) => table.replace(/>\s+</g, '><'))
    .replace(/<th[^>]*>(.*?)<\/th>/gi, (_m: string, text: string) => `${chalk.bold(text)} | `)
    .replace(/<td[^>]*>(.*?)<\/td>/gi, '$1 | ')
    .replace(/ \| <\/tr>/gi, '\n')
    .replace(/<\/?(table|thead|tbody|tr)>/gi, '')

    // Lists and paragraphs
    .replace(/<li>(.*?)<\/li>/gi, '  • $1\n')
    .replace(/<\/?[ou]l>/gi, '')
    .replace(/<p>([\s\S]*?)<\/p>/gi, '$1\n')
    .replace(/<br\s*\/?>(?!\n)/gi, '\n')

    .replace(/<\/?[^>]+(>|$)/g, '')
    .replace(/\n\s*\n/g, '\n\n')
    .trim();

  return decodeHtmlEntities(formatted);
}
