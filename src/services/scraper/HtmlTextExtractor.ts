/**
 * HTML Text Extractor
 *
 * Turns a fetched HTML page into a title and plain text. Boilerplate elements
 * are removed and the remaining markup converted with turndown, with rules
 * that keep text content and drop markdown syntax.
 */

import TurndownService from 'turndown';
import { Result, ok, err } from '../../lib/result-types.js';
import { ExtractionError } from '../../lib/errors/IndexErrors.js';
import { STRIPPED_ELEMENTS } from '../../constants/index-constants.js';

/**
 * Title and text of a document
 */
export interface ExtractedDocument {
  title: string;
  text: string;
}

export interface TextExtractor {
  extract(html: string, url: string): Result<ExtractedDocument, ExtractionError>;
}

const TITLE_PATTERN = /<title[^>]*>([\s\S]*?)<\/title>/i;

function createTurndown(): TurndownService {
  const turndown = new TurndownService();

  turndown.remove(['head', 'title', ...STRIPPED_ELEMENTS]);

  turndown.addRule('plainHeading', {
    filter: ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'],
    replacement: (content) => `\n\n${content}\n\n`,
  });
  turndown.addRule('plainListItem', {
    filter: 'li',
    replacement: (content) => `${content.trim()}\n`,
  });
  turndown.addRule('plainBlock', {
    filter: ['blockquote', 'pre'],
    replacement: (content) => `\n\n${content}\n\n`,
  });
  turndown.addRule('plainInline', {
    filter: ['a', 'em', 'i', 'strong', 'b', 'code', 'del', 's'],
    replacement: (content) => content,
  });
  turndown.addRule('imageAlt', {
    filter: 'img',
    replacement: (_content, node) => node.getAttribute('alt') ?? '',
  });
  turndown.addRule('rule', {
    filter: 'hr',
    replacement: () => '\n\n',
  });

  // Plain text output: markdown characters stay as written
  turndown.escape = (text: string) => text;

  return turndown;
}

/**
 * Decode the handful of entities that commonly appear in titles
 */
function decodeEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
}

export class HtmlTextExtractor implements TextExtractor {
  private readonly turndown: TurndownService = createTurndown();

  extract(html: string, url: string): Result<ExtractedDocument, ExtractionError> {
    const titleMatch = html.match(TITLE_PATTERN);
    const rawTitle = titleMatch?.[1] ? decodeEntities(titleMatch[1]).replace(/\s+/g, ' ').trim() : '';
    const title = rawTitle || url;

    const text = this.turndown.turndown(html).trim();
    if (text === '') {
      return err(new ExtractionError(url, 'document has no text content'));
    }

    return ok({ title, text });
  }
}
