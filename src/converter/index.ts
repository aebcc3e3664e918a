import TurndownService from 'turndown';

/**
 * The element a turndown rule is replacing, or undefined for the
 * document and fragment nodes turndown may also pass.
 */
function asElement(node: HTMLElement | Document | DocumentFragment): HTMLElement | undefined {
  return 'nextElementSibling' in node ? node : undefined;
}

function enclosingTable(row: HTMLElement): HTMLElement | undefined {
  for (let parent = row.parentElement; parent; parent = parent.parentElement) {
    if (parent.nodeName === 'TABLE') {
      return parent;
    }
  }
  return undefined;
}

/**
 * Create a TurndownService with ATX headings, `-` bullets, fenced code
 * blocks and GFM pipe tables. Scripts and styles are dropped.
 */
export function createTurndownService(): TurndownService {
  const turndown = new TurndownService({
    headingStyle: 'atx',
    bulletListMarker: '-',
    codeBlockStyle: 'fenced',
    fence: '```',
    strongDelimiter: '**',
    emDelimiter: '_',
  });

  turndown.remove(['script', 'style', 'noscript']);

  turndown.addRule('tableCell', {
    filter: ['th', 'td'],
    replacement(content) {
      return ` ${content.trim().replace(/\n+/g, ' ')} |`;
    },
  });

  // The first row of a table is its header row
  turndown.addRule('tableRow', {
    filter: 'tr',
    replacement(content, node) {
      const row = asElement(node);
      const output = `|${content}\n`;
      if (!row || enclosingTable(row)?.querySelector('tr') !== row) {
        return output;
      }
      const separator = Array.from({ length: row.children.length }, () => ' --- |').join('');
      return `${output}|${separator}\n`;
    },
  });

  turndown.addRule('tableSection', {
    filter: ['thead', 'tbody', 'tfoot'],
    replacement(content) {
      return content;
    },
  });

  turndown.addRule('table', {
    filter: 'table',
    replacement(content) {
      return `\n\n${content.trim()}\n\n`;
    },
  });

  return turndown;
}

/**
 * Converts fetched HTML pages to Markdown.
 */
export class MarkdownConverter {
  private readonly turndown: TurndownService;

  constructor(turndown: TurndownService = createTurndownService()) {
    this.turndown = turndown;
  }

  /** Whitespace-only HTML converts to an empty string. */
  convert(html: string): string {
    if (html.trim() === '') {
      return '';
    }
    return this.turndown.turndown(html);
  }
}
