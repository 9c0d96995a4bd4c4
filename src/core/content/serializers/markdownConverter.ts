import TurndownService from 'turndown';
import { gfm } from 'turndown-plugin-gfm';

const CODE_LANGUAGE_PATTERN = /(?:^|\s)(?:language|lang)-([\w+#.-]+)/;

/**
 * HTML to GitHub-flavored Markdown. Output depends only on the input HTML,
 * so the same cleaned tree always yields the same Markdown.
 */
export class MarkdownConverter {
  private turndownService: TurndownService;

  constructor() {
    this.turndownService = new TurndownService({
      headingStyle: 'atx',
      hr: '---',
      bulletListMarker: '-',
      codeBlockStyle: 'fenced',
      fence: '```',
      emDelimiter: '*',
      strongDelimiter: '**',
      linkStyle: 'inlined',
      linkReferenceStyle: 'full',
    });

    this.turndownService.use(gfm);
    this.configureRules();
  }

  private configureRules(): void {
    // Headings stay on one line whatever inline markup they contain
    this.turndownService.addRule('single-line-headings', {
      filter: ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'],
      replacement: (content: string, node: TurndownService.Node) => {
        const level = Number(node.nodeName.charAt(1));
        const text = content.replace(/\s+/g, ' ').trim();
        return text ? `\n\n${'#'.repeat(level)} ${text}\n\n` : '';
      },
    });

    // Fenced code keeps the raw text and the language declared on pre or code
    this.turndownService.addRule('fenced-code-with-language', {
      filter: (node: HTMLElement) => node.nodeName === 'PRE',
      replacement: (_content: string, node: HTMLElement) => {
        const code = (node.textContent ?? '').replace(/\n+$/, '');
        const fence = this.fenceFor(code);
        return `\n\n${fence}${this.detectLanguage(node)}\n${code}\n${fence}\n\n`;
      },
    });

    this.turndownService.addRule('blockquotes', {
      filter: 'blockquote',
      replacement: (content: string) => {
        const quoted = content
          .replace(/\n{3,}/g, '\n\n')
          .trim()
          .replace(/^/gm, '> ');
        return `\n\n${quoted}\n\n`;
      },
    });
  }

  /** Language from `language-*` or `lang-*` on the pre or its first code child. */
  detectLanguage(pre: HTMLElement): string {
    const own = pre.getAttribute('class') ?? '';
    const code = pre.querySelector('code');
    const className = `${own} ${code?.getAttribute('class') ?? ''}`;
    return className.match(CODE_LANGUAGE_PATTERN)?.[1] ?? '';
  }

  private fenceFor(code: string): string {
    const longestRun = (code.match(/`{3,}/g) ?? []).reduce((max, run) => Math.max(max, run.length), 2);
    return '`'.repeat(longestRun + 1);
  }

  convertToMarkdown(html: string): string {
    const markdown = this.turndownService.turndown(html);
    return this.postProcessMarkdown(markdown);
  }

  private postProcessMarkdown(markdown: string): string {
    return markdown.replace(/\n{3,}/g, '\n\n').trim();
  }
}

export const markdownConverter = new MarkdownConverter();
