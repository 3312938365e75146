/**
 * markdown-it renderer for the `(:md ...)` directive
 */

import MarkdownIt from 'markdown-it';
import type { MarkdownRenderer } from 'rocket-core';

export interface MarkdownItRendererOptions {
  /** Let raw HTML through, so directive output nested in markdown survives */
  html?: boolean;
  linkify?: boolean;
  typographer?: boolean;
  breaks?: boolean;
  /** Render without the surrounding paragraph */
  inline?: boolean;
}

export class MarkdownItRenderer implements MarkdownRenderer {
  private readonly md: MarkdownIt;
  private readonly inline: boolean;

  constructor(options: MarkdownItRendererOptions = {}) {
    this.md = new MarkdownIt({
      html: options.html ?? true,
      linkify: options.linkify ?? true,
      breaks: options.breaks ?? false,
      typographer: options.typographer ?? true,
    });
    this.inline = options.inline ?? false;
  }

  render(markdown: string): string {
    return this.inline ? this.md.renderInline(markdown) : this.md.render(markdown);
  }
}

export function createMarkdownRenderer(options: MarkdownItRendererOptions = {}): MarkdownRenderer {
  return new MarkdownItRenderer(options);
}
