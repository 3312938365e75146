import { describe, it, expect } from 'vitest';
import { compile } from 'rocket-core';
import { MarkdownItRenderer, createMarkdownRenderer } from './index.js';

describe('MarkdownItRenderer', () => {
  it('should render block markdown', () => {
    const renderer = new MarkdownItRenderer();
    expect(renderer.render('Some *emphasis* here')).toBe('<p>Some <em>emphasis</em> here</p>\n');
  });

  it('should render headings and lists', () => {
    const renderer = new MarkdownItRenderer();
    expect(renderer.render('# Title\n\n- one\n- two\n')).toBe(
      '<h1>Title</h1>\n<ul>\n<li>one</li>\n<li>two</li>\n</ul>\n'
    );
  });

  it('should render inline markdown without a paragraph', () => {
    const renderer = new MarkdownItRenderer({ inline: true });
    expect(renderer.render('**bold**')).toBe('<strong>bold</strong>');
  });

  it('should let raw html through by default', () => {
    const renderer = createMarkdownRenderer();
    expect(renderer.render('<div class="x">kept</div>\n')).toBe('<div class="x">kept</div>\n');
  });

  it('should escape raw html when html is off', () => {
    const renderer = createMarkdownRenderer({ html: false });
    expect(renderer.render('<b>x</b>')).toBe('<p>&lt;b&gt;x&lt;/b&gt;</p>\n');
  });
});

describe('md directive with markdown-it', () => {
  it('should render the evaluated argument', () => {
    const { output } = compile('(:md "A *b*")', { renderer: new MarkdownItRenderer() });
    expect(output).toBe('<p>A <em>b</em></p>\n');
  });

  it('should render a rocket body', () => {
    const { output } = compile('(:md => Hello _world_)', { renderer: new MarkdownItRenderer() });
    expect(output).toBe('<p>Hello <em>world</em></p>\n');
  });
});
