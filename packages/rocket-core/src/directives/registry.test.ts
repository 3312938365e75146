import { describe, it, expect } from 'vitest';
import { DirectiveRegistry, escapeHtml } from './registry.js';
import { createBuiltinRegistry } from './index.js';
import { compile } from '../compile.js';

describe('DirectiveRegistry', () => {
  it('should list the built-ins', () => {
    const names = createBuiltinRegistry().names();
    expect(names).toContain('concat');
    expect(names).toContain('define-template');
    expect(names).toContain('theme-config');
    expect(names).toContain('define-ref');
    expect(names).toContain('table');
    expect(names).toEqual([...names].sort());
  });

  it('should clone without sharing handlers', () => {
    const original = new DirectiveRegistry().register('a', () => 'a');
    const copy = original.clone().register('b', () => 'b');
    expect(copy.has('a')).toBe(true);
    expect(original.has('b')).toBe(false);
  });

  it('should dispatch a custom directive', () => {
    const registry = createBuiltinRegistry().register('shout', (args, ctx) =>
      ctx.evaluator.evaluateAll(args, ctx.scope).toUpperCase()
    );
    expect(compile('(:shout "hi " there)', { registry }).output).toBe('HI THERE');
  });
});

describe('escapeHtml', () => {
  it('should escape markup and quotes', () => {
    expect(escapeHtml(`<a href='x'>"&"</a>`)).toBe('&lt;a href=&#39;x&#39;&gt;&#34;&amp;&#34;&lt;/a&gt;');
  });
});
