import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InvalidArgumentError, MemoryFileLoader, RecursionLimitError } from 'rocket-core';
import { build, parseMaxDepth } from './build.js';

describe('parseMaxDepth', () => {
  it('should accept positive integers', () => {
    expect(parseMaxDepth('12')).toBe(12);
  });

  it('should reject zero and non-numbers', () => {
    expect(() => parseMaxDepth('0')).toThrow(InvalidArgumentError);
    expect(() => parseMaxDepth('deep')).toThrow("--max-depth must be a positive integer, got 'deep'");
  });
});

describe('build with an in-memory loader', () => {
  it('should write the document to stdout', () => {
    const loader = new MemoryFileLoader({ '/docs/page.rkt': 'Hello (:version)' });
    let written = '';
    build('/docs/page.rkt', { loader, docVersion: '2.1.0', stdout: text => { written += text; } });
    expect(written).toBe('Hello 2.1.0');
  });
});

describe('build on disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rocket-build-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should write output and metadata files using rocket.json', () => {
    fs.writeFileSync(path.join(dir, 'rocket.json'), JSON.stringify({ version: '1.4.2' }));
    fs.writeFileSync(path.join(dir, 'page.rkt'), '(:h1 "Guide")(:version x.y)');

    const output = path.join(dir, 'out', 'page.html');
    const metadata = path.join(dir, 'out', 'page.json');
    build(path.join(dir, 'page.rkt'), { output, metadata });

    expect(fs.readFileSync(output, 'utf-8')).toBe('<h1 id="guide">Guide</h1>1.4');
    expect(fs.readFileSync(metadata, 'utf-8')).toBe('{\n  "title": "Guide"\n}\n');
  });

  it('should let flags override rocket.json', () => {
    fs.writeFileSync(path.join(dir, 'rocket.json'), JSON.stringify({ version: '1.4.2' }));
    fs.writeFileSync(path.join(dir, 'page.rkt'), '(:version)');

    const result = build(path.join(dir, 'page.rkt'), { docVersion: '9.0.0', stdout: () => {} });
    expect(result.output).toBe('9.0.0');
  });

  it('should apply maxDepth from rocket.json', () => {
    fs.writeFileSync(path.join(dir, 'rocket.json'), JSON.stringify({ maxDepth: 2 }));
    fs.writeFileSync(path.join(dir, 'loop.rkt'), '(:define loop (:loop))(:loop)');

    expect(() => build(path.join(dir, 'loop.rkt'), { stdout: () => {} })).toThrow(RecursionLimitError);
  });

  it('should render md through markdown-it', () => {
    fs.writeFileSync(path.join(dir, 'page.rkt'), '(:md "Some *text*")');

    const result = build(path.join(dir, 'page.rkt'), { stdout: () => {} });
    expect(result.output).toBe('<p>Some <em>text</em></p>\n');
  });
});
