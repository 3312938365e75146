/**
 * Compile one document to a file or stdout
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  type CompileResult,
  type FileLoader,
  InvalidArgumentError,
  type MarkdownRenderer,
  compileFile,
  createLogger,
  loadProjectConfig,
} from 'rocket-core';
import { MarkdownItRenderer } from 'rocket-markdown';

const logger = createLogger('cli');

export interface BuildOptions {
  /** Output file; stdout when omitted */
  output?: string;
  docVersion?: string;
  maxDepth?: string;
  /** Where to write the document metadata as JSON */
  metadata?: string;
  /** Replaces the file system loader, mainly for tests */
  loader?: FileLoader;
  renderer?: MarkdownRenderer;
  /** Receives the document when no output file is given */
  stdout?: (text: string) => void;
}

/**
 * Parse a --max-depth value
 */
export function parseMaxDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new InvalidArgumentError(`--max-depth must be a positive integer, got '${value}'`);
  }
  return depth;
}

export function build(input: string, options: BuildOptions = {}): CompileResult {
  const inputPath = path.resolve(input);
  const config = loadProjectConfig(path.dirname(inputPath));

  const result = compileFile(inputPath, {
    version: options.docVersion ?? config.version,
    maxDepth: options.maxDepth !== undefined ? parseMaxDepth(options.maxDepth) : config.maxDepth,
    renderer: options.renderer ?? new MarkdownItRenderer(),
    loader: options.loader,
  });

  if (options.output) {
    const outputPath = path.resolve(options.output);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, result.output);
    logger.info('Wrote document', { path: outputPath, bytes: result.output.length });
  } else if (options.stdout) {
    options.stdout(result.output);
  } else {
    process.stdout.write(result.output);
  }

  if (options.metadata) {
    const metadataPath = path.resolve(options.metadata);
    fs.mkdirSync(path.dirname(metadataPath), { recursive: true });
    fs.writeFileSync(metadataPath, JSON.stringify(result.metadata, null, 2) + '\n');
    logger.info('Wrote metadata', { path: metadataPath, keys: Object.keys(result.metadata).length });
  }

  return result;
}
