/**
 * One compile run: parse a document, evaluate it against a fresh root scope,
 * and return the text together with the metadata it wrote.
 */

import { parse } from './syntax/parser.js';
import { Evaluator, type EvaluatorOptions } from './runtime/evaluator.js';
import { isPseudoFile } from './runtime/resolver.js';

export interface CompileOptions extends EvaluatorOptions {
  /** Path the source came from; includes resolve against its directory */
  file?: string;
}

export interface CompileResult {
  output: string;
  metadata: Record<string, string>;
}

const CWD = '<cwd>';

/**
 * Compile source text
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
  const file = options.file ?? '<input>';
  const evaluator = new Evaluator(options);
  const exprs = parse(source, file);

  const run = () => evaluator.evaluateAll(exprs, evaluator.root);
  const output = isPseudoFile(file)
    ? run()
    : evaluator.resolver.enter(evaluator.resolver.resolvePath(file, CWD), undefined, run);

  return finish(evaluator, output);
}

/**
 * Compile a document loaded through the configured loader
 */
export function compileFile(filePath: string, options: EvaluatorOptions = {}): CompileResult {
  const evaluator = new Evaluator(options);
  const canonical = evaluator.resolver.resolvePath(filePath, CWD);
  const exprs = evaluator.resolver.load(canonical);

  const output = evaluator.resolver.enter(canonical, undefined, () =>
    evaluator.evaluateAll(exprs, evaluator.root)
  );

  return finish(evaluator, output);
}

/**
 * Link the run's references in the output and in metadata values
 */
function finish(evaluator: Evaluator, output: string): CompileResult {
  const { references } = evaluator;
  const metadata: Record<string, string> = {};
  for (const [key, value] of evaluator.metadata) {
    metadata[key] = references.resolve(value);
  }
  return { output: references.resolve(output), metadata };
}
