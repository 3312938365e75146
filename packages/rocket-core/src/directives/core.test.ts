import { describe, it, expect } from 'vitest';
import { compile } from '../compile.js';
import { ArityError, InvalidArgumentError, UndefinedReferenceError } from '../errors.js';
import type { CompileOptions } from '../compile.js';

const run = (source: string, options: CompileOptions = {}) => compile(source, options).output;

describe('null', () => {
  it('should produce nothing', () => {
    expect(run('a(:null)b')).toBe('ab');
    expect(run('(:concat "x" (:null) "y")')).toBe('xy');
  });

  it('should ignore its arguments', () => {
    expect(run('(:null (:unknown))')).toBe('');
  });
});

describe('concat', () => {
  it('should join evaluated arguments without separators', () => {
    expect(run('(:concat "a" " " "b")')).toBe('a b');
  });

  it('should produce nothing without arguments', () => {
    expect(run('(:concat)')).toBe('');
  });
});

describe('let', () => {
  it('should bind sequentially', () => {
    expect(run('(:let (a "1" b (:concat (:a) "2")) (:b))')).toBe('12');
  });

  it('should shadow only within the body', () => {
    expect(run('(:define x "outer")(:let (x "inner") (:x))(:x)')).toBe('innerouter');
  });

  it('should concatenate several body forms', () => {
    expect(run('(:let (x "X") (:x) "-" (:x))')).toBe('X-X');
  });

  it('should reject an odd binding list', () => {
    expect(() => run('(:let (a) x)')).toThrow(ArityError);
    expect(() => run('(:let (a) x)')).toThrow('let expects an even number of binding forms, got 1');
  });

  it('should reject a binding list that is not a list', () => {
    expect(() => run('(:let a x)')).toThrow(InvalidArgumentError);
  });
});

describe('define', () => {
  it('should make a macro callable', () => {
    expect(run('(:define foo "bar")(:foo)')).toBe('bar');
    expect(run('(:define foo bar)(:foo)')).toBe('bar');
  });

  it('should produce no output itself', () => {
    expect(run('[(:define foo "bar")]')).toBe('[]');
  });

  it('should accept a name written with a colon', () => {
    expect(run('(:define :foo "bar")(:foo)')).toBe('bar');
  });

  it('should take two or three arguments', () => {
    expect(() => run('(:define foo)')).toThrow('define expects 2 to 3 arguments, got 1');
    expect(() => run('(:define evaluate a b c)')).toThrow('define expects 2 to 3 arguments, got 4');
  });

  it('should evaluate the value once with evaluate', () => {
    expect(run('(:define evaluate x (:concat "a" "b"))(:x)')).toBe('ab');

    let calls = 0;
    const version = () => String(++calls);
    expect(run('(:define evaluate v (:version))(:v)(:v)', { version })).toBe('11');
  });

  it('should capture the scope at definition with evaluate', () => {
    expect(run('(:define who "A")(:define evaluate greeting (:who))(:define who "B")(:greeting)')).toBe('A');
  });

  it('should reject a three-argument form without evaluate', () => {
    expect(() => run('(:define later x "y")')).toThrow(InvalidArgumentError);
    expect(() => run('(:define later x "y")')).toThrow("define expects 'evaluate' before the name, got 'later'");
  });
});

describe('define-template', () => {
  it('should need a name and a body', () => {
    expect(() => run('(:define-template t)')).toThrow('define-template expects at least 2 arguments, got 1');
  });

  it('should accept a template with no slots', () => {
    expect(run('(:define-template t "body")(:t)')).toBe('body');
  });

  it('should reject an invalid pattern', () => {
    expect(() => run('(:define-template t "/(/" "x")')).toThrow('Invalid template pattern /(/');
  });
});

describe('version', () => {
  const options = { version: '1.2.3' };

  it('should default to 0.0.0', () => {
    expect(run('(:version)')).toBe('0.0.0');
  });

  it('should return the full version', () => {
    expect(run('(:version)', options)).toBe('1.2.3');
  });

  it('should select components with a mask', () => {
    expect(run('(:version x)', options)).toBe('1');
    expect(run('(:version x.y)', options)).toBe('1.2');
    expect(run('(:version X.Y.Z)', options)).toBe('1.2.3');
  });

  it('should return nothing for an empty format', () => {
    expect(run('(:version "")', options)).toBe('');
  });

  it('should bind the components for a format', () => {
    expect(run('(:version (:concat "v" (:major) "-" (:patch)))', options)).toBe('v1-3');
    expect(run('(:version (:concat (:version) "!"))', options)).toBe('1.2.3!');
  });

  it('should not leak component bindings', () => {
    expect(() => run('(:version x)(:major)', options)).toThrow('Unknown directive: major');
  });
});

describe('md', () => {
  const renderer = { render: (text: string) => `<md>${text}</md>` };

  it('should pass the evaluated argument to the renderer', () => {
    expect(run('(:md (:concat "a" "b"))', { renderer })).toBe('<md>ab</md>');
  });

  it('should pass text through without a renderer', () => {
    expect(run('(:md "*x*")')).toBe('*x*');
  });

  it('should take exactly one argument', () => {
    expect(() => run('(:md)', { renderer })).toThrow('md expects 1 argument, got 0');
  });
});

describe('theme-config', () => {
  it('should keep the last write per key', () => {
    const result = compile('(:theme-config title "A" title "B")');
    expect(result.output).toBe('');
    expect(result.metadata).toEqual({ title: 'B' });
  });

  it('should store several keys', () => {
    const result = compile('(:theme-config layout wide (:concat "au" "thor") "Ann")');
    expect(result.metadata).toEqual({ layout: 'wide', author: 'Ann' });
  });

  it('should reject an odd argument count', () => {
    expect(() => run('(:theme-config title)')).toThrow('theme-config expects key/value pairs, got 1');
  });
});

describe('table', () => {
  it('should produce nothing', () => {
    expect(run('a(:table (row "x" "y"))b')).toBe('ab');
  });
});

describe('define-ref and ref', () => {
  it('should link to a reference defined earlier', () => {
    expect(run('(:define-ref intro "Introduction")See (:ref intro).')).toBe(
      '<a id="intro"></a>See <a href="#intro">Introduction</a>.'
    );
  });

  it('should link to a reference defined later', () => {
    expect(run('(:ref setup)(:define-ref setup "Setup")')).toBe(
      '<a href="#setup">Setup</a><a id="setup"></a>'
    );
  });

  it('should prefer the title given at the link', () => {
    expect(run('(:define-ref faq "FAQ")(:ref faq "questions")')).toBe(
      '<a id="faq"></a><a href="#faq">questions</a>'
    );
  });

  it('should resolve references inside metadata', () => {
    const result = compile('(:define-ref api "API")(:theme-config "next" (:ref api))');
    expect(result.metadata).toEqual({ next: '<a href="#api">API</a>' });
  });

  it('should fail on a reference that is never defined', () => {
    expect(() => run('x (:ref missing)')).toThrow(UndefinedReferenceError);
    expect(() => run('x (:ref missing)')).toThrow('Undefined reference: missing');
  });

  it('should reject a second definition of the same id', () => {
    expect(() => run('(:define-ref a "A")(:define-ref a "B")')).toThrow("Reference 'a' is already defined");
  });
});
