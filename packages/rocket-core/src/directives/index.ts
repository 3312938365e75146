import { DirectiveRegistry } from './registry.js';
import {
  concat,
  define,
  defineRef,
  defineTemplate,
  letDirective,
  markdown,
  nullDirective,
  ref,
  themeConfig,
  version,
} from './core.js';
import { admonition, definitionList, heading, link, list, steps } from './blocks.js';
import { eq, ifDirective, ne, not } from './logic.js';
import { importDirective, include } from './modules.js';

export { DirectiveRegistry, expectArgs, bindingName, escapeHtml } from './registry.js';
export type { DirectiveContext, DirectiveHandler } from './registry.js';
export { titleToId } from './blocks.js';

/**
 * Registry holding every built-in directive
 */
export function createBuiltinRegistry(): DirectiveRegistry {
  return new DirectiveRegistry().registerAll({
    'null': nullDirective,
    'table': nullDirective,
    'let': letDirective,
    'version': version,
    'concat': concat,
    'md': markdown,
    'definition-list': definitionList,
    'theme-config': themeConfig,
    'define': define,
    'define-template': defineTemplate,
    'define-ref': defineRef,
    'ref': ref,
    'include': include,
    'import': importDirective,
    'note': admonition('note', 'Note'),
    'warning': admonition('warning', 'Warning'),
    'if': ifDirective,
    'not': not,
    'eq': eq,
    'ne': ne,
    'h1': heading(1),
    'h2': heading(2),
    'h3': heading(3),
    'h4': heading(4),
    'h5': heading(5),
    'h6': heading(6),
    'link': link,
    'ul': list('ul'),
    'ol': list('ol'),
    'steps': steps,
  });
}
