/**
 * Template-based path completion.
 *
 * Templates are keyed by process name then parameter name, and reference
 * attributes as `$name` or `${name}`:
 *
 * ```typescript
 * new TemplatePathCompletionEngineFactory(
 *   { smooth: { output: '$subject/$session/smoothed_${modality}.nii' } },
 *   { root: '/data/study' },
 * );
 * ```
 */

import { posix } from 'node:path';
import { ParameterResolutionError } from '../errors.js';
import type { AttributeSet } from '../attributes/attribute-set.js';
import type { Process } from '../process/process.js';
import { PathCompletionEngine, type PathCompletionEngineFactory } from './path-completion.js';

const VARIABLE_PATTERN = /\$\{(\w+)\}|\$(\w+)/g;

/** Process name -> parameter name -> template. */
export type PathTemplates = Record<string, Record<string, string>>;

export interface TemplateOptions {
  /** Prefix joined in front of every relative expansion. */
  root?: string;
}

/** Attribute names a template refers to, in order of appearance. */
export function templateVariables(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(VARIABLE_PATTERN)) {
    const name = match[1] ?? match[2];
    if (name !== undefined && !names.includes(name)) names.push(name);
  }
  return names;
}

export class TemplatePathCompletionEngine extends PathCompletionEngine {
  private templates: Record<string, string>;
  private root: string;

  constructor(templates: Record<string, string>, options: TemplateOptions = {}) {
    super();
    this.templates = { ...templates };
    this.root = options.root ?? '';
  }

  override attributesToPath(process: Process, parameter: string, attributes: AttributeSet): string | null {
    const template = this.templates[parameter];
    if (template === undefined) return null;

    const expanded = template.replace(VARIABLE_PATTERN, (_match: string, braced?: string, bare?: string) => {
      const name = braced ?? bare ?? '';
      if (!attributes.has(name)) {
        throw new ParameterResolutionError(parameter, `Template for '${process.name}.${parameter}' uses unknown attribute '${name}'`, {
          process: process.name,
          attribute: name,
        });
      }
      const value = attributes.getString(name);
      if (value === '') {
        throw new ParameterResolutionError(parameter, `Attribute '${name}' is empty, cannot complete '${process.name}.${parameter}'`, {
          process: process.name,
          attribute: name,
        });
      }
      return value;
    });

    if (!this.root || posix.isAbsolute(expanded)) return expanded;
    return posix.join(this.root, expanded);
  }
}

export class TemplatePathCompletionEngineFactory implements PathCompletionEngineFactory {
  readonly factoryId = 'template';
  private templates: PathTemplates;
  private options: TemplateOptions;

  constructor(templates: PathTemplates, options: TemplateOptions = {}) {
    this.templates = templates;
    this.options = options;
  }

  getPathCompletionEngine(process: Process): TemplatePathCompletionEngine {
    return new TemplatePathCompletionEngine(this.templates[process.name] ?? {}, this.options);
  }
}
