/**
 * AttributesFactory: name-keyed registry of completion building blocks.
 *
 * Each category holds one kind of implementation. Lookups of unknown keys
 * throw NotFoundError, which callers treat as "use the default".
 */

import { NotFoundError } from '../errors.js';
import type { PathCompletionEngineFactory } from '../completion/path-completion.js';
import type { ProcessCompletionEngineFactory } from '../completion/engine.js';
import type { AttributesSchema, ProcessAttributesClass } from './schema.js';

export interface FactoryCategories {
  schema: AttributesSchema;
  process_attributes: ProcessAttributesClass;
  process_completion: ProcessCompletionEngineFactory;
  path_completion: PathCompletionEngineFactory;
}

export type FactoryCategory = keyof FactoryCategories;

type Registry = { [C in FactoryCategory]: Map<string, FactoryCategories[C]> };

export class AttributesFactory {
  private registry: Registry = {
    schema: new Map(),
    process_attributes: new Map(),
    process_completion: new Map(),
    path_completion: new Map(),
  };

  /**
   * Register an implementation. Replaces any previous one under the same key.
   */
  register<C extends FactoryCategory>(category: C, key: string, implementation: FactoryCategories[C]): void {
    const entries: Map<string, FactoryCategories[C]> = this.registry[category];
    entries.set(key, implementation);
  }

  unregister(category: FactoryCategory, key: string): void {
    this.registry[category].delete(key);
  }

  /**
   * @throws NotFoundError when nothing is registered under `key`
   */
  get<C extends FactoryCategory>(category: C, key: string): FactoryCategories[C] {
    const entries: Map<string, FactoryCategories[C]> = this.registry[category];
    const implementation = entries.get(key);
    if (implementation === undefined) {
      throw new NotFoundError(category, key);
    }
    return implementation;
  }

  has(category: FactoryCategory, key: string): boolean {
    return this.registry[category].has(key);
  }

  keys(category: FactoryCategory): string[] {
    return [...this.registry[category].keys()];
  }
}
