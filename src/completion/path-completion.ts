/**
 * Path completion: turning an attribute set into one parameter value.
 */

import { StructuralMisuseError } from '../errors.js';
import type { AttributeSet } from '../attributes/attribute-set.js';
import type { Process } from '../process/process.js';

/**
 * Builds a single path from attributes for one process parameter.
 *
 * The base implementation resolves nothing and returns null; data
 * organizations subclass it. Implementations must not modify `attributes`.
 */
export class PathCompletionEngine {
  attributesToPath(_process: Process, _parameter: string, _attributes: AttributeSet): string | null {
    return null;
  }
}

export interface PathCompletionEngineFactory {
  readonly factoryId: string;
  getPathCompletionEngine(process: Process): PathCompletionEngine;
}

/**
 * Default used when no path completion is configured. Asking it for an
 * engine is a configuration error.
 */
export class NullPathCompletionEngineFactory implements PathCompletionEngineFactory {
  readonly factoryId = 'null';

  getPathCompletionEngine(process: Process): PathCompletionEngine {
    throw new StructuralMisuseError(
      'No path completion is configured; register a "path_completion" factory and select it in the study configuration',
      { process: process.name },
    );
  }
}

/** Hands out base engines: completion runs but resolves nothing. */
export class BasicPathCompletionEngineFactory implements PathCompletionEngineFactory {
  readonly factoryId = 'basic';

  getPathCompletionEngine(_process: Process): PathCompletionEngine {
    return new PathCompletionEngine();
  }
}
