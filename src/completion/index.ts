/**
 * Completion - barrel exports.
 */

// Engine
export {
  ATTRIBUTES_KEY,
  BasicProcessCompletionEngineFactory,
  ProcessCompletionEngine,
  getAttachedCompletionEngine,
  getCompletionEngine,
} from './engine.js';

export type {
  ChildConstructionFailure,
  CompletionFailure,
  CompletionReport,
  ParameterResolutionFailure,
  ProcessCompletionEngineFactory,
  ProcessInputs,
} from './engine.js';

// Path completion
export {
  BasicPathCompletionEngineFactory,
  NullPathCompletionEngineFactory,
  PathCompletionEngine,
} from './path-completion.js';

export type { PathCompletionEngineFactory } from './path-completion.js';

export {
  TemplatePathCompletionEngine,
  TemplatePathCompletionEngineFactory,
  templateVariables,
} from './template-path-completion.js';

export type { PathTemplates, TemplateOptions } from './template-path-completion.js';

// Events
export {
  CompletionEventEmitter,
  CompletionEventKind,
  attributesMerged,
  childSkipped,
  completionFinished,
  completionStarted,
  parameterCompleted,
  parameterUnresolved,
} from './events.js';

export type { CompletionEvent, CompletionListener } from './events.js';
