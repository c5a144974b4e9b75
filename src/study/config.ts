/**
 * Study configuration: which completion machinery a study uses.
 *
 * Attribute-based completion is active only when the "AttributesConfig"
 * module is listed. The factory keys name the process completion and path
 * completion implementations to look up.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { AttributesFactory } from '../attributes/factory.js';
import { CompletionEventEmitter } from '../completion/events.js';
import { ConfigurationError, toError } from '../errors.js';

export const ATTRIBUTES_MODULE = 'AttributesConfig';

export const DEFAULT_PROCESS_COMPLETION = 'basic';
export const DEFAULT_PATH_COMPLETION = 'null';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface StudyConfigOptions {
  modules?: string[];
  /** Schema directory name -> registered schema name. */
  attributesSchemas?: Record<string, string>;
  processCompletion?: string;
  pathCompletion?: string;
  factory?: AttributesFactory;
  events?: CompletionEventEmitter;
}

export class StudyConfig {
  readonly modules: Set<string>;
  attributesSchemas: Record<string, string>;
  processCompletion: string;
  pathCompletion: string;
  readonly factory: AttributesFactory;
  readonly events: CompletionEventEmitter;

  constructor(options: StudyConfigOptions = {}) {
    this.modules = new Set(options.modules ?? []);
    this.attributesSchemas = { ...(options.attributesSchemas ?? {}) };
    this.processCompletion = options.processCompletion ?? DEFAULT_PROCESS_COMPLETION;
    this.pathCompletion = options.pathCompletion ?? DEFAULT_PATH_COMPLETION;
    this.factory = options.factory ?? new AttributesFactory();
    this.events = options.events ?? new CompletionEventEmitter();
  }

  get attributesEnabled(): boolean {
    return this.modules.has(ATTRIBUTES_MODULE);
  }

  enableAttributes(): void {
    this.modules.add(ATTRIBUTES_MODULE);
  }
}

// ---------------------------------------------------------------------------
// Loading from JSON
// ---------------------------------------------------------------------------

export const StudyConfigFileSchema = z.object({
  modules: z.array(z.string()).default([]),
  attributes_schemas: z.record(z.string()).default({}),
  process_completion: z.string().min(1).default(DEFAULT_PROCESS_COMPLETION),
  path_completion: z.string().min(1).default(DEFAULT_PATH_COMPLETION),
});

export type StudyConfigFile = z.infer<typeof StudyConfigFileSchema>;

/**
 * Build a StudyConfig from plain JSON data. Implementations are looked up
 * later in `factory`, so they can be registered after loading.
 *
 * @throws ConfigurationError listing the validation issues
 */
export function parseStudyConfig(data: unknown, factory?: AttributesFactory): StudyConfig {
  const result = StudyConfigFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigurationError(`Invalid study configuration: ${issues.join('; ')}`, { issues });
  }
  return new StudyConfig({
    modules: result.data.modules,
    attributesSchemas: result.data.attributes_schemas,
    processCompletion: result.data.process_completion,
    pathCompletion: result.data.path_completion,
    factory,
  });
}

export function loadStudyConfig(path: string, factory?: AttributesFactory): StudyConfig {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`Cannot read study configuration '${path}': ${toError(e).message}`, { path });
  }
  return parseStudyConfig(data, factory);
}
