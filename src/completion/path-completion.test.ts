import { describe, it, expect } from 'vitest';
import {
  BasicPathCompletionEngineFactory,
  NullPathCompletionEngineFactory,
  PathCompletionEngine,
} from './path-completion.js';
import {
  TemplatePathCompletionEngine,
  TemplatePathCompletionEngineFactory,
  templateVariables,
} from './template-path-completion.js';
import { AttributeSet } from '../attributes/attribute-set.js';
import { Process } from '../process/process.js';
import { ParameterResolutionError, StructuralMisuseError } from '../errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeProcess(name = 'smooth'): Process {
  return new Process({ name, parameters: { output: { type: 'file', output: true } } });
}

function makeAttributes(values: Record<string, string | string[]>): AttributeSet {
  const set = new AttributeSet();
  for (const [name, value] of Object.entries(values)) {
    set.declare({ name, type: Array.isArray(value) ? 'list' : 'string' }, value);
  }
  return set;
}

// ---------------------------------------------------------------------------
// Base engine and default factories
// ---------------------------------------------------------------------------

describe('PathCompletionEngine', () => {
  it('resolves nothing', () => {
    const engine = new PathCompletionEngine();
    expect(engine.attributesToPath(makeProcess(), 'output', makeAttributes({ subject: 's1' }))).toBeNull();
  });
});

describe('NullPathCompletionEngineFactory', () => {
  it('throws StructuralMisuseError', () => {
    const factory = new NullPathCompletionEngineFactory();
    expect(factory.factoryId).toBe('null');
    expect(() => factory.getPathCompletionEngine(makeProcess())).toThrow(StructuralMisuseError);
  });
});

describe('BasicPathCompletionEngineFactory', () => {
  it('returns base engines', () => {
    const engine = new BasicPathCompletionEngineFactory().getPathCompletionEngine(makeProcess());
    expect(engine).toBeInstanceOf(PathCompletionEngine);
  });
});

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

describe('templateVariables', () => {
  it('lists each referenced attribute once', () => {
    expect(templateVariables('$subject/${session}/$subject_${modality}.nii')).toEqual([
      'subject',
      'session',
      'subject_',
      'modality',
    ]);
  });
});

describe('TemplatePathCompletionEngine', () => {
  const attributes = makeAttributes({ subject: 's1', session: 'm0', tags: ['a', 'b'] });

  it('expands bare and braced variables', () => {
    const engine = new TemplatePathCompletionEngine({ output: '/data/$subject/${session}_out.nii' });
    expect(engine.attributesToPath(makeProcess(), 'output', attributes)).toBe('/data/s1/m0_out.nii');
  });

  it('joins list values with underscores', () => {
    const engine = new TemplatePathCompletionEngine({ output: '/data/${tags}.txt' });
    expect(engine.attributesToPath(makeProcess(), 'output', attributes)).toBe('/data/a_b.txt');
  });

  it('returns null for parameters without a template', () => {
    const engine = new TemplatePathCompletionEngine({});
    expect(engine.attributesToPath(makeProcess(), 'output', attributes)).toBeNull();
  });

  it('joins relative expansions under the root', () => {
    const engine = new TemplatePathCompletionEngine({ output: '$subject/out.nii' }, { root: '/study' });
    expect(engine.attributesToPath(makeProcess(), 'output', attributes)).toBe('/study/s1/out.nii');
  });

  it('keeps absolute expansions as they are', () => {
    const engine = new TemplatePathCompletionEngine({ output: '/scratch/$subject.nii' }, { root: '/study' });
    expect(engine.attributesToPath(makeProcess(), 'output', attributes)).toBe('/scratch/s1.nii');
  });

  it('throws ParameterResolutionError for unknown attributes', () => {
    const engine = new TemplatePathCompletionEngine({ output: '/data/$center/out.nii' });
    expect(() => engine.attributesToPath(makeProcess(), 'output', attributes)).toThrow(ParameterResolutionError);
  });

  it('throws ParameterResolutionError for empty attributes', () => {
    const engine = new TemplatePathCompletionEngine({ output: '/data/$subject.nii' });
    expect(() => engine.attributesToPath(makeProcess(), 'output', makeAttributes({ subject: '' }))).toThrow(
      "Attribute 'subject' is empty, cannot complete 'smooth.output'",
    );
  });

  it('leaves the attributes untouched', () => {
    const engine = new TemplatePathCompletionEngine({ output: '$subject' });
    engine.attributesToPath(makeProcess(), 'output', attributes);
    expect(attributes.exportToDict()).toEqual({ subject: 's1', session: 'm0', tags: ['a', 'b'] });
  });
});

describe('TemplatePathCompletionEngineFactory', () => {
  it('selects templates by process name', () => {
    const factory = new TemplatePathCompletionEngineFactory({ smooth: { output: '$subject/smooth.nii' } });
    const attributes = makeAttributes({ subject: 's1' });

    expect(factory.factoryId).toBe('template');
    expect(factory.getPathCompletionEngine(makeProcess()).attributesToPath(makeProcess(), 'output', attributes)).toBe(
      's1/smooth.nii',
    );
    expect(
      factory.getPathCompletionEngine(makeProcess('other')).attributesToPath(makeProcess('other'), 'output', attributes),
    ).toBeNull();
  });
});
