/**
 * End-to-end tests: configuration and schemas loaded from JSON, a linked
 * pipeline, template path completion, and change-driven re-completion.
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { AttributesFactory } from '../attributes/factory.js';
import { defineProcessAttributes, parseAttributesSchema } from '../attributes/schema.js';
import { ATTRIBUTES_KEY, getCompletionEngine } from '../completion/engine.js';
import { CompletionEventKind } from '../completion/events.js';
import { TemplatePathCompletionEngineFactory } from '../completion/template-path-completion.js';
import { Pipeline } from '../process/pipeline.js';
import { Process } from '../process/process.js';
import { loadStudyConfig } from '../study/config.js';

// ---------------------------------------------------------------------------
// Test Helpers
// ---------------------------------------------------------------------------

const fixtures = fileURLToPath(new URL('./fixtures/', import.meta.url));

function makeFactory(templates: Record<string, Record<string, string>>): AttributesFactory {
  const factory = new AttributesFactory();
  const schemaData: unknown = JSON.parse(readFileSync(join(fixtures, 'schema.json'), 'utf-8'));
  factory.register('schema', 'shared', parseAttributesSchema(schemaData));
  factory.register('path_completion', 'template', new TemplatePathCompletionEngineFactory(templates));
  factory.register('process_attributes', 'node1', defineProcessAttributes(a => {
    a.setParameterAttributes('output', 'output', 'subject');
  }));
  factory.register('process_attributes', 'node2', defineProcessAttributes(a => {
    a.setParameterAttributes('input', 'input', 'acquisition', { modality: 't2' });
  }));
  return factory;
}

function makeStep(name: string): Process {
  return new Process({
    name,
    parameters: {
      input: { type: 'file' },
      output: { type: 'file', output: true },
    },
  });
}

function makeStudy(templates: Record<string, Record<string, string>>) {
  const config = loadStudyConfig(join(fixtures, 'study.json'), makeFactory(templates));
  const pipeline = new Pipeline({ name: 'main', studyConfig: config });
  const node1 = makeStep('node1');
  const node2 = makeStep('node2');
  pipeline.addProcess('node1', node1);
  pipeline.addProcess('node2', node2);
  pipeline.addLink('node1.output->node2.input');
  return { config, pipeline, node1, node2 };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('attribute completion end to end', () => {
  it('completes a producer and hands the path to its consumer', () => {
    const { pipeline, node1, node2 } = makeStudy({ node1: { output: '/data/$subject/out.ext' } });
    const engine = getCompletionEngine(pipeline);

    const report = engine.completeParameters({ [ATTRIBUTES_KEY]: { subject: 's1' } });

    expect(node1.getParameter('output')).toBe('/data/s1/out.ext');
    expect(node2.getParameter('input')).toBe('/data/s1/out.ext');
    expect(report.assigned_parameters).toEqual({ 'main.node1.output': '/data/s1/out.ext' });
    expect(report.failures).toEqual([]);
  });

  it('merges the attributes of both nodes into the pipeline', () => {
    const { pipeline } = makeStudy({});
    const attributes = getCompletionEngine(pipeline).getAttributeValues();

    expect(attributes.names()).toEqual(['subject', 'modality']);
    expect(attributes.exportToDict()).toEqual({ subject: '', modality: 't2' });
  });

  it('re-completes when a connected attribute changes', () => {
    const { pipeline, node1, node2 } = makeStudy({ node1: { output: '/data/$subject/out.ext' } });
    const engine = getCompletionEngine(pipeline);
    engine.connectAttributes();

    engine.getAttributeValues().set('subject', 's2');

    expect(node1.getParameter('output')).toBe('/data/s2/out.ext');
    expect(node2.getParameter('input')).toBe('/data/s2/out.ext');
    expect(engine.completionOngoing).toBe(false);
  });

  it('leaves parameters unset when an attribute is still empty', () => {
    const { config, pipeline, node1, node2 } = makeStudy({
      node1: { output: '/data/$subject/out.ext' },
      node2: { output: '/data/$subject/$modality/final.ext' },
    });

    const report = getCompletionEngine(pipeline).completeParameters();

    expect(node1.getParameter('output')).toBeUndefined();
    expect(node2.getParameter('output')).toBeUndefined();
    expect(report.failures.map(f => (f.kind === 'parameter_resolution' ? `${f.engine}.${f.parameter}` : f.node)))
      .toEqual(['main.node1.output', 'main.node2.output']);
    const unresolved = config.events.getEventLog().filter(e => e.kind === CompletionEventKind.PARAMETER_UNRESOLVED);
    expect(unresolved).toHaveLength(2);
  });

  it('uses values a consumer receives from the pipeline in its own templates', () => {
    const { pipeline, node2 } = makeStudy({
      node1: { output: '/data/$subject/out.ext' },
      node2: { output: '/data/$subject/$modality/final.ext' },
    });

    getCompletionEngine(pipeline).completeParameters({ [ATTRIBUTES_KEY]: { subject: 's3', modality: 'dwi' } });

    expect(node2.getParameter('input')).toBe('/data/s3/out.ext');
    expect(node2.getParameter('output')).toBe('/data/s3/dwi/final.ext');
  });
});
