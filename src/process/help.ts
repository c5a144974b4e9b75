/**
 * Help text for processes, generated from their parameter declarations.
 */

import type { Process } from './process.js';
import type { ParameterSpec } from './types.js';

function describeParameter(name: string, spec: ParameterSpec): string[] {
  const lines = [`${name}: ${spec.type}`];
  if (spec.description) {
    lines.push(`    ${spec.description}`);
  }
  return lines;
}

function specsOf(process: Process, output: boolean): Array<[string, ParameterSpec]> {
  return process
    .parameterNames()
    .map((name): [string, ParameterSpec] => [name, process.parameterSpec(name)])
    .filter(([, spec]) => (spec.output === true) === output);
}

/**
 * One "name: type" line per parameter, under an INPUT or OUTPUT
 * SPECIFICATIONS heading.
 */
export function formatParameterSpecs(process: Process, direction: 'input' | 'output'): string {
  const heading = direction === 'input' ? 'INPUT SPECIFICATIONS' : 'OUTPUT SPECIFICATIONS';
  const lines = specsOf(process, direction === 'output').map(([name, spec]) => `${name}: ${spec.type}`);
  return [heading, '', ...lines].join('\n');
}

/** Inputs section, mandatory parameters before optional ones. */
export function inputHelp(process: Process): string[] {
  const inputs = specsOf(process, false);
  const mandatory = inputs.filter(([, spec]) => !spec.optional);
  const optional = inputs.filter(([, spec]) => spec.optional);

  const lines = ['Inputs', '~'.repeat(6), ''];
  if (mandatory.length > 0) {
    lines.push('[Mandatory]', '');
    for (const [name, spec] of mandatory) lines.push(...describeParameter(name, spec));
  }
  if (optional.length > 0) {
    lines.push('', '[Optional]', '');
    for (const [name, spec] of optional) lines.push(...describeParameter(name, spec));
  }
  return lines;
}

export function outputHelp(process: Process): string[] {
  const outputs = specsOf(process, true);
  if (outputs.length === 0) return [''];

  const lines = ['Outputs', '~'.repeat(7), ''];
  for (const [name, spec] of outputs) lines.push(...describeParameter(name, spec));
  return lines;
}

/**
 * Full help: optional description, then inputs and outputs.
 */
export function formatProcessHelp(process: Process, description?: string): string {
  const header = description ? [...description.split('\n'), ''] : [''];
  return [...header, ...inputHelp(process), '', ...outputHelp(process), ''].join('\n');
}
