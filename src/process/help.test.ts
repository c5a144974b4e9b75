import { describe, it, expect } from 'vitest';
import { formatParameterSpecs, formatProcessHelp, inputHelp, outputHelp } from './help.js';
import { Process } from './process.js';

function makeProcess(): Process {
  return new Process({
    name: 'smooth',
    parameters: {
      input: { type: 'file', description: 'Image to smooth' },
      fwhm: { type: 'number', optional: true },
      output: { type: 'file', output: true, description: 'Smoothed image' },
    },
  });
}

describe('formatParameterSpecs', () => {
  it('lists inputs under a heading', () => {
    expect(formatParameterSpecs(makeProcess(), 'input')).toBe('INPUT SPECIFICATIONS\n\ninput: file\nfwhm: number');
  });

  it('lists outputs under a heading', () => {
    expect(formatParameterSpecs(makeProcess(), 'output')).toBe('OUTPUT SPECIFICATIONS\n\noutput: file');
  });
});

describe('inputHelp', () => {
  it('separates mandatory and optional inputs', () => {
    expect(inputHelp(makeProcess())).toEqual([
      'Inputs',
      '~~~~~~',
      '',
      '[Mandatory]',
      '',
      'input: file',
      '    Image to smooth',
      '',
      '[Optional]',
      '',
      'fwhm: number',
    ]);
  });
});

describe('outputHelp', () => {
  it('is a blank line without outputs', () => {
    expect(outputHelp(new Process({ name: 'p', parameters: { x: { type: 'string' } } }))).toEqual(['']);
  });

  it('describes outputs', () => {
    expect(outputHelp(makeProcess())).toEqual(['Outputs', '~~~~~~~', '', 'output: file', '    Smoothed image']);
  });
});

describe('formatProcessHelp', () => {
  it('puts the description first', () => {
    const help = formatProcessHelp(makeProcess(), 'Gaussian smoothing.');
    expect(help.split('\n').slice(0, 4)).toEqual(['Gaussian smoothing.', '', 'Inputs', '~~~~~~']);
    expect(help.endsWith('output: file\n    Smoothed image\n')).toBe(true);
  });

  it('starts with a blank line without description', () => {
    const help = formatProcessHelp(new Process({ name: 'p' }));
    expect(help).toBe('\nInputs\n~~~~~~\n\n\n\n');
  });
});
