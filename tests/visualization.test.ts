import { describe, it, expect } from 'vitest';
import {
  SPECTRUM_COLOR_SCHEMES,
  formatPosition,
  parseColorScheme,
  parsePosition,
  parseVisualizationType,
} from '../src/visualization/types.js';
import { EncodeError } from '../src/utils/errors.js';

describe('parseVisualizationType', () => {
  it('accepts the short and long names', () => {
    expect(parseVisualizationType('wave')).toBe('waveform');
    expect(parseVisualizationType('waveform')).toBe('waveform');
    expect(parseVisualizationType('spectrum')).toBe('spectrum');
    expect(parseVisualizationType('spec')).toBe('spectrum');
    expect(parseVisualizationType('both')).toBe('both');
  });

  it('ignores case', () => {
    expect(parseVisualizationType('WAVE')).toBe('waveform');
    expect(parseVisualizationType('Both')).toBe('both');
  });

  it('rejects anything else as a configuration error', () => {
    expect(() => parseVisualizationType('invalid')).toThrowError(
      "Unknown visualization type: invalid. Use 'wave', 'spectrum', or 'both'.",
    );
    let caught: unknown;
    try {
      parseVisualizationType('bars');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EncodeError);
    expect(caught).toMatchObject({ kind: 'ConfigurationError' });
  });
});

describe('parseColorScheme', () => {
  it('accepts all 13 palettes', () => {
    expect(SPECTRUM_COLOR_SCHEMES).toHaveLength(13);
    for (const scheme of SPECTRUM_COLOR_SCHEMES) {
      expect(parseColorScheme(scheme)).toBe(scheme);
    }
  });

  it('normalizes case', () => {
    expect(parseColorScheme('Viridis')).toBe('viridis');
    expect(parseColorScheme('COOL')).toBe('cool');
  });

  it('rejects unknown palettes', () => {
    expect(() => parseColorScheme('invalid')).toThrowError(/^Unknown color scheme: invalid\. Use 'rainbow', /);
  });
});

describe('parsePosition', () => {
  it('parses the anchored positions', () => {
    expect(parsePosition('top')).toEqual({ kind: 'top' });
    expect(parsePosition('bottom')).toEqual({ kind: 'bottom' });
    expect(parsePosition('left')).toEqual({ kind: 'left' });
    expect(parsePosition('right')).toEqual({ kind: 'right' });
    expect(parsePosition('Center')).toEqual({ kind: 'center' });
  });

  it('parses custom coordinates', () => {
    expect(parsePosition('xy(10,20)')).toEqual({ kind: 'custom', x: 10, y: 20 });
    expect(parsePosition('xy( 5 , 7 )')).toEqual({ kind: 'custom', x: 5, y: 7 });
  });

  it('rejects malformed custom coordinates', () => {
    expect(() => parsePosition('xy(10)')).toThrowError("Invalid position format. Use 'xy(x,y)'");
    expect(() => parsePosition('xy(10,20')).toThrowError("Invalid position format. Use 'xy(x,y)'");
    expect(() => parsePosition('xy(a,b)')).toThrowError('Invalid x coordinate: a');
    expect(() => parsePosition('xy(1,-2)')).toThrowError('Invalid y coordinate: -2');
  });

  it('rejects unknown names', () => {
    expect(() => parsePosition('invalid')).toThrowError(/^Unknown position: invalid\./);
  });

  it('formats back to the CLI spelling', () => {
    expect(formatPosition({ kind: 'custom', x: 3, y: 4 })).toBe('xy(3,4)');
    expect(formatPosition({ kind: 'left' })).toBe('left');
  });
});
