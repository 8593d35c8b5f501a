import { describe, it, expect } from 'vitest';
import { InvalidParameterError } from '../errors.js';
import { keyColorFromRgb, parseHexColor, rgbToHex } from './color.js';

describe('rgbToHex', () => {
  it('formats uppercase without a leading #', () => {
    expect(rgbToHex({ r: 0, g: 255, b: 0 })).toBe('00FF00');
    expect(rgbToHex({ r: 10, g: 11, b: 171 })).toBe('0A0BAB');
  });

  it('rounds and clamps channels into a byte', () => {
    expect(rgbToHex({ r: -5, g: 300, b: 127.6 })).toBe('00FF80');
  });
});

describe('parseHexColor', () => {
  it('accepts either case with or without #', () => {
    expect(parseHexColor('#00ff00')).toEqual({ hex: '00FF00', rgb: { r: 0, g: 255, b: 0 } });
    expect(parseHexColor(' 1a2B3c ')).toEqual({ hex: '1A2B3C', rgb: { r: 26, g: 43, b: 60 } });
  });

  it.each(['GGGGGG', '00FF0', '', '#00FF00FF', '0x00FF00'])('rejects %j', (value) => {
    expect(() => parseHexColor(value)).toThrow(InvalidParameterError);
  });

  it('names the offending value', () => {
    expect(() => parseHexColor('blue')).toThrow("Invalid hex color format: blue. Expected 6 hex characters (e.g., '00FF00')");
  });
});

describe('keyColorFromRgb', () => {
  it('pairs the rgb triple with its hex form', () => {
    expect(keyColorFromRgb({ r: 0, g: 177, b: 64 })).toEqual({ hex: '00B140', rgb: { r: 0, g: 177, b: 64 } });
  });
});
