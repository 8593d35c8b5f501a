import { InvalidParameterError } from '../errors.js';
import type { KeyColor, RGB } from '../types/keying.js';

const HEX_COLOR = /^#?([0-9A-Fa-f]{6})$/;

/**
 * Convert RGB to hex string (without #)
 */
export function rgbToHex(rgb: RGB): string {
  const toHex = (n: number) => Math.min(255, Math.max(0, Math.round(n))).toString(16).padStart(2, '0');
  return `${toHex(rgb.r)}${toHex(rgb.g)}${toHex(rgb.b)}`.toUpperCase();
}

/** Accepts `00ff00` or `#00FF00`; returns the normalized key color. */
export function parseHexColor(value: string): KeyColor {
  const match = HEX_COLOR.exec(value.trim());
  if (!match) {
    throw new InvalidParameterError(
      `Invalid hex color format: ${value}. Expected 6 hex characters (e.g., '00FF00')`,
      { details: { keyColor: value } }
    );
  }
  const hex = match[1].toUpperCase();
  return {
    hex,
    rgb: {
      r: Number.parseInt(hex.slice(0, 2), 16),
      g: Number.parseInt(hex.slice(2, 4), 16),
      b: Number.parseInt(hex.slice(4, 6), 16),
    },
  };
}

export function keyColorFromRgb(rgb: RGB): KeyColor {
  const hex = rgbToHex(rgb);
  return parseHexColor(hex);
}
