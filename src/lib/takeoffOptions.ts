import options from '../data/takeoffOptions.json';
import type { RgbColor, WireMaterial } from '../types';

/** Alpha used when drawing highlights on screen (80 out of 255) */
export const HIGHLIGHT_DISPLAY_OPACITY = 80 / 255;

export const DEFAULT_LINE_WIDTH = 2;

export const COLOR_OPTIONS: Record<string, string> = options.colors;

export const COLOR_NAMES = Object.keys(COLOR_OPTIONS);

export const WIRE_TYPES: readonly string[] = options.wireTypes;

export const CABLE_SPECS: readonly string[] = options.cableSpecs;

export const WIRE_MATERIALS: readonly WireMaterial[] = options.materials.filter(isWireMaterial);

export interface CategoryDefinition {
  name: string;
  wireEnabled: boolean;
  countsDevices: boolean;
}

export const CATEGORY_DEFINITIONS: readonly CategoryDefinition[] = options.categories;

function isWireMaterial(value: string): value is WireMaterial {
  return value === 'CU' || value === 'AL';
}

/**
 * Convert a "#RRGGBB" hex string to 0-1 color components.
 * Falls back to red for anything that is not a six-digit hex color.
 */
export const hexToRgbColor = (hex: string): RgbColor => {
  const result = /^#?([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i.exec(hex);
  if (!result) {
    return { r: 1, g: 0, b: 0 };
  }
  return {
    r: parseInt(result[1], 16) / 255,
    g: parseInt(result[2], 16) / 255,
    b: parseInt(result[3], 16) / 255,
  };
};

export const getColorByName = (colorName: string): RgbColor =>
  hexToRgbColor(COLOR_OPTIONS[colorName] ?? COLOR_OPTIONS[COLOR_NAMES[0]]);
