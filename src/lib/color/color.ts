/**
 * Color values for snapshot attributes.
 */

import type { Color, NoColor, RgbaColor } from '@/types/snapshot';
import namedColorTable from './named-colors.json';

const NAMED_COLORS: ReadonlyMap<string, string> = new Map(Object.entries(namedColorTable));

export const NO_COLOR: NoColor = Object.freeze({ kind: 'none' as const });

export function rgba(r: number, g: number, b: number, a = 1): RgbaColor {
  return { kind: 'rgba', r, g, b, a };
}

function parseHex(hex: string): RgbaColor | undefined {
  const digits = hex.slice(1);
  if (!/^[0-9a-f]+$/i.test(digits)) return undefined;

  if (digits.length === 3) {
    const [r, g, b] = Array.from(digits, (d) => parseInt(d + d, 16));
    return rgba(r ?? 0, g ?? 0, b ?? 0);
  }
  if (digits.length === 6 || digits.length === 8) {
    const channel = (i: number) => parseInt(digits.slice(i, i + 2), 16);
    const alpha = digits.length === 8 ? channel(6) / 255 : 1;
    return rgba(channel(0), channel(2), channel(4), alpha);
  }
  return undefined;
}

const FUNCTIONAL_PATTERN = /^rgba?\(\s*([\d.]+)\s*,\s*([\d.]+)\s*,\s*([\d.]+)\s*(?:,\s*([\d.]+)\s*)?\)$/i;

/**
 * Parse `#rgb`, `#rrggbb`, `#rrggbbaa`, `rgb()`/`rgba()`, a named color or `none`.
 */
export function parseColor(input: string): Color | undefined {
  const value = input.trim().toLowerCase();
  if (value === 'none' || value === 'transparent') return NO_COLOR;
  if (value.startsWith('#')) return parseHex(value);

  const functional = FUNCTIONAL_PATTERN.exec(value);
  if (functional) {
    const [, r, g, b, a] = functional;
    return rgba(Number(r), Number(g), Number(b), a === undefined ? 1 : Number(a));
  }

  const named = NAMED_COLORS.get(value);
  return named ? parseHex(named) : undefined;
}

/**
 * Component-wise interpolation including alpha.
 * Interpolating against no color yields the other color unchanged.
 */
export function interpolateColor(start: Color, end: Color, t: number): Color {
  if (start.kind === 'none') return end;
  if (end.kind === 'none') return start;
  return rgba(
    start.r + (end.r - start.r) * t,
    start.g + (end.g - start.g) * t,
    start.b + (end.b - start.b) * t,
    start.a + (end.a - start.a) * t
  );
}

/**
 * CSS text for renderers: `none`, `#rrggbb`, or `rgba()` when translucent.
 */
export function formatColor(color: Color): string {
  if (color.kind === 'none') return 'none';
  const channel = (v: number) => Math.max(0, Math.min(255, Math.round(v)));
  if (color.a >= 1) {
    return `#${[color.r, color.g, color.b].map((v) => channel(v).toString(16).padStart(2, '0')).join('')}`;
  }
  return `rgba(${channel(color.r)}, ${channel(color.g)}, ${channel(color.b)}, ${Number(color.a.toFixed(3))})`;
}
