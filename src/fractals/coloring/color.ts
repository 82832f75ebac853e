import type { RGB } from "../types.js";

export const BLACK: RGB = [0, 0, 0];
export const WHITE: RGB = [255, 255, 255];

export const clamp01 = (x: number): number => Math.min(1, Math.max(0, x));

export const lerp = (a: number, b: number, t: number): number => a + (b - a) * t;

/** Eases t with a half cosine period so gradients meet their stops with zero slope. */
export const cosineEase = (t: number): number => (1 - Math.cos(Math.PI * t)) / 2;

/** Rounds to an integer channel value in [0, 255]. */
export const toChannel = (value: number): number => Math.round(Math.min(255, Math.max(0, value)));

/**
 * HSL to RGB conversion utility function.
 *
 * @param h - Hue (0-360 degrees)
 * @param s - Saturation (0-1)
 * @param l - Lightness (0-1)
 * @returns RGB tuple with values 0-255: [red, green, blue]
 */
export function hslToRgb(h: number, s: number, l: number): RGB {
  h = h % 360;
  if (h < 0) h += 360;

  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = l - c / 2;

  let r = 0,
    g = 0,
    b = 0;

  if (h < 60) {
    r = c;
    g = x;
  } else if (h < 120) {
    r = x;
    g = c;
  } else if (h < 180) {
    g = c;
    b = x;
  } else if (h < 240) {
    g = x;
    b = c;
  } else if (h < 300) {
    r = x;
    b = c;
  } else {
    r = c;
    b = x;
  }

  return [toChannel((r + m) * 255), toChannel((g + m) * 255), toChannel((b + m) * 255)];
}
