// ABOUTME: Palettes mapping a normalized value t in [0, 1] to an RGB color
// ABOUTME: Control-point, cosine and HSL hue-cycle palettes, validated when constructed

import { ConfigurationError } from "../../lib/errors.js";
import { requireFiniteNumber, requirePositiveNumber, validateColor } from "../../lib/validation.js";
import type { RGB } from "../types.js";
import { clamp01, cosineEase, hslToRgb, lerp, toChannel } from "./color.js";
import { palettePresets } from "./palette-presets.js";

export type ColorStop = {
  /** Position in [0, 1]; positions must be strictly increasing */
  position: number;
  color: RGB;
};

export type Interpolation = "linear" | "cosine";

export type ControlPointPaletteSpec = {
  type: "control-points";
  stops: ColorStop[];
  interpolation?: Interpolation;
};

/** Per-channel a + b·cos(2π(c·t + d)), channels in [0, 1]. */
export type CosinePaletteSpec = {
  type: "cosine";
  a: RGB;
  b: RGB;
  c: RGB;
  d: RGB;
};

export type HslCyclePaletteSpec = {
  type: "hsl-cycle";
  /** Full hue rotations across t = 0..1 */
  cycles: number;
  saturation: number;
  lightness: number;
};

export type PresetPaletteSpec = {
  type: "preset";
  name: string;
};

/**
 * Serializable description of a palette. Palettes cross worker boundaries as
 * specs and are rebuilt on the other side with createPalette.
 */
export type PaletteSpec = ControlPointPaletteSpec | CosinePaletteSpec | HslCyclePaletteSpec | PresetPaletteSpec;

export interface Palette {
  readonly spec: PaletteSpec;
  /** Color for t; values outside [0, 1] are clamped. */
  colorAt(t: number): RGB;
}

const resolveStops = (
  spec: ControlPointPaletteSpec | PresetPaletteSpec
): { stops: ColorStop[]; interpolation?: Interpolation } => {
  if (spec.type === "control-points") return spec;

  const preset = Object.hasOwn(palettePresets, spec.name) ? palettePresets[spec.name] : undefined;
  if (!preset) {
    throw new ConfigurationError(
      `Unknown palette preset "${spec.name}" (available: ${listPalettePresets().join(", ")})`
    );
  }
  return preset;
};

/**
 * Piecewise interpolation between color stops. Values of t before the first
 * stop or after the last take that stop's color. Stops come from the spec
 * itself or, for a preset, from the named preset.
 */
export class ControlPointPalette implements Palette {
  private readonly positions: number[];
  private readonly colors: RGB[];
  private readonly ease: (t: number) => number;

  constructor(readonly spec: ControlPointPaletteSpec | PresetPaletteSpec) {
    const { stops, interpolation = "linear" } = resolveStops(spec);
    if (stops.length < 2) {
      throw new ConfigurationError(`A control-point palette needs at least 2 stops, got ${stops.length}`);
    }
    stops.forEach((stop, i) => {
      if (!(stop.position >= 0 && stop.position <= 1)) {
        throw new ConfigurationError(`palette.stops[${i}].position must be in [0, 1], got ${stop.position}`);
      }
      if (i > 0 && stop.position <= stops[i - 1].position) {
        throw new ConfigurationError(
          `palette stop positions must be strictly increasing: stops[${i}].position ${stop.position} ` +
            `follows ${stops[i - 1].position}`
        );
      }
      validateColor(stop.color, `palette.stops[${i}].color`);
    });

    this.positions = stops.map((stop) => stop.position);
    this.colors = stops.map((stop): RGB => [stop.color[0], stop.color[1], stop.color[2]]);
    this.ease = interpolation === "cosine" ? cosineEase : (t) => t;
  }

  colorAt(t: number): RGB {
    const { positions, colors } = this;
    const last = positions.length - 1;
    const x = clamp01(t);

    if (x <= positions[0]) return roundColor(colors[0]);
    if (x >= positions[last]) return roundColor(colors[last]);

    // Stops are few; a linear scan beats a binary search at this size
    let i = 1;
    while (positions[i] < x) i++;

    const from = colors[i - 1];
    const to = colors[i];
    const u = this.ease((x - positions[i - 1]) / (positions[i] - positions[i - 1]));
    return [
      toChannel(lerp(from[0], to[0], u)),
      toChannel(lerp(from[1], to[1], u)),
      toChannel(lerp(from[2], to[2], u)),
    ];
  }
}

const roundColor = (color: RGB): RGB => [toChannel(color[0]), toChannel(color[1]), toChannel(color[2])];

/**
 * Procedural palette: each channel is a + b·cos(2π(c·t + d)), clamped to
 * [0, 1] and scaled to 0-255.
 */
export class CosinePalette implements Palette {
  constructor(readonly spec: CosinePaletteSpec) {
    for (const key of ["a", "b", "c", "d"] as const) {
      const vector = spec[key];
      if (vector.length !== 3 || !vector.every(Number.isFinite)) {
        throw new ConfigurationError(`palette.${key} must be three finite numbers, got ${JSON.stringify(vector)}`);
      }
    }
  }

  colorAt(t: number): RGB {
    const x = clamp01(t);
    const { a, b, c, d } = this.spec;
    const channel = (i: number): number =>
      toChannel(clamp01(a[i] + b[i] * Math.cos(2 * Math.PI * (c[i] * x + d[i]))) * 255);
    return [channel(0), channel(1), channel(2)];
  }
}

/**
 * Procedural palette cycling the hue `cycles` times across t = 0..1 at fixed
 * saturation and lightness. Continuous, since hue 360 and hue 0 coincide.
 */
export class HslCyclePalette implements Palette {
  constructor(readonly spec: HslCyclePaletteSpec) {
    requirePositiveNumber(spec.cycles, "palette.cycles");
    requireFiniteNumber(spec.saturation, "palette.saturation");
    requireFiniteNumber(spec.lightness, "palette.lightness");
    if (spec.saturation < 0 || spec.saturation > 1 || spec.lightness < 0 || spec.lightness > 1) {
      throw new ConfigurationError(
        `palette saturation and lightness must be in [0, 1], got ${spec.saturation} and ${spec.lightness}`
      );
    }
  }

  colorAt(t: number): RGB {
    const hue = (clamp01(t) * this.spec.cycles * 360) % 360;
    return hslToRgb(hue, this.spec.saturation, this.spec.lightness);
  }
}

export function listPalettePresets(): string[] {
  return Object.keys(palettePresets);
}

/**
 * Builds and validates the palette described by `spec`. Invalid palettes are
 * rejected here, never while coloring pixels.
 */
export function createPalette(spec: PaletteSpec): Palette {
  switch (spec.type) {
    case "control-points":
    case "preset":
      return new ControlPointPalette(spec);
    case "cosine":
      return new CosinePalette(spec);
    case "hsl-cycle":
      return new HslCyclePalette(spec);
    default: {
      const unknown: never = spec;
      throw new ConfigurationError(`Unknown palette type: ${JSON.stringify(unknown)}`);
    }
  }
}
