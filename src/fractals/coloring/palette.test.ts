import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../../lib/errors.js";
import type { RGB } from "../types.js";
import { hslToRgb } from "./color.js";
import {
  ControlPointPalette,
  type ControlPointPaletteSpec,
  CosinePalette,
  type CosinePaletteSpec,
  createPalette,
  HslCyclePalette,
  listPalettePresets,
} from "./palette.js";

const blackToWhite = (interpolation?: "linear" | "cosine"): ControlPointPaletteSpec => ({
  type: "control-points",
  stops: [
    { position: 0, color: [0, 0, 0] },
    { position: 1, color: [255, 255, 255] },
  ],
  interpolation,
});

const maxChannelStep = (a: RGB, b: RGB): number =>
  Math.max(Math.abs(a[0] - b[0]), Math.abs(a[1] - b[1]), Math.abs(a[2] - b[2]));

describe("ControlPointPalette", () => {
  it("should return the stop colors at the stop positions", () => {
    const palette = createPalette(blackToWhite());
    expect(palette.colorAt(0)).toEqual([0, 0, 0]);
    expect(palette.colorAt(1)).toEqual([255, 255, 255]);
  });

  it("should interpolate linearly between stops", () => {
    const palette = createPalette(blackToWhite());
    expect(palette.colorAt(0.5)).toEqual([128, 128, 128]);
    expect(palette.colorAt(0.25)).toEqual([64, 64, 64]);
  });

  it("should ease between stops with cosine interpolation", () => {
    const palette = createPalette(blackToWhite("cosine"));
    // (1 - cos(π/4)) / 2 · 255 ≈ 37.34
    expect(palette.colorAt(0.25)).toEqual([37, 37, 37]);
  });

  it("should clamp t outside [0, 1]", () => {
    const palette = createPalette(blackToWhite());
    expect(palette.colorAt(-1)).toEqual([0, 0, 0]);
    expect(palette.colorAt(2)).toEqual([255, 255, 255]);
  });

  it("should hold the end colors when stops do not reach 0 and 1", () => {
    const palette = createPalette({
      type: "control-points",
      stops: [
        { position: 0.2, color: [10, 20, 30] },
        { position: 0.8, color: [110, 120, 130] },
      ],
    });
    expect(palette.colorAt(0.1)).toEqual([10, 20, 30]);
    expect(palette.colorAt(0.5)).toEqual([60, 70, 80]);
    expect(palette.colorAt(0.9)).toEqual([110, 120, 130]);
  });

  it("should reject stops that are not strictly increasing", () => {
    const spec: ControlPointPaletteSpec = {
      type: "control-points",
      stops: [
        { position: 0.5, color: [0, 0, 0] },
        { position: 0.2, color: [255, 255, 255] },
      ],
    };
    expect(() => createPalette(spec)).toThrow(ConfigurationError);
    expect(() => createPalette(spec)).toThrow(
      "palette stop positions must be strictly increasing: stops[1].position 0.2 follows 0.5"
    );
  });

  it("should reject duplicate positions", () => {
    expect(
      () =>
        new ControlPointPalette({
          type: "control-points",
          stops: [
            { position: 0.5, color: [0, 0, 0] },
            { position: 0.5, color: [255, 255, 255] },
          ],
        })
    ).toThrow(/strictly increasing/);
  });

  it("should take its colors from its own spec", () => {
    const spec = blackToWhite();
    const palette = new ControlPointPalette(spec);
    expect(palette.spec).toBe(spec);
    expect(createPalette(palette.spec).colorAt(0.25)).toEqual(palette.colorAt(0.25));
  });

  it("should resolve preset stops by name", () => {
    const palette = new ControlPointPalette({ type: "preset", name: "fire" });
    expect(palette.colorAt(0.6)).toEqual([255, 255, 0]);
    expect(() => new ControlPointPalette({ type: "preset", name: "missing" })).toThrow(ConfigurationError);
  });

  it("should reject fewer than two stops", () => {
    expect(() => createPalette({ type: "control-points", stops: [{ position: 0, color: [0, 0, 0] }] })).toThrow(
      "A control-point palette needs at least 2 stops, got 1"
    );
  });

  it("should reject positions outside [0, 1] and out-of-range channels", () => {
    expect(() =>
      createPalette({
        type: "control-points",
        stops: [
          { position: 0, color: [0, 0, 0] },
          { position: 1.5, color: [255, 255, 255] },
        ],
      })
    ).toThrow("palette.stops[1].position must be in [0, 1], got 1.5");
    expect(() =>
      createPalette({
        type: "control-points",
        stops: [
          { position: 0, color: [0, 0, 300] },
          { position: 1, color: [255, 255, 255] },
        ],
      })
    ).toThrow(ConfigurationError);
  });

  it("should not change when the stops array is mutated after construction", () => {
    const spec = blackToWhite();
    const palette = createPalette(spec);
    spec.stops[1].color[0] = 0;
    expect(palette.colorAt(1)).toEqual([255, 255, 255]);
  });
});

describe("presets", () => {
  it("should list the built-in presets", () => {
    expect(listPalettePresets()).toEqual(expect.arrayContaining(["electric-blue", "fire", "grayscale", "ocean"]));
  });

  it("should build presets by name and keep the requesting spec", () => {
    const palette = createPalette({ type: "preset", name: "fire" });
    expect(palette.spec).toEqual({ type: "preset", name: "fire" });
    expect(palette.colorAt(0)).toEqual([0, 0, 0]);
    expect(palette.colorAt(0.2)).toEqual([255, 0, 0]);
    expect(palette.colorAt(1)).toEqual([255, 255, 255]);
  });

  it("should reject an unknown preset", () => {
    expect(() => createPalette({ type: "preset", name: "no-such-palette" })).toThrow(ConfigurationError);
    expect(() => createPalette({ type: "preset", name: "toString" })).toThrow(/Unknown palette preset/);
  });

  it.each(["electric-blue", "fire", "grayscale", "ocean"])("should be continuous: %s", (name) => {
    const palette = createPalette({ type: "preset", name });
    let previous = palette.colorAt(0);
    for (let i = 1; i <= 1000; i++) {
      const next = palette.colorAt(i / 1000);
      expect(maxChannelStep(previous, next)).toBeLessThanOrEqual(4);
      previous = next;
    }
  });
});

describe("CosinePalette", () => {
  const spec: CosinePaletteSpec = {
    type: "cosine",
    a: [0.5, 0.5, 0.5],
    b: [0.5, 0.5, 0.5],
    c: [1, 1, 1],
    d: [0, 0, 0],
  };

  it("should evaluate a + b·cos(2π(c·t + d)) per channel", () => {
    const palette = new CosinePalette(spec);
    expect(palette.colorAt(0)).toEqual([255, 255, 255]);
    expect(palette.colorAt(0.5)).toEqual([0, 0, 0]);
  });

  it("should offset channels by phase", () => {
    const palette = new CosinePalette({ ...spec, d: [0, 0.5, 0] });
    expect(palette.colorAt(0)).toEqual([255, 0, 255]);
  });

  it("should reject non-finite coefficients", () => {
    expect(() => new CosinePalette({ ...spec, b: [0.5, NaN, 0.5] })).toThrow(ConfigurationError);
  });
});

describe("HslCyclePalette", () => {
  const palette = new HslCyclePalette({ type: "hsl-cycle", cycles: 1, saturation: 1, lightness: 0.5 });

  it("should start and end on the same hue", () => {
    expect(palette.colorAt(0)).toEqual([255, 0, 0]);
    expect(palette.colorAt(1)).toEqual([255, 0, 0]);
  });

  it("should rotate the hue across t", () => {
    expect(palette.colorAt(0.5)).toEqual(hslToRgb(180, 1, 0.5));
    expect(palette.colorAt(0.5)).toEqual([0, 255, 255]);
  });

  it("should reject out-of-range saturation", () => {
    expect(() => new HslCyclePalette({ type: "hsl-cycle", cycles: 1, saturation: 2, lightness: 0.5 })).toThrow(
      ConfigurationError
    );
    expect(() => new HslCyclePalette({ type: "hsl-cycle", cycles: 0, saturation: 1, lightness: 0.5 })).toThrow(
      "palette.cycles must be a positive finite number, got 0"
    );
  });
});
