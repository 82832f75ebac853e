import type { Decimal } from "decimal.js";

import { createPalette, type PaletteSpec } from "../fractals/coloring/palette.js";
import { createOrbitTrap } from "../fractals/algorithms/orbit-traps.js";
import type { ColoringOptions, FractalParams, RasterDimensions, RenderConfig } from "../fractals/types.js";
import { createPlaneTransform, createViewport } from "./coordinates.js";
import { validateDimensions, validateFractalParams } from "./validation.js";

/**
 * Plain-value defaults. The viewport is kept as raw values so that overrides
 * can be merged field by field before validation.
 */
export const defaultRenderConfig = {
  viewport: {
    center: { re: "-0.5", im: "0" },
    halfHeight: "1.5",
  },
  dimensions: { width: 2048, height: 2048 },
  params: {
    algorithm: { type: "mandelbrot" },
    maxIterations: 1000,
    escapeRadius: 2,
    trap: { type: "point", at: { re: 0, im: 0 } },
    coloring: {
      trapFalloff: 4,
      iterationBlend: 0,
      interiorColor: [0, 0, 0],
    },
  },
  palette: { type: "preset", name: "electric-blue" },
} satisfies {
  viewport: { center: { re: Decimal.Value; im: Decimal.Value }; halfHeight: Decimal.Value };
  dimensions: RasterDimensions;
  params: FractalParams;
  palette: PaletteSpec;
};

export type RenderConfigInput = {
  viewport?: {
    center?: { re: Decimal.Value; im: Decimal.Value };
    halfHeight?: Decimal.Value;
  };
  dimensions?: Partial<RasterDimensions>;
  params?: Partial<Omit<FractalParams, "coloring">> & { coloring?: Partial<ColoringOptions> };
  palette?: PaletteSpec;
};

/**
 * Merges `input` onto the defaults and validates the result eagerly, so that
 * every configuration error surfaces here rather than during rendering.
 *
 * @throws ConfigurationError naming the first invalid field
 */
export function createRenderConfig(input: RenderConfigInput = {}): RenderConfig {
  const defaults = defaultRenderConfig;

  const viewport = createViewport({
    center: input.viewport?.center ?? defaults.viewport.center,
    halfHeight: input.viewport?.halfHeight ?? defaults.viewport.halfHeight,
  });

  const dimensions: RasterDimensions = Object.freeze({ ...defaults.dimensions, ...input.dimensions });
  validateDimensions(dimensions);

  const { coloring, ...paramOverrides } = input.params ?? {};
  const params: FractalParams = Object.freeze({
    ...defaults.params,
    ...paramOverrides,
    coloring: Object.freeze({ ...defaults.params.coloring, ...coloring }),
  });
  validateFractalParams(params);
  createOrbitTrap(params.trap);

  // Rejects a half-height too small for native floating point at this resolution
  createPlaneTransform(viewport, dimensions);

  return Object.freeze({
    viewport,
    dimensions,
    params,
    palette: createPalette(input.palette ?? defaults.palette),
  });
}
