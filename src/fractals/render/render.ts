import type { Palette } from "../coloring/palette.js";
import type { FractalParams, OutputRaster, RasterDimensions, Viewport } from "../types.js";
import { createRaster, createRenderPipeline, renderChunkInto } from "./pipeline.js";

/**
 * Renders the whole raster on the calling thread.
 *
 * Configuration is validated before the output buffer is allocated, so the
 * caller gets either a complete raster or a ConfigurationError, never a
 * partial image. Identical inputs produce a bit-identical raster.
 */
export function render(
  viewport: Viewport,
  dimensions: RasterDimensions,
  params: FractalParams,
  palette: Palette
): OutputRaster {
  const pipeline = createRenderPipeline(viewport, dimensions, params, palette);
  const raster = createRaster(dimensions);

  renderChunkInto(
    pipeline,
    { startX: 0, startY: 0, width: dimensions.width, height: dimensions.height },
    raster.data,
    dimensions.width
  );

  return raster;
}
