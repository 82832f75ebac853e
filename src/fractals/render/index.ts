import type { ImageWriter, OutputRaster, RenderConfig, RenderConfigLoader } from "../types.js";
import type { ParallelRenderer, RenderOptions } from "./parallel-renderer.js";
import { render } from "./render.js";

export { blitChunk, createRaster, createRenderPipeline, renderChunkInto } from "./pipeline.js";
export type { RenderPipeline } from "./pipeline.js";
export { calculateOptimalChunkSize, createChunks, DEFAULT_CHUNK_OPTIONS } from "./chunks.js";
export type { ChunkOptions, RenderChunk } from "./chunks.js";
export { createThreadWorker, ParallelRenderer, threadWorkerHandle } from "./parallel-renderer.js";
export type { ParallelRendererOptions, RenderOptions, WorkerFactory, WorkerHandle } from "./parallel-renderer.js";
export { render } from "./render.js";

/**
 * Renders a configuration and hands the finished raster to `writer`.
 *
 * With a renderer the work is spread over its worker pool; otherwise it runs
 * on the calling thread. Nothing reaches the writer unless the render
 * completed.
 *
 * @returns The raster that was written
 */
export async function renderToImage(
  config: RenderConfig,
  writer: ImageWriter,
  target: string,
  renderer?: ParallelRenderer,
  options?: RenderOptions
): Promise<OutputRaster> {
  const { viewport, dimensions, params, palette } = config;
  const startTime = performance.now();

  const raster = renderer
    ? await renderer.render(viewport, dimensions, params, palette, options)
    : render(viewport, dimensions, params, palette);

  console.log(
    `Rendered ${dimensions.width}x${dimensions.height} in ${(performance.now() - startTime).toFixed(1)}ms, ` +
      `writing to ${target}`
  );
  await writer.write(raster, target);

  return raster;
}

/** Loads the configuration from `loader`, then behaves as renderToImage. */
export async function renderFromLoader(
  loader: RenderConfigLoader,
  writer: ImageWriter,
  target: string,
  renderer?: ParallelRenderer,
  options?: RenderOptions
): Promise<OutputRaster> {
  const config = await loader.load();
  return renderToImage(config, writer, target, renderer, options);
}
