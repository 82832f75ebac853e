export * from "./fractals/algorithms/index.js";
export {
  BLACK,
  clamp01,
  hslToRgb,
  WHITE,
} from "./fractals/coloring/color.js";
export { createColorizer, deriveColorValue, smoothIterationCount } from "./fractals/coloring/colorizer.js";
export type { Colorizer } from "./fractals/coloring/colorizer.js";
export {
  ControlPointPalette,
  CosinePalette,
  createPalette,
  HslCyclePalette,
  listPalettePresets,
} from "./fractals/coloring/palette.js";
export type {
  ColorStop,
  ControlPointPaletteSpec,
  CosinePaletteSpec,
  HslCyclePaletteSpec,
  Interpolation,
  Palette,
  PaletteSpec,
  PresetPaletteSpec,
} from "./fractals/coloring/palette.js";
export * from "./fractals/render/index.js";
export type * from "./fractals/types.js";
export * from "./lib/complex.js";
export {
  createPlaneTransform,
  createViewport,
  panViewport,
  viewportFromZoom,
  viewportHalfWidth,
  zoomViewport,
} from "./lib/coordinates.js";
export type { PlaneTransform, ViewportInput } from "./lib/coordinates.js";
export { ConfigurationError } from "./lib/errors.js";
export { PerformanceMonitor } from "./lib/performance-monitor.js";
export type { RenderSessionMetrics } from "./lib/performance-monitor.js";
export { createRenderConfig, defaultRenderConfig } from "./lib/render-config.js";
export type { RenderConfigInput } from "./lib/render-config.js";
