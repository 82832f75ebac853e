import type { ColorStop, Interpolation } from "./palette.js";

type Preset = { stops: ColorStop[]; interpolation?: Interpolation };

// Gradient stops for presets
export const palettePresets: Record<string, Preset> = {
  "electric-blue": {
    stops: [
      { position: 0, color: [0, 7, 100] },
      { position: 0.16, color: [32, 107, 203] },
      { position: 0.42, color: [237, 255, 255] },
      { position: 0.6425, color: [255, 170, 0] },
      { position: 0.8575, color: [0, 2, 0] },
      { position: 1, color: [0, 7, 100] },
    ],
    interpolation: "cosine",
  },
  // black → red → yellow → white
  fire: {
    stops: [
      { position: 0, color: [0, 0, 0] },
      { position: 0.2, color: [255, 0, 0] },
      { position: 0.6, color: [255, 255, 0] },
      { position: 1, color: [255, 255, 255] },
    ],
  },
  grayscale: {
    stops: [
      { position: 0, color: [0, 0, 0] },
      { position: 1, color: [255, 255, 255] },
    ],
  },
  ocean: {
    stops: [
      { position: 0, color: [2, 12, 36] },
      { position: 0.35, color: [8, 88, 158] },
      { position: 0.7, color: [78, 179, 211] },
      { position: 1, color: [224, 243, 219] },
    ],
  },
};
