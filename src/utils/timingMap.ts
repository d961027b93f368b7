import { PNG } from 'pngjs';
import { BIT_ACTIVE, BIT_HSYNC, BIT_VSYNC, type FrameCapture } from '@core/harness/capture';

export type RGB = readonly [number, number, number];

export const MAP_COLORS = {
  blank: [0, 0, 0],
  active: [255, 255, 255],
  hSync: [255, 0, 0],
  vSync: [0, 0, 255],
  both: [255, 0, 255],
} as const satisfies Record<string, RGB>;

export function colorFor(bits: number): RGB {
  if (bits & BIT_ACTIVE) return MAP_COLORS.active;
  const h = (bits & BIT_HSYNC) !== 0, v = (bits & BIT_VSYNC) !== 0;
  if (h && v) return MAP_COLORS.both;
  if (h) return MAP_COLORS.hSync;
  if (v) return MAP_COLORS.vSync;
  return MAP_COLORS.blank;
}

// One pixel per tick, one row per hTotal ticks
export function renderTimingMap(capture: FrameCapture): PNG {
  const png = new PNG({ width: capture.width, height: capture.height });
  const { samples } = capture;
  for (let i = 0; i < samples.length; i++) {
    const [r, g, b] = colorFor(samples[i]);
    const o = i * 4;
    png.data[o] = r; png.data[o + 1] = g; png.data[o + 2] = b; png.data[o + 3] = 0xFF;
  }
  return png;
}

export function encodeTimingMap(capture: FrameCapture): Buffer {
  return PNG.sync.write(renderTimingMap(capture));
}
