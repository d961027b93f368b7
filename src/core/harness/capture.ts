import type { TimingGenerator } from '@core/timing/generator';
import type { TimingOutputs } from '@core/timing/types';
import { crc32 } from '@utils/crc32';

export const BIT_ACTIVE = 0x01;
export const BIT_HSYNC = 0x02;
export const BIT_VSYNC = 0x04;

export interface FrameStats {
  activeTicks: number;
  hSyncTicks: number;
  vSyncTicks: number;
  // Number of rising edges per signal inside the capture
  activeRuns: number;
  hSyncPulses: number;
  vSyncPulses: number;
}

export interface FrameCapture {
  width: number; // hTotal
  height: number; // vTotal
  // One byte per tick: BIT_ACTIVE | BIT_HSYNC | BIT_VSYNC
  samples: Uint8Array;
  stats: FrameStats;
  crc: number;
}

export function packOutputs(o: TimingOutputs): number {
  return (o.active ? BIT_ACTIVE : 0) | (o.hSync ? BIT_HSYNC : 0) | (o.vSync ? BIT_VSYNC : 0);
}

// Advance with enable held until the first active tick following a v-sync pulse.
// Returns the number of ticks consumed.
export function alignToFrameStart(gen: TimingGenerator, limit?: number): number {
  const p = gen.getProfile();
  const max = limit ?? 2 * p.hTotal * p.vTotal;
  let n = 0;
  let sawVSync = false;
  let prevActive = gen.outputs().active;
  while (n < max) {
    const o = gen.tick(false, true, false);
    n++;
    if (o.vSync) sawVSync = true;
    if (sawVSync && o.active && !prevActive) return n;
    prevActive = o.active;
  }
  throw new Error(`no frame start within ${max} ticks`);
}

// Capture exactly hTotal * vTotal enabled ticks starting at the current position.
export function captureFrame(gen: TimingGenerator): FrameCapture {
  const p = gen.getProfile();
  const samples = new Uint8Array(p.hTotal * p.vTotal);
  const stats: FrameStats = { activeTicks: 0, hSyncTicks: 0, vSyncTicks: 0, activeRuns: 0, hSyncPulses: 0, vSyncPulses: 0 };
  let prev = packOutputs(gen.outputs());
  for (let i = 0; i < samples.length; i++) {
    const bits = packOutputs(gen.tick(false, true, false));
    samples[i] = bits;
    if (bits & BIT_ACTIVE) stats.activeTicks++;
    if (bits & BIT_HSYNC) stats.hSyncTicks++;
    if (bits & BIT_VSYNC) stats.vSyncTicks++;
    const rising = bits & ~prev;
    if (rising & BIT_ACTIVE) stats.activeRuns++;
    if (rising & BIT_HSYNC) stats.hSyncPulses++;
    if (rising & BIT_VSYNC) stats.vSyncPulses++;
    prev = bits;
  }
  return { width: p.hTotal, height: p.vTotal, samples, stats, crc: crc32(samples) };
}
