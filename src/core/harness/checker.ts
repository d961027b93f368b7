import { TimingGenerator } from '@core/timing/generator';
import type { TimingProfile } from '@core/timing/types';
import { ticksPerFrame } from '@core/timing/profile';
import { ClockDriver } from '@core/harness/clock';
import { envFlag } from '@utils/env';

export type Phase =
  | 'active' | 'hFrontPorch' | 'hSyncPulse' | 'hBackPorch'
  | 'vFrontPorch' | 'vSyncPulse' | 'vBackPorch';

export interface PhaseViolation {
  frame: number;
  line: number; // -1 for vertical phases
  phase: Phase;
  expected: number;
  actual: number;
}

export interface CheckOptions {
  frames?: number;
  maxViolations?: number;
  // Per-wait tick budget; defaults to two frames
  timeout?: number;
  unchecked?: boolean;
}

export interface CheckReport {
  frames: number;
  ticks: number;
  violations: PhaseViolation[];
}

// Expected vertical measurements in ticks. The v-sync register compares the line
// counter entering each tick, so its edges trail the line boundary by one tick:
// the front porch reads one tick long and the back porch one tick short.
export function expectedVerticalTicks(p: TimingProfile): Record<'vFrontPorch' | 'vSyncPulse' | 'vBackPorch', number> {
  return {
    vFrontPorch: p.vFrontPorch * p.hTotal + 1,
    vSyncPulse: p.vSyncPulse * p.hTotal,
    vBackPorch: p.vBackPorch * p.hTotal - 1,
  };
}

// Drives a fresh generator through bring-up and walks the expected phase sequence
// for a number of frames, comparing each measured phase width with the profile.
export class TimingChecker {
  readonly driver: ClockDriver;
  private readonly violations: PhaseViolation[] = [];
  private readonly maxViolations: number;
  private readonly log = envFlag('TIMING_CHECK_LOG');

  constructor(readonly profile: TimingProfile, private readonly opts: CheckOptions = {}) {
    const gen = new TimingGenerator(profile, { unchecked: opts.unchecked });
    this.driver = new ClockDriver(gen, opts.timeout ?? 2 * ticksPerFrame(profile));
    this.maxViolations = opts.maxViolations ?? 16;
  }

  run(): CheckReport {
    const d = this.driver;
    const frames = this.opts.frames ?? 3;
    d.bringUp();
    // Align on the first visible line that follows a complete v-sync pulse
    d.waitFor((o) => o.vSync, 'first v-sync');
    d.waitFor((o) => !o.vSync, 'first v-sync end');
    d.waitFor((o) => o.active, 'first visible line');

    let frame = 0;
    for (; frame < frames && !this.full(); frame++) this.checkFrame(frame);
    return { frames: frame, ticks: d.ticks, violations: this.violations.slice() };
  }

  private checkFrame(frame: number): void {
    const d = this.driver;
    const p = this.profile;
    const vExp = expectedVerticalTicks(p);
    for (let line = 0; line < p.vVisible; line++) {
      const start = d.rise('active');
      d.waitFor((o) => !o.active, 'active end');
      this.expect(frame, line, 'active', p.hVisible, d.fall('active') - start);
      d.waitFor((o) => o.hSync, 'h-sync start');
      this.expect(frame, line, 'hFrontPorch', p.hFrontPorch, d.rise('hSync') - d.fall('active'));
      d.waitFor((o) => !o.hSync, 'h-sync end');
      this.expect(frame, line, 'hSyncPulse', p.hSyncPulse, d.fall('hSync') - d.rise('hSync'));
      if (line < p.vVisible - 1) {
        d.waitFor((o) => o.active, 'next line');
        this.expect(frame, line, 'hBackPorch', p.hBackPorch, d.rise('active') - d.fall('hSync'));
      }
      if (this.full()) return;
    }
    const visibleEnd = d.fall('hSync') + p.hBackPorch;
    d.waitFor((o) => o.vSync, 'v-sync start');
    this.expect(frame, -1, 'vFrontPorch', vExp.vFrontPorch, d.rise('vSync') - visibleEnd);
    d.waitFor((o) => !o.vSync, 'v-sync end');
    this.expect(frame, -1, 'vSyncPulse', vExp.vSyncPulse, d.fall('vSync') - d.rise('vSync'));
    d.waitFor((o) => o.active, 'frame start');
    this.expect(frame, -1, 'vBackPorch', vExp.vBackPorch, d.rise('active') - d.fall('vSync'));
  }

  private expect(frame: number, line: number, phase: Phase, expected: number, actual: number): void {
    if (expected === actual || this.full()) return;
    this.violations.push({ frame, line, phase, expected, actual });
    if (this.log) {
      // eslint-disable-next-line no-console
      console.log(`[check] f=${frame} line=${line} ${phase} expected=${expected} actual=${actual}`);
    }
  }

  private full(): boolean {
    return this.violations.length >= this.maxViolations;
  }
}
