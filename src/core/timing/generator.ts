import type { TimingEdge, TimingOutputs, TimingProfile, TimingSignal, TimingState } from '@core/timing/types';
import { assertValidProfile, hSyncEnd, hSyncStart, vSyncEnd, vSyncStart } from '@core/timing/profile';
import { envFlag, envInt } from '@utils/env';

export interface TimingGeneratorOptions {
  // Skip profile validation; a bad profile then yields a wrong but deterministic waveform.
  unchecked?: boolean;
  // Record output edges (also enabled by TIMING_TRACE=1)
  trace?: boolean;
  traceLimit?: number;
}

const SIGNALS: TimingSignal[] = ['active', 'hSync', 'vSync'];

// Clocked raster timing generator: one call to tick() per pixel-clock edge.
//
// Counters and the h/v sync outputs are registered: every comparison in a tick reads
// the counter values entering that tick. The active output is latched the same way but
// is then gated combinationally by the vertical position leaving the tick.
export class TimingGenerator {
  private readonly profile: TimingProfile;
  private readonly hSyncLo: number;
  private readonly hSyncHi: number;
  private readonly vSyncLo: number;
  private readonly vSyncHi: number;

  private hPos = 0;
  private vPos = 0;
  // Latched outputs (previous-tick registers)
  private activeReg = true;
  private hSyncReg = false;
  private vSyncReg = false;

  private ticks = 0;
  private last: TimingOutputs;

  private traceEnabled = false;
  private traceLog = false;
  private traceLimit = 4096;
  private trace: TimingEdge[] = [];

  constructor(profile: TimingProfile, opts: TimingGeneratorOptions = {}) {
    if (!opts.unchecked) assertValidProfile(profile);
    this.profile = Object.freeze({ ...profile });
    this.hSyncLo = hSyncStart(profile); this.hSyncHi = hSyncEnd(profile);
    this.vSyncLo = vSyncStart(profile); this.vSyncHi = vSyncEnd(profile);
    this.traceEnabled = opts.trace ?? envFlag('TIMING_TRACE');
    this.traceLog = envFlag('TIMING_TRACE_LOG');
    this.traceLimit = opts.traceLimit ?? envInt('TIMING_TRACE_LIMIT', 4096);
    this.last = this.outputs();
  }

  tick(reset: boolean, enable: boolean, sync: boolean): TimingOutputs {
    this.ticks++;
    const p = this.profile;
    if (reset) {
      this.clear();
    } else {
      if (enable) {
        const h = this.hPos;
        const v = this.vPos;
        let nextH = h + 1;
        let nextV = v;
        this.hSyncReg = h >= this.hSyncLo && h < this.hSyncHi;
        if (h === p.hTotal) {
          nextH = 1;
          nextV = v === p.vTotal - 1 ? 0 : v + 1;
        }
        this.vSyncReg = v >= this.vSyncLo && v < this.vSyncHi;
        this.activeReg = h <= p.hVisible - 1 || h === p.hTotal;
        this.hPos = nextH;
        this.vPos = nextV;
      } else {
        this.activeReg = false; this.hSyncReg = false; this.vSyncReg = false;
      }
      if (sync) this.clear();
    }
    const out = this.outputs();
    if (this.traceEnabled) this.recordEdges(out);
    this.last = out;
    return out;
  }

  // Apply a single reset tick
  reset(): TimingOutputs {
    return this.tick(true, false, false);
  }

  // Advance n plain ticks (no reset, no sync) and return the final outputs
  run(n: number, enable = true): TimingOutputs {
    let out = this.last;
    for (let i = 0; i < n; i++) out = this.tick(false, enable, false);
    return out;
  }

  outputs(): TimingOutputs {
    return {
      active: this.activeReg && this.vPos < this.profile.vVisible,
      hSync: this.hSyncReg,
      vSync: this.vSyncReg,
    };
  }

  state(): Readonly<TimingState> {
    return Object.freeze({ hPos: this.hPos, vPos: this.vPos, active: this.activeReg, hSync: this.hSyncReg, vSync: this.vSyncReg });
  }

  position(): { hPos: number, vPos: number } { return { hPos: this.hPos, vPos: this.vPos }; }
  getProfile(): TimingProfile { return this.profile; }
  getTickCount(): number { return this.ticks; }
  getTrace(): ReadonlyArray<TimingEdge> { return this.trace; }
  clearTrace(): void { this.trace.length = 0; }

  private clear(): void {
    this.hPos = 0; this.vPos = 0;
    this.activeReg = false; this.hSyncReg = false; this.vSyncReg = false;
  }

  private recordEdges(out: TimingOutputs): void {
    for (const s of SIGNALS) {
      if (out[s] === this.last[s]) continue;
      if (this.trace.length >= this.traceLimit) this.trace.shift();
      const edge: TimingEdge = { tick: this.ticks, signal: s, level: out[s], hPos: this.hPos, vPos: this.vPos };
      this.trace.push(edge);
      if (this.traceLog) {
        // eslint-disable-next-line no-console
        console.log(`[timing] ${s} ${out[s] ? 'rise' : 'fall'} at t=${edge.tick} h=${edge.hPos} v=${edge.vPos}`);
      }
    }
  }
}
