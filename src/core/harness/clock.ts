import type { TimingGenerator } from '@core/timing/generator';
import type { TimingOutputs } from '@core/timing/types';

export class HarnessTimeoutError extends Error {
  constructor(readonly waitedTicks: number, readonly what: string) {
    super(`timed out after ${waitedTicks} ticks waiting for ${what}`);
    this.name = 'HarnessTimeoutError';
  }
}

export type OutputPredicate = (out: TimingOutputs) => boolean;

export interface EdgeStamps {
  rise: number;
  fall: number;
}

// Sole tick source for one generator. Inputs are levels held across ticks,
// the way a testbench drives signals between clock edges.
export class ClockDriver {
  private resetLevel = false;
  private enableLevel = false;
  private syncLevel = false;
  private elapsed = 0;
  private current: TimingOutputs;
  // Driver tick index of the most recent rise/fall per output, -1 until seen
  private edges: Record<keyof TimingOutputs, EdgeStamps> = {
    active: { rise: -1, fall: -1 },
    hSync: { rise: -1, fall: -1 },
    vSync: { rise: -1, fall: -1 },
  };

  constructor(readonly gen: TimingGenerator, private readonly defaultTimeout = 1 << 24) {
    this.current = gen.outputs();
  }

  setReset(level: boolean): void { this.resetLevel = level; }
  setEnable(level: boolean): void { this.enableLevel = level; }
  setSync(level: boolean): void { this.syncLevel = level; }

  get outputs(): TimingOutputs { return this.current; }
  get ticks(): number { return this.elapsed; }

  step(): TimingOutputs {
    const prev = this.current;
    this.current = this.gen.tick(this.resetLevel, this.enableLevel, this.syncLevel);
    this.elapsed++;
    for (const s of ['active', 'hSync', 'vSync'] as const) {
      if (this.current[s] === prev[s]) continue;
      if (this.current[s]) this.edges[s].rise = this.elapsed;
      else this.edges[s].fall = this.elapsed;
    }
    return this.current;
  }

  rise(signal: keyof TimingOutputs): number { return this.edges[signal].rise; }
  fall(signal: keyof TimingOutputs): number { return this.edges[signal].fall; }

  // Reset for one tick, release with enable low for one tick, then raise enable.
  bringUp(): void {
    this.setSync(false);
    this.setReset(true); this.setEnable(false);
    this.step();
    this.setReset(false);
    this.step();
    this.setEnable(true);
  }

  // Tick until pred holds on the outputs; returns the number of ticks taken.
  waitFor(pred: OutputPredicate, what: string, timeout = this.defaultTimeout): number {
    let n = 0;
    while (!pred(this.current)) {
      if (n >= timeout) throw new HarnessTimeoutError(n, what);
      this.step();
      n++;
    }
    return n;
  }

  // Ticks until the named signal changes level from its current one
  waitEdge(signal: keyof TimingOutputs, timeout = this.defaultTimeout): number {
    const level = this.current[signal];
    return this.waitFor((o) => o[signal] !== level, `${signal} ${level ? 'fall' : 'rise'}`, timeout);
  }
}
