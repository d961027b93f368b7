import { afterEach, describe, it, expect, vi } from 'vitest';
import { TimingGenerator } from '@core/timing/generator';
import { TINY } from '@test/helpers/profiles';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('TimingGenerator edge trace', () => {
  it('is off by default', () => {
    vi.stubEnv('TIMING_TRACE', '');
    const gen = new TimingGenerator(TINY);
    gen.reset();
    gen.run(20);
    expect(gen.getTrace()).toEqual([]);
  });

  it('records every output edge with the position after the tick', () => {
    const gen = new TimingGenerator(TINY, { trace: true });
    gen.reset();
    gen.run(9);
    expect(gen.getTrace()).toEqual([
      { tick: 1, signal: 'active', level: false, hPos: 0, vPos: 0 },
      { tick: 2, signal: 'active', level: true, hPos: 1, vPos: 0 },
      { tick: 6, signal: 'active', level: false, hPos: 5, vPos: 0 },
      { tick: 7, signal: 'hSync', level: true, hPos: 6, vPos: 0 },
      { tick: 9, signal: 'hSync', level: false, hPos: 8, vPos: 0 },
      { tick: 10, signal: 'active', level: true, hPos: 1, vPos: 1 },
    ]);
  });

  it('keeps only the most recent edges', () => {
    const gen = new TimingGenerator(TINY, { trace: true, traceLimit: 2 });
    gen.reset();
    gen.run(9);
    expect(gen.getTrace().map((e) => e.tick)).toEqual([9, 10]);
    gen.clearTrace();
    expect(gen.getTrace()).toEqual([]);
  });

  it('can be switched on and logged through the environment', () => {
    vi.stubEnv('TIMING_TRACE', '1');
    vi.stubEnv('TIMING_TRACE_LOG', '1');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const gen = new TimingGenerator(TINY);
    gen.reset();
    gen.run(1);
    expect(gen.getTrace()).toHaveLength(2);
    expect(log.mock.calls).toEqual([
      ['[timing] active fall at t=1 h=0 v=0'],
      ['[timing] active rise at t=2 h=1 v=0'],
    ]);
  });
});
