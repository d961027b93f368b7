import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  assertValidProfile, getProfile, profileFromEnv, profileNames, validateProfile,
  SVGA_800x600_60, TimingConfigError, UnknownProfileError, VGA_640x480_60, XGA_1024x768_60,
} from '@core/timing/profile';
import { TimingGenerator } from '@core/timing/generator';
import { TINY } from '@test/helpers/profiles';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('Timing profile validation', () => {
  it('accepts every preset', () => {
    for (const name of profileNames()) expect(validateProfile(getProfile(name))).toEqual([]);
  });

  it('reports a horizontal total that does not match its phases', () => {
    const issues = validateProfile({ ...SVGA_800x600_60, hTotal: 1000 });
    expect(issues).toEqual([{ field: 'hTotal', reason: 'must equal the sum of the horizontal phases (1056, got 1000)' }]);
  });

  it('reports both totals when both are off', () => {
    const issues = validateProfile({ ...TINY, hTotal: 9, vTotal: 7 });
    expect(issues.map((i) => i.field)).toEqual(['hTotal', 'vTotal']);
  });

  it('rejects negative and fractional widths before checking sums', () => {
    const issues = validateProfile({ ...TINY, hFrontPorch: -1, vBackPorch: 1.5 });
    expect(issues).toEqual([
      { field: 'hFrontPorch', reason: 'must be a non-negative integer (got -1)' },
      { field: 'vBackPorch', reason: 'must be a non-negative integer (got 1.5)' },
    ]);
  });

  it('rejects a zero-width sync pulse even when the sum matches', () => {
    const issues = validateProfile({ ...TINY, hSyncPulse: 0, hTotal: 6 });
    expect(issues).toEqual([{ field: 'hSyncPulse', reason: 'must be positive' }]);
  });

  it('throws a TimingConfigError naming the first issue', () => {
    let err: unknown = null;
    try {
      assertValidProfile({ ...SVGA_800x600_60, vTotal: 600 });
    } catch (e) {
      err = e;
    }
    expect(err).toBeInstanceOf(TimingConfigError);
    if (!(err instanceof TimingConfigError)) return;
    expect(err.field).toBe('vTotal');
    expect(err.message).toBe('invalid timing profile: vTotal must equal the sum of the vertical phases (628, got 600)');
  });

  it('refuses a bad profile at construction unless unchecked', () => {
    const bad = { ...TINY, hTotal: 9 };
    expect(() => new TimingGenerator(bad)).toThrow(TimingConfigError);
    const gen = new TimingGenerator(bad, { unchecked: true });
    expect(gen.getProfile().hTotal).toBe(9);
  });

  it('runs an unchecked bad profile deterministically', () => {
    const bad = { ...TINY, hTotal: 11, vFrontPorch: 3 };
    const a = new TimingGenerator(bad, { unchecked: true });
    const b = new TimingGenerator(bad, { unchecked: true });
    for (let i = 0; i < 500; i++) expect(a.tick(false, true, false)).toEqual(b.tick(false, true, false));
    expect(a.state()).toEqual(b.state());
  });
});

describe('Timing profile presets', () => {
  it('looks names up case-insensitively', () => {
    expect(getProfile('VGA-640x480-60')).toBe(VGA_640x480_60);
  });

  it('lists known names on an unknown lookup', () => {
    expect(() => getProfile('ntsc')).toThrow(UnknownProfileError);
    expect(() => getProfile('ntsc')).toThrow("unknown timing profile 'ntsc' (known: svga-800x600-60, vga-640x480-60, xga-1024x768-60)");
  });

  it('defaults to the 800x600 profile', () => {
    vi.stubEnv('TIMING_PROFILE', '');
    expect(profileFromEnv()).toBe(SVGA_800x600_60);
  });

  it('selects the preset named by TIMING_PROFILE', () => {
    vi.stubEnv('TIMING_PROFILE', 'xga-1024x768-60');
    expect(profileFromEnv()).toBe(XGA_1024x768_60);
  });
});
