import type { TimingProfile } from '@core/timing/types';
import { getEnv } from '@utils/env';

export type ProfileField = keyof TimingProfile;

export interface ProfileIssue {
  field: ProfileField;
  reason: string;
}

export class TimingConfigError extends Error {
  readonly field: ProfileField;
  readonly reason: string;

  constructor(issue: ProfileIssue) {
    super(`invalid timing profile: ${issue.field} ${issue.reason}`);
    this.name = 'TimingConfigError';
    this.field = issue.field;
    this.reason = issue.reason;
  }
}

export class UnknownProfileError extends Error {
  constructor(readonly profileName: string) {
    super(`unknown timing profile '${profileName}' (known: ${profileNames().join(', ')})`);
    this.name = 'UnknownProfileError';
  }
}

// VESA 800x600 @ 60 Hz, 40 MHz pixel clock
export const SVGA_800x600_60: TimingProfile = Object.freeze({
  hVisible: 800, hFrontPorch: 40, hSyncPulse: 128, hBackPorch: 88, hTotal: 1056,
  vVisible: 600, vFrontPorch: 1, vSyncPulse: 4, vBackPorch: 23, vTotal: 628,
});

// 640x480 @ 60 Hz, 25.175 MHz pixel clock
export const VGA_640x480_60: TimingProfile = Object.freeze({
  hVisible: 640, hFrontPorch: 16, hSyncPulse: 96, hBackPorch: 48, hTotal: 800,
  vVisible: 480, vFrontPorch: 10, vSyncPulse: 2, vBackPorch: 33, vTotal: 525,
});

// 1024x768 @ 60 Hz, 65 MHz pixel clock
export const XGA_1024x768_60: TimingProfile = Object.freeze({
  hVisible: 1024, hFrontPorch: 24, hSyncPulse: 136, hBackPorch: 160, hTotal: 1344,
  vVisible: 768, vFrontPorch: 3, vSyncPulse: 6, vBackPorch: 29, vTotal: 806,
});

export const DEFAULT_PROFILE_NAME = 'svga-800x600-60';

const presets: Record<string, TimingProfile> = {
  'svga-800x600-60': SVGA_800x600_60,
  'vga-640x480-60': VGA_640x480_60,
  'xga-1024x768-60': XGA_1024x768_60,
};

export function profileNames(): string[] {
  return Object.keys(presets);
}

export function getProfile(name: string): TimingProfile {
  const p = presets[name.toLowerCase()];
  if (!p) throw new UnknownProfileError(name);
  return p;
}

export function profileFromEnv(): TimingProfile {
  return getProfile(getEnv('TIMING_PROFILE') ?? DEFAULT_PROFILE_NAME);
}

const FIELDS: ProfileField[] = [
  'hVisible', 'hFrontPorch', 'hSyncPulse', 'hBackPorch', 'hTotal',
  'vVisible', 'vFrontPorch', 'vSyncPulse', 'vBackPorch', 'vTotal',
];

export function validateProfile(p: TimingProfile): ProfileIssue[] {
  const issues: ProfileIssue[] = [];
  for (const f of FIELDS) {
    const v = p[f];
    if (!Number.isInteger(v) || v < 0) issues.push({ field: f, reason: `must be a non-negative integer (got ${v})` });
  }
  if (issues.length > 0) return issues;
  for (const f of ['hVisible', 'hSyncPulse', 'hTotal', 'vVisible', 'vSyncPulse', 'vTotal'] as const) {
    if (p[f] === 0) issues.push({ field: f, reason: 'must be positive' });
  }
  const hSum = p.hVisible + p.hFrontPorch + p.hSyncPulse + p.hBackPorch;
  if (hSum !== p.hTotal) issues.push({ field: 'hTotal', reason: `must equal the sum of the horizontal phases (${hSum}, got ${p.hTotal})` });
  const vSum = p.vVisible + p.vFrontPorch + p.vSyncPulse + p.vBackPorch;
  if (vSum !== p.vTotal) issues.push({ field: 'vTotal', reason: `must equal the sum of the vertical phases (${vSum}, got ${p.vTotal})` });
  return issues;
}

export function assertValidProfile(p: TimingProfile): void {
  const issues = validateProfile(p);
  if (issues.length > 0) throw new TimingConfigError(issues[0]);
}

// Derived window boundaries, in counter units
export function hSyncStart(p: TimingProfile): number { return p.hVisible + p.hFrontPorch; }
export function hSyncEnd(p: TimingProfile): number { return p.hVisible + p.hFrontPorch + p.hSyncPulse; }
export function vSyncStart(p: TimingProfile): number { return p.vVisible + p.vFrontPorch; }
export function vSyncEnd(p: TimingProfile): number { return p.vVisible + p.vFrontPorch + p.vSyncPulse; }
export function ticksPerFrame(p: TimingProfile): number { return p.hTotal * p.vTotal; }
