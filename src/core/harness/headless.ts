import { TimingChecker, type CheckOptions, type PhaseViolation } from '@core/harness/checker';
import { HarnessTimeoutError } from '@core/harness/clock';
import type { TimingProfile } from '@core/timing/types';

export interface RunResult {
  ticks: number;
  frames: number;
  reason: 'pass' | 'fail' | 'timeout';
  message?: string;
  violations: PhaseViolation[];
}

export function describeViolation(v: PhaseViolation): string {
  const where = v.line >= 0 ? `frame ${v.frame} line ${v.line}` : `frame ${v.frame}`;
  return `${where}: ${v.phase} lasted ${v.actual} ticks, expected ${v.expected}`;
}

export function runTimingCheck(profile: TimingProfile, opts: CheckOptions = {}): RunResult {
  let checker: TimingChecker | null = null;
  try {
    checker = new TimingChecker(profile, opts);
    const report = checker.run();
    if (report.violations.length === 0) {
      return { ticks: report.ticks, frames: report.frames, reason: 'pass', violations: [] };
    }
    return {
      ticks: report.ticks,
      frames: report.frames,
      reason: 'fail',
      message: describeViolation(report.violations[0]),
      violations: report.violations,
    };
  } catch (e) {
    if (!(e instanceof Error)) throw e;
    const ticks = checker ? checker.driver.ticks : 0;
    const reason = e instanceof HarnessTimeoutError ? 'timeout' : 'fail';
    return { ticks, frames: 0, reason, message: e.message, violations: [] };
  }
}
