#!/usr/bin/env node
/* eslint-disable no-console */
import { runTimingCheck } from '@core/harness/headless'
import { getProfile, DEFAULT_PROFILE_NAME, UnknownProfileError, profileNames } from '@core/timing/profile'
import type { TimingProfile } from '@core/timing/types'
import { getEnv, loadDotEnv } from '@utils/env'

function usage(): never {
  console.error(`Usage: tsx scripts/check-timing.ts [--profile=<${profileNames().join('|')}>] [--frames=<n>]`)
  process.exit(2)
}

function parseArgs() {
  const argv = process.argv.slice(2)
  let profile = getEnv('TIMING_PROFILE') || DEFAULT_PROFILE_NAME
  let frames = parseInt(getEnv('TIMING_FRAMES') || '3', 10)
  for (const a of argv) {
    if (a.startsWith('--profile=')) profile = a.slice(10)
    else if (a.startsWith('--frames=')) frames = parseInt(a.slice(9), 10)
    else if (a === '--help' || a === '-h') usage()
    else { console.error(`Unknown argument: ${a}`); usage() }
  }
  if (!Number.isFinite(frames) || frames <= 0) usage()
  return { profile, frames }
}

function loadProfile(name: string): TimingProfile {
  try {
    return getProfile(name)
  } catch (e) {
    if (e instanceof UnknownProfileError) { console.error(e.message); process.exit(2) }
    throw e
  }
}

function main() {
  loadDotEnv()
  const args = parseArgs()
  const profile = loadProfile(args.profile)
  const t0 = Date.now()
  const res = runTimingCheck(profile, { frames: args.frames })
  console.log(JSON.stringify({
    profile: args.profile,
    frames: res.frames,
    ticks: res.ticks,
    reason: res.reason,
    message: res.message,
    violations: res.violations.length,
    ms: Date.now() - t0,
  }))
  process.exit(res.reason === 'pass' ? 0 : 1)
}

main()
