#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { TimingGenerator } from '@core/timing/generator'
import { getProfile, DEFAULT_PROFILE_NAME } from '@core/timing/profile'
import { alignToFrameStart, captureFrame } from '@core/harness/capture'
import { encodeTimingMap } from '@utils/timingMap'
import { crcHex } from '@utils/crc32'
import { getEnv, loadDotEnv } from '@utils/env'

function main() {
  loadDotEnv()
  let name = getEnv('TIMING_PROFILE') || DEFAULT_PROFILE_NAME
  let out = ''
  for (const a of process.argv.slice(2)) {
    if (a.startsWith('--profile=')) name = a.slice(10)
    else if (a.startsWith('--out=')) out = a.slice(6)
  }
  if (!out) out = path.resolve(`timing-${name}.png`)
  const gen = new TimingGenerator(getProfile(name))
  gen.reset()
  alignToFrameStart(gen)
  const cap = captureFrame(gen)
  fs.writeFileSync(out, encodeTimingMap(cap))
  console.log(JSON.stringify({ profile: name, out, width: cap.width, height: cap.height, crc: crcHex(cap.crc), ...cap.stats }))
}

try {
  main()
} catch (e) {
  console.error(e instanceof Error ? e.message : e)
  process.exit(1)
}
