import fs from 'node:fs';
import path from 'node:path';

export function getEnv(name: string): string | null {
  const v = process.env[name];
  return v && v.length > 0 ? v : null;
}

export function envFlag(name: string): boolean {
  return getEnv(name) === '1';
}

export function envInt(name: string, fallback: number): number {
  const raw = getEnv(name);
  if (raw && /^\d+$/.test(raw)) return parseInt(raw, 10);
  return fallback;
}

// Load KEY=VALUE pairs from a .env file without overriding what is already exported.
export function loadDotEnv(file = path.resolve('.env')): number {
  if (!fs.existsSync(file)) return 0;
  const text = fs.readFileSync(file, 'utf-8');
  let loaded = 0;
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    let val = line.slice(eq + 1).trim();
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith('\'') && val.endsWith('\''))) {
      val = val.slice(1, -1);
    }
    if (!(key in process.env)) {
      process.env[key] = val;
      loaded++;
    }
  }
  return loaded;
}
