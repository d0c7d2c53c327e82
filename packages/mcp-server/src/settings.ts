/**
 * Machine setup persistence: an explicit load/save pair for settings.json.
 *
 * Loaded once at process start, saved on shutdown and whenever the machine
 * is reconfigured. A missing file means first run; an unreadable or
 * invalid one is logged and replaced by defaults.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { log } from './log.js';

// ─── Schema ─────────────────────────────────────────────────────

export const machineSetupSchema = z.object({
  units: z.enum(['metric', 'imperial']),
  rigidity_level: z.string().min(1),
  min_rpm: z.number().finite().nonnegative(),
  preferred_rpm: z.number().finite().nonnegative(),
  max_rpm: z.number().finite().positive(),
  spindle_power_kw: z.number().finite().positive().optional(),
}).refine((m) => m.max_rpm > m.min_rpm, {
  message: 'max_rpm must exceed min_rpm',
  path: ['max_rpm'],
});

export type MachineSetup = z.infer<typeof machineSetupSchema>;

export const settingsSchema = z.object({
  version: z.literal(1),
  machine: machineSetupSchema,
});

export type Settings = z.infer<typeof settingsSchema>;

export const DEFAULT_MACHINE: MachineSetup = {
  units: 'metric',
  rigidity_level: 'medium',
  min_rpm: 1000,
  preferred_rpm: 12000,
  max_rpm: 24000,
  spindle_power_kw: 2.2,
};

export function defaultSettings(): Settings {
  return { version: 1, machine: { ...DEFAULT_MACHINE } };
}

// ─── Location ───────────────────────────────────────────────────

export function settingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.FEEDSPEED_SETTINGS ?? path.join(os.homedir(), '.feedspeed', 'settings.json');
}

// ─── Load / save ────────────────────────────────────────────────

export function loadSettings(filePath: string): Settings {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      log.info({ path: filePath }, 'No settings file yet, using defaults');
    } else {
      log.warn({ path: filePath, err }, 'Unable to read settings, using defaults');
    }
    return defaultSettings();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    log.warn({ path: filePath, err }, 'Settings file is not valid JSON, using defaults');
    return defaultSettings();
  }

  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({
      path: filePath,
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    }, 'Settings file failed validation, using defaults');
    return defaultSettings();
  }
  return parsed.data;
}

export function saveSettings(filePath: string, settings: Settings): void {
  const valid = settingsSchema.parse(settings);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(valid, null, 2) + '\n', 'utf-8');
  log.debug({ path: filePath }, 'Settings saved');
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
