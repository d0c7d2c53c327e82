/**
 * Lookup tables for materials, machine rigidity levels and tool coatings.
 *
 * The engine only sees the LookupTable interface, so tests can pass stub
 * tables. The curated defaults ship as JSON under data/ and are schema-
 * checked once on first use.
 */

import * as fs from 'node:fs';
import { z } from 'zod';

// ─── Types ──────────────────────────────────────────────────────

export interface MaterialRecord {
  name: string;
  /** Specific cutting force, N/mm². */
  kc: number;
  /** Recommended surface speed, feet/min. */
  sfm: number;
  /** Recommended surface speed, meters/min. */
  smm: number;
  /** Recommended feed per tooth, mm. */
  chip_load_mm: number;
}

export interface RigidityRecord {
  name: string;
  /** Scaling applied to the rigid-machine limits, 0..1. */
  factor: number;
}

export interface CoatingRecord {
  name: string;
  /** Multiplier on the material's recommended surface speed. */
  speed_factor: number;
}

/** Read-only keyed provider. A miss returns undefined. */
export interface LookupTable<T> {
  get(key: string): T | undefined;
  keys(): string[];
}

export function createLookupTable<T>(entries: Readonly<Record<string, T>>): LookupTable<T> {
  const map = new Map<string, T>(Object.entries(entries));
  return {
    get: (key) => map.get(key),
    keys: () => [...map.keys()],
  };
}

// ─── Schemas ────────────────────────────────────────────────────

const positive = z.number().finite().positive();

const materialSchema = z.object({
  name: z.string().min(1),
  kc: positive,
  sfm: positive,
  smm: positive,
  chip_load_mm: positive,
});

const rigiditySchema = z.object({
  name: z.string().min(1),
  factor: positive.max(1),
});

const coatingSchema = z.object({
  name: z.string().min(1),
  speed_factor: positive,
});

// ─── Bundled defaults ───────────────────────────────────────────

function loadTable<S extends z.ZodTypeAny>(file: string, schema: S): LookupTable<z.infer<S>> {
  const url = new URL(`../data/${file}`, import.meta.url);
  const raw: unknown = JSON.parse(fs.readFileSync(url, 'utf-8'));
  const parsed = z.record(z.string(), schema).safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Malformed table data/${file} at "${issue?.path.join('.') ?? ''}": ${issue?.message ?? 'invalid'}`
    );
  }
  return createLookupTable(parsed.data);
}

let materials: LookupTable<MaterialRecord> | null = null;
let rigidity: LookupTable<RigidityRecord> | null = null;
let coatings: LookupTable<CoatingRecord> | null = null;

export function defaultMaterials(): LookupTable<MaterialRecord> {
  materials ??= loadTable('materials.json', materialSchema);
  return materials;
}

export function defaultRigidityLevels(): LookupTable<RigidityRecord> {
  rigidity ??= loadTable('rigidity.json', rigiditySchema);
  return rigidity;
}

export function defaultCoatings(): LookupTable<CoatingRecord> {
  coatings ??= loadTable('coatings.json', coatingSchema);
  return coatings;
}
