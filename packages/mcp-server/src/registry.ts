/**
 * Session state: named cutters and the active machine setup.
 *
 * Every mutating MCP tool stores its result here and returns a structured
 * readback so the agent always knows the current state.
 */

import { DEFAULT_MACHINE, machineSetupSchema, type MachineSetup } from './settings.js';

// ─── Cutters ────────────────────────────────────────────────────

/** A flat end mill. Lengths are stored in mm whatever the input units. */
export interface CutterDefinition {
  diameter_mm: number;
  flute_num: number;
  tool_stickout_mm: number;
  flute_length_mm?: number;
  coating?: string;
}

export interface CutterResult {
  cutter_id: string;
  readback: {
    name: string;
    diameter_mm: number;
    flute_num: number;
    tool_stickout_mm: number;
    flute_length_mm?: number;
    coating?: string;
  };
}

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

let nextCutterId = 1;
const cutters = new Map<string, CutterDefinition>();

function readback(id: string, cutter: CutterDefinition): CutterResult {
  return {
    cutter_id: id,
    readback: {
      name: `${id} D${cutter.diameter_mm} ${cutter.flute_num}FL`,
      diameter_mm: cutter.diameter_mm,
      flute_num: cutter.flute_num,
      tool_stickout_mm: cutter.tool_stickout_mm,
      flute_length_mm: cutter.flute_length_mm,
      coating: cutter.coating,
    },
  };
}

export function createCutter(cutter: CutterDefinition, name?: string): CutterResult {
  if (name !== undefined && !NAME_PATTERN.test(name)) {
    throw new Error(`Invalid cutter name "${name}". Use only letters, digits, hyphens, underscores.`);
  }
  const id = name ?? `cutter_${nextCutterId++}`;
  if (cutters.has(id) && name) {
    throw new Error(`Cutter "${id}" already exists. Use a different name or delete the existing cutter.`);
  }
  if (cutters.has(id)) {
    // Auto ID already taken by a named cutter
    return createCutter(cutter);
  }
  cutters.set(id, { ...cutter });
  return readback(id, cutter);
}

export function getCutter(id: string): CutterDefinition {
  const cutter = cutters.get(id);
  if (!cutter) {
    const available = [...cutters.keys()];
    throw new Error(`Cutter "${id}" not found. Available cutters: [${available.join(', ')}]`);
  }
  return { ...cutter };
}

export function removeCutter(id: string): void {
  if (!cutters.delete(id)) {
    throw new Error(`Cutter "${id}" not found, cannot delete.`);
  }
}

export function listCutters(): CutterResult[] {
  return [...cutters.entries()].map(([id, cutter]) => readback(id, cutter));
}

// ─── Machine setup ──────────────────────────────────────────────

let machine: MachineSetup = { ...DEFAULT_MACHINE };

export function getMachineSetup(): MachineSetup {
  return { ...machine };
}

export function setMachineSetup(setup: MachineSetup): MachineSetup {
  machine = machineSetupSchema.parse(setup);
  return getMachineSetup();
}

/** Reset cutters and machine setup (for testing). */
export function clear(): void {
  cutters.clear();
  nextCutterId = 1;
  machine = { ...DEFAULT_MACHINE };
}
