/**
 * MCP Tool Registrations for the speeds and feeds calculator.
 *
 * Every tool returns JSON text. Errors are thrown; the SDK turns them into
 * isError results carrying the message.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  calculateSpeedsAndFeeds, validateMachiningParameters, classifyRpm, describeRpmStatus,
  defaultMaterials, defaultRigidityLevels, defaultCoatings,
  materialPreset, toMetricInputs, inToMm, mmToIn,
  type UnitSystem,
} from '@feedspeed/machining-core';
import * as registry from './registry.js';
import { saveSettings, type MachineSetup } from './settings.js';
import { log } from './log.js';

export interface ToolOptions {
  /** Where configure_machine persists the setup. Omit to keep it in memory only. */
  settingsPath?: string;
}

const unitsSchema = z.enum(['metric', 'imperial']);

function json(result: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

function requireRigidity(key: string): void {
  const levels = defaultRigidityLevels();
  if (!levels.get(key)) {
    throw new Error(`Unknown rigidity level "${key}". Available: [${levels.keys().join(', ')}]`);
  }
}

function requireCoating(key: string): void {
  const coatings = defaultCoatings();
  if (!coatings.get(key)) {
    throw new Error(`Unknown coating "${key}". Available: [${coatings.keys().join(', ')}]`);
  }
}

function machineReadback(setup: MachineSetup) {
  return {
    ...setup,
    rigidity_name: defaultRigidityLevels().get(setup.rigidity_level)?.name ?? null,
  };
}

export function registerTools(server: McpServer, options: ToolOptions = {}): void {

  // ─── Reference tables (3) ───────────────────────────────────

  server.tool(
    'list_materials',
    'List workpiece materials with specific cutting force (kc, N/mm²), recommended surface speed (SFM and SMM) and chip load (mm/tooth).',
    {},
    async () => {
      const table = defaultMaterials();
      const materials = table.keys().map((key) => ({ key, ...table.get(key) }));
      return json({ count: materials.length, materials });
    }
  );

  server.tool(
    'list_rigidity_levels',
    'List machine rigidity levels and the factor each applies to depth, width, chip load and stickout limits.',
    {},
    async () => {
      const table = defaultRigidityLevels();
      const levels = table.keys().map((key) => ({ key, ...table.get(key) }));
      return json({ count: levels.length, levels });
    }
  );

  server.tool(
    'list_coatings',
    'List tool coatings and their surface speed multipliers.',
    {},
    async () => {
      const table = defaultCoatings();
      const coatings = table.keys().map((key) => ({ key, ...table.get(key) }));
      return json({ count: coatings.length, coatings });
    }
  );

  // ─── Machine (2) ────────────────────────────────────────────

  server.tool(
    'configure_machine',
    'Set the machine setup used by later calculations: RPM limits, spindle power, rigidity level and unit system. Omitted fields keep their current value. The setup is saved across sessions.',
    {
      units: unitsSchema.optional().describe('Unit system for lengths and speeds in later calls'),
      rigidity_level: z.string().optional().describe('Rigidity level key (see list_rigidity_levels)'),
      min_rpm: z.number().nonnegative().optional().describe('Minimum spindle RPM'),
      preferred_rpm: z.number().nonnegative().optional().describe('Preferred spindle RPM'),
      max_rpm: z.number().positive().optional().describe('Maximum spindle RPM'),
      spindle_power_kw: z.number().positive().nullable().optional().describe('Spindle power in kW; null clears it'),
    },
    async (params) => {
      const current = registry.getMachineSetup();
      const next: MachineSetup = {
        units: params.units ?? current.units,
        rigidity_level: params.rigidity_level ?? current.rigidity_level,
        min_rpm: params.min_rpm ?? current.min_rpm,
        preferred_rpm: params.preferred_rpm ?? current.preferred_rpm,
        max_rpm: params.max_rpm ?? current.max_rpm,
        spindle_power_kw: params.spindle_power_kw === null
          ? undefined
          : params.spindle_power_kw ?? current.spindle_power_kw,
      };
      requireRigidity(next.rigidity_level);
      if (next.max_rpm <= next.min_rpm) {
        throw new Error(`max_rpm (${next.max_rpm}) must exceed min_rpm (${next.min_rpm})`);
      }
      const machine = registry.setMachineSetup(next);

      let savedTo: string | null = null;
      if (options.settingsPath) {
        saveSettings(options.settingsPath, { version: 1, machine });
        savedTo = options.settingsPath;
      }
      log.info({ rigidity_level: machine.rigidity_level, max_rpm: machine.max_rpm }, 'Machine reconfigured');
      return json({ type: 'machine', machine: machineReadback(machine), saved_to: savedTo });
    }
  );

  server.tool(
    'get_machine',
    'Show the current machine setup.',
    {},
    async () => json({ type: 'machine', machine: machineReadback(registry.getMachineSetup()) })
  );

  // ─── Cutters (3) ────────────────────────────────────────────

  server.tool(
    'define_cutter',
    'Define a flat end mill for later calculations. Lengths are in the current unit system unless units is given.',
    {
      diameter: z.number().positive().describe('Tool diameter (mm, or inches in imperial)'),
      flute_num: z.number().int().min(1).describe('Number of flutes'),
      tool_stickout: z.number().nonnegative().optional().describe('Unsupported length out of the holder'),
      flute_length: z.number().positive().optional().describe('Length of cut'),
      coating: z.string().optional().describe('Coating key (see list_coatings)'),
      units: unitsSchema.optional().describe('Unit system of the lengths given'),
      name: z.string().optional().describe('Cutter name/ID (letters, digits, hyphens, underscores only)'),
    },
    async (params) => {
      const units = params.units ?? registry.getMachineSetup().units;
      const toMm = (v: number) => (units === 'imperial' ? inToMm(v) : v);
      if (params.coating !== undefined) requireCoating(params.coating);
      const result = registry.createCutter({
        diameter_mm: toMm(params.diameter),
        flute_num: params.flute_num,
        tool_stickout_mm: toMm(params.tool_stickout ?? 0),
        flute_length_mm: params.flute_length !== undefined ? toMm(params.flute_length) : undefined,
        coating: params.coating,
      }, params.name);
      return json(result);
    }
  );

  server.tool(
    'list_cutters',
    'List all defined cutters.',
    {},
    async () => {
      const cutters = registry.listCutters();
      return json({ count: cutters.length, cutters });
    }
  );

  server.tool(
    'delete_cutter',
    'Remove a cutter from the session.',
    {
      cutter: z.string().describe('ID of cutter to delete'),
    },
    async ({ cutter }) => {
      registry.removeCutter(cutter);
      return json({ deleted: cutter, remaining: registry.listCutters().length });
    }
  );

  // ─── Calculation (3) ────────────────────────────────────────

  server.tool(
    'calculate_speeds_feeds',
    'Compute spindle RPM, feed rate, material removal rate, power and torque for a milling cut, with warnings for unsafe or suboptimal parameters and an RPM status against the machine limits. Surface speed, chip load and kc default from the material.',
    {
      cutter: z.string().optional().describe('ID of a defined cutter; otherwise give diameter and flute_num'),
      diameter: z.number().positive().optional().describe('Tool diameter'),
      flute_num: z.number().int().min(1).optional().describe('Number of flutes'),
      tool_stickout: z.number().nonnegative().optional().describe('Tool stickout'),
      coating: z.string().optional().describe('Coating key; defaults to the cutter coating'),
      material: z.string().optional().describe('Material key (see list_materials)'),
      doc: z.number().nonnegative().describe('Axial depth of cut'),
      woc: z.number().nonnegative().describe('Radial width of cut'),
      surface_speed: z.number().positive().optional().describe('Surface speed, SMM (metric) or SFM (imperial)'),
      feed_per_tooth: z.number().positive().optional().describe('Feed per tooth, mm or inches'),
      kc: z.number().positive().optional().describe('Specific cutting force, N/mm²'),
      hsm: z.boolean().default(false).describe('High-speed machining toolpath (enables chip thinning compensation)'),
      chip_thinning: z.boolean().default(true).describe('Account for radial chip thinning'),
      rigidity_level: z.string().optional().describe('Rigidity level key; defaults to the machine setup'),
      units: unitsSchema.optional().describe('Unit system of the lengths and speeds given; defaults to the machine setup'),
    },
    async (params) => {
      const machine = registry.getMachineSetup();
      const units: UnitSystem = params.units ?? machine.units;
      const fromMm = (v: number) => (units === 'imperial' ? mmToIn(v) : v);

      const cutter = params.cutter !== undefined ? registry.getCutter(params.cutter) : undefined;
      const diameter = params.diameter ?? (cutter ? fromMm(cutter.diameter_mm) : undefined);
      const fluteNum = params.flute_num ?? cutter?.flute_num;
      if (diameter === undefined || fluteNum === undefined) {
        throw new Error('Give a cutter ID, or both diameter and flute_num.');
      }
      const coating = params.coating ?? cutter?.coating;
      if (coating !== undefined) requireCoating(coating);
      const rigidityLevel = params.rigidity_level ?? machine.rigidity_level;
      requireRigidity(rigidityLevel);

      const preset = params.material !== undefined
        ? materialPreset(params.material, units, { coating })
        : undefined;
      if (params.material !== undefined && !preset) {
        log.warn({ material: params.material }, 'Unknown material, using supplied values only');
      }

      const surfaceSpeed = params.surface_speed ?? preset?.surface_speed;
      const feedPerTooth = params.feed_per_tooth ?? preset?.feed_per_tooth;
      const kc = params.kc ?? preset?.kc;
      if (surfaceSpeed === undefined || feedPerTooth === undefined || kc === undefined) {
        const missing = [
          surfaceSpeed === undefined ? 'surface_speed' : null,
          feedPerTooth === undefined ? 'feed_per_tooth' : null,
          kc === undefined ? 'kc' : null,
        ].filter((m) => m !== null);
        throw new Error(
          `Missing ${missing.join(', ')}. Give them explicitly or choose a known material: ` +
          `[${defaultMaterials().keys().join(', ')}]`
        );
      }

      const metric = toMetricInputs({
        diameter,
        doc: params.doc,
        woc: params.woc,
        surface_speed: surfaceSpeed,
        feed_per_tooth: feedPerTooth,
        tool_stickout: params.tool_stickout ?? (cutter ? fromMm(cutter.tool_stickout_mm) : 0),
      }, units);

      const report = calculateSpeedsAndFeeds({
        ...metric,
        flute_num: fluteNum,
        kc,
        hsm_enabled: params.hsm,
        chip_thinning_enabled: params.chip_thinning,
        rigidity_level: rigidityLevel,
        material_type: params.material,
        coating,
      }, {
        min_rpm: machine.min_rpm,
        preferred_rpm: machine.preferred_rpm,
        max_rpm: machine.max_rpm,
        spindle_power_kw: machine.spindle_power_kw,
      });

      log.debug({ rpm: report.rpm, feed: report.feed, warnings: report.warnings.length }, 'Calculated');
      return json({
        type: 'speeds_feeds',
        units,
        cutter: params.cutter ?? null,
        inputs: { ...metric, flute_num: fluteNum, kc },
        report,
      });
    }
  );

  server.tool(
    'validate_parameters',
    'Sanity-check a spindle speed and feed against the cut geometry. All lengths in mm, feed in mm/min.',
    {
      rpm: z.number().describe('Spindle speed, RPM'),
      feed: z.number().describe('Feed rate, mm/min'),
      doc: z.number().describe('Axial depth of cut, mm'),
      woc: z.number().describe('Radial width of cut, mm'),
      diameter: z.number().describe('Tool diameter, mm'),
    },
    async ({ rpm, feed, doc, woc, diameter }) => {
      const warnings = validateMachiningParameters(rpm, feed, doc, woc, diameter);
      return json({ type: 'validation', warnings });
    }
  );

  server.tool(
    'classify_rpm',
    'Classify a spindle speed against machine limits (danger / warning / good / info). Limits default to the machine setup.',
    {
      rpm: z.number().describe('Spindle speed, RPM'),
      min_rpm: z.number().optional().describe('Minimum RPM'),
      preferred_rpm: z.number().optional().describe('Preferred RPM'),
      max_rpm: z.number().optional().describe('Maximum RPM'),
    },
    async (params) => {
      const machine = registry.getMachineSetup();
      const minRpm = params.min_rpm ?? machine.min_rpm;
      const preferredRpm = params.preferred_rpm ?? machine.preferred_rpm;
      const maxRpm = params.max_rpm ?? machine.max_rpm;
      const classification = classifyRpm(params.rpm, minRpm, preferredRpm, maxRpm);
      return json({
        type: 'rpm_status',
        rpm: params.rpm,
        ...classification,
        display: describeRpmStatus(classification, minRpm, preferredRpm, maxRpm),
        limits: { min_rpm: minRpm, preferred_rpm: preferredRpm, max_rpm: maxRpm },
      });
    }
  );
}
