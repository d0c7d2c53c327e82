/**
 * Report composition. One calculate → validate → classify pass.
 *
 * Builds a fresh engine per call, so concurrent callers never share
 * engine state. Warnings are engine warnings followed by validator
 * warnings, complete and untruncated.
 */

import { FeedsAndSpeeds, type CalculationResult, type EngineOptions } from './engine.js';
import { InvalidInputError } from './errors.js';
import { KW_TO_HP } from './power.js';
import { classifyRpm, describeRpmStatus, type RpmStatus, type RpmMessage } from './rpm-status.js';
import { defaultCoatings, defaultMaterials, defaultRigidityLevels } from './tables.js';
import { MM_TO_IN, smmToSfm } from './units.js';
import { validateMachiningParameters, type ValidationConfig } from './validation.js';

// ─── Types ──────────────────────────────────────────────────────

export interface MachineLimits {
  min_rpm: number;
  preferred_rpm: number;
  max_rpm: number;
  /** Spindle capacity, kW. */
  spindle_power_kw?: number;
}

/** Metric engine inputs, as the caller has them after unit conversion. */
export interface CuttingRequest {
  diameter: number;
  flute_num: number;
  doc: number;
  woc: number;
  smm: number;
  mmpt: number;
  kc: number;
  hsm_enabled?: boolean;
  chip_thinning_enabled?: boolean;
  tool_stickout?: number;
  rigidity_level: string;
  material_type?: string;
  coating?: string;
}

export interface ReportOptions extends EngineOptions {
  validation?: ValidationConfig;
}

export interface SpeedsAndFeedsReport extends Omit<CalculationResult, 'config_issues'> {
  rpm_status: RpmStatus;
  rpm_message: RpmMessage;
  /** Message with the relevant limit, for display. */
  rpm_display: string;
  /** Engine warnings followed by validator warnings. */
  warnings: string[];
  config_issues: string[];
  rigidity_name: string | null;
  material_name: string | null;
  coating_name: string | null;
  /** Imperial companions. */
  sfm: number;
  feed_ipm: number;
  ipt: number;
  power_hp: number;
}

// ─── Machine limits ─────────────────────────────────────────────

export function checkMachineLimits(machine: MachineLimits): void {
  const fields: [string, number][] = [
    ['min_rpm', machine.min_rpm],
    ['preferred_rpm', machine.preferred_rpm],
    ['max_rpm', machine.max_rpm],
  ];
  for (const [name, value] of fields) {
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidInputError(name, value, 'must be a non-negative finite number');
    }
  }
  if (machine.max_rpm <= machine.min_rpm) {
    throw new InvalidInputError('max_rpm', machine.max_rpm, `must exceed min_rpm ${machine.min_rpm}`);
  }
  if (machine.spindle_power_kw !== undefined &&
      (!Number.isFinite(machine.spindle_power_kw) || machine.spindle_power_kw <= 0)) {
    throw new InvalidInputError('spindle_power_kw', machine.spindle_power_kw, 'must be a positive finite number');
  }
}

// ─── Report ─────────────────────────────────────────────────────

export function calculateSpeedsAndFeeds(
  request: CuttingRequest,
  machine: MachineLimits,
  options: ReportOptions = {},
): SpeedsAndFeedsReport {
  checkMachineLimits(machine);

  const materials = options.materials ?? defaultMaterials();
  const rigidity = options.rigidity ?? defaultRigidityLevels();
  const coatings = options.coatings ?? defaultCoatings();

  const fs = new FeedsAndSpeeds({ materials, rigidity, coatings, config: options.config });
  fs.diameter = request.diameter;
  fs.flute_num = request.flute_num;
  fs.doc = request.doc;
  fs.woc = request.woc;
  fs.smm = request.smm;
  fs.mmpt = request.mmpt;
  fs.kc = request.kc;
  fs.hsm_enabled = request.hsm_enabled ?? false;
  fs.chip_thinning_enabled = request.chip_thinning_enabled ?? false;
  fs.tool_stickout = request.tool_stickout ?? 0;
  fs.rigidity_level = request.rigidity_level;
  fs.material_type = request.material_type;
  fs.coating = request.coating;
  fs.spindle_power = machine.spindle_power_kw;

  const calculationWarnings = fs.compute();
  const result = fs.result;
  const validationWarnings = validateMachiningParameters(
    result.rpm, result.feed, request.doc, request.woc, request.diameter, options.validation,
  );

  const status = classifyRpm(result.rpm, machine.min_rpm, machine.preferred_rpm, machine.max_rpm);

  return {
    ...result,
    warnings: [...calculationWarnings, ...validationWarnings],
    config_issues: result.config_issues.map((issue) => issue.message),
    rpm_status: status.status,
    rpm_message: status.message,
    rpm_display: describeRpmStatus(status, machine.min_rpm, machine.preferred_rpm, machine.max_rpm),
    rigidity_name: rigidity.get(request.rigidity_level)?.name ?? null,
    material_name: request.material_type !== undefined ? materials.get(request.material_type)?.name ?? null : null,
    coating_name: request.coating !== undefined ? coatings.get(request.coating)?.name ?? null : null,
    sfm: smmToSfm(request.smm),
    feed_ipm: result.feed * MM_TO_IN,
    ipt: result.effective_mmpt * MM_TO_IN,
    power_hp: result.spindle_power_kw * KW_TO_HP,
  };
}
