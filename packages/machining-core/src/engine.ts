/**
 * Calculation Engine — spindle speed, feed, MRR and power from cutting inputs.
 *
 *   const fs = new FeedsAndSpeeds();
 *   fs.diameter = 10; fs.flute_num = 3; fs.smm = 300; fs.mmpt = 0.05; ...
 *   const warnings = fs.compute();
 *   fs.rpm, fs.feed
 *
 * Inputs are plain public fields, overwritten by the caller before each
 * compute(). Every compute() derives the outputs from scratch; a failed
 * compute() leaves no readable output behind.
 *
 * Units are metric throughout: mm, m/min, mm/tooth, N/mm², kW.
 */

import { chipThinningCompensation, chipThinningFactor, FULL_CHIP_ENGAGEMENT } from './chip-thinning.js';
import { InvalidConfigError, InvalidGeometryError, InvalidInputError } from './errors.js';
import { fmt, pct } from './format.js';
import { cuttingPowerKw, spindleTorqueNm } from './power.js';
import {
  defaultCoatings, defaultMaterials, defaultRigidityLevels,
  type CoatingRecord, type LookupTable, type MaterialRecord, type RigidityRecord,
} from './tables.js';

// ─── Config ─────────────────────────────────────────────────────

export interface EngineConfig {
  /** Upper bound on the chip thinning feed multiplier. */
  max_chip_thinning_compensation?: number;
  /** Cutting power / spindle power. */
  spindle_efficiency?: number;
  /** Fraction of spindle capacity above which a load warning is raised. */
  spindle_load_warning?: number;
  /** Rigid-machine (factor 1) limits, as multiples of tool diameter. */
  max_doc_ratio?: number;
  max_woc_ratio?: number;
  max_chip_load_ratio?: number;
  max_stickout_ratio?: number;
  /** Stickout (× diameter) above which HSM runs are flagged. */
  hsm_stickout_ratio?: number;
  /** Material envelope, as multiples of the table recommendation. */
  speed_low?: number;
  speed_high?: number;
  chip_load_low?: number;
  chip_load_high?: number;
}

export function resolveEngineConfig(config?: EngineConfig) {
  const cfg = {
    max_chip_thinning_compensation: config?.max_chip_thinning_compensation ?? 4,
    spindle_efficiency: config?.spindle_efficiency ?? 0.8,
    spindle_load_warning: config?.spindle_load_warning ?? 0.8,
    max_doc_ratio: config?.max_doc_ratio ?? 2,
    max_woc_ratio: config?.max_woc_ratio ?? 1,
    max_chip_load_ratio: config?.max_chip_load_ratio ?? 0.02,
    max_stickout_ratio: config?.max_stickout_ratio ?? 5,
    hsm_stickout_ratio: config?.hsm_stickout_ratio ?? 4,
    speed_low: config?.speed_low ?? 0.5,
    speed_high: config?.speed_high ?? 1.5,
    chip_load_low: config?.chip_load_low ?? 0.5,
    chip_load_high: config?.chip_load_high ?? 2,
  };

  for (const [key, value] of Object.entries(cfg)) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`Engine config ${key} must be a positive number, got ${value}`);
    }
  }
  if (cfg.max_chip_thinning_compensation < 1) {
    throw new Error(
      `Engine config max_chip_thinning_compensation must be at least 1, got ${cfg.max_chip_thinning_compensation}`
    );
  }
  if (cfg.spindle_efficiency > 1) {
    throw new Error(`Engine config spindle_efficiency must be at most 1, got ${cfg.spindle_efficiency}`);
  }
  if (cfg.speed_low >= cfg.speed_high || cfg.chip_load_low >= cfg.chip_load_high) {
    throw new Error('Engine config material envelope bounds must satisfy low < high');
  }

  return cfg;
}

export type ResolvedEngineConfig = ReturnType<typeof resolveEngineConfig>;

// ─── Types ──────────────────────────────────────────────────────

export interface EngineOptions {
  materials?: LookupTable<MaterialRecord>;
  rigidity?: LookupTable<RigidityRecord>;
  coatings?: LookupTable<CoatingRecord>;
  config?: EngineConfig;
}

export interface CalculationResult {
  rpm: number;
  /** mm/min */
  feed: number;
  /** Commanded feed per tooth after chip thinning compensation, mm. */
  effective_mmpt: number;
  /** Multiplier applied to mmpt; 1 when no compensation. */
  chip_thinning_factor: number;
  /** woc / diameter */
  radial_engagement: number;
  /** mm³/min */
  mrr: number;
  power_kw: number;
  /** Power drawn at the spindle motor. */
  spindle_power_kw: number;
  torque_nm: number;
  warnings: string[];
  config_issues: InvalidConfigError[];
}

// ─── Engine ─────────────────────────────────────────────────────

export class FeedsAndSpeeds {
  diameter = 0;
  flute_num = 0;
  doc = 0;
  woc = 0;
  smm = 0;
  mmpt = 0;
  kc = 0;
  hsm_enabled = false;
  chip_thinning_enabled = false;
  tool_stickout = 0;
  rigidity_level = 'medium';
  material_type: string | undefined = undefined;
  coating: string | undefined = undefined;
  /** Spindle capacity in kW, when known. */
  spindle_power: number | undefined = undefined;

  private readonly cfg: ResolvedEngineConfig;
  private readonly materials: LookupTable<MaterialRecord>;
  private readonly rigidity: LookupTable<RigidityRecord>;
  private readonly coatings: LookupTable<CoatingRecord>;
  private output: CalculationResult | null = null;

  constructor(options: EngineOptions = {}) {
    this.cfg = resolveEngineConfig(options.config);
    this.materials = options.materials ?? defaultMaterials();
    this.rigidity = options.rigidity ?? defaultRigidityLevels();
    this.coatings = options.coatings ?? defaultCoatings();
  }

  /**
   * Derive all outputs from the current inputs.
   * Returns the advisory warnings in step order (possibly empty).
   * Throws InvalidInputError / InvalidGeometryError on unusable inputs.
   */
  compute(): string[] {
    this.output = null;
    this.checkInputs();

    const warnings: string[] = [];
    const configIssues: InvalidConfigError[] = [];
    const cfg = this.cfg;

    const rpm = (this.smm * 1000) / (Math.PI * this.diameter);
    requireFiniteOutput('spindle speed', rpm, Number.isFinite(this.smm * 1000) ? 'diameter' : 'smm', this);
    const engagement = this.woc / this.diameter;
    const multiplier = this.chipThinning(engagement, warnings);
    const effectiveMmpt = this.mmpt * multiplier;
    const feed = rpm * this.flute_num * effectiveMmpt;
    requireFiniteOutput('feed rate', feed, 'mmpt', this);

    const mrr = this.doc * this.woc * feed;
    requireFiniteOutput('material removal rate', mrr, 'doc', this);
    const powerKw = cuttingPowerKw(mrr, this.kc);
    const spindlePowerKw = powerKw / cfg.spindle_efficiency;
    requireFiniteOutput('spindle power', spindlePowerKw, 'kc', this);
    const torqueNm = spindleTorqueNm(spindlePowerKw, rpm);
    this.checkSpindleLoad(spindlePowerKw, warnings);

    const rigidity = this.rigidity.get(this.rigidity_level);
    if (rigidity) {
      this.checkRigidity(rigidity, warnings);
    } else {
      const issue = new InvalidConfigError('rigidity level', this.rigidity_level, this.rigidity.keys());
      configIssues.push(issue);
      warnings.push(`${issue.message}; rigidity checks skipped`);
    }

    this.checkHsm(engagement, warnings);
    this.checkMaterial(configIssues, warnings);

    this.output = {
      rpm,
      feed,
      effective_mmpt: effectiveMmpt,
      chip_thinning_factor: multiplier,
      radial_engagement: engagement,
      mrr,
      power_kw: powerKw,
      spindle_power_kw: spindlePowerKw,
      torque_nm: torqueNm,
      warnings,
      config_issues: configIssues,
    };
    return [...warnings];
  }

  // ─── Outputs ──────────────────────────────────────────────────

  /** Snapshot of the last successful compute(). */
  get result(): CalculationResult {
    if (!this.output) {
      throw new Error('No calculation result. Call compute() with valid inputs first.');
    }
    return { ...this.output, warnings: [...this.output.warnings], config_issues: [...this.output.config_issues] };
  }

  get rpm(): number { return this.result.rpm; }
  get feed(): number { return this.result.feed; }
  get effective_mmpt(): number { return this.result.effective_mmpt; }
  get mrr(): number { return this.result.mrr; }
  get power_kw(): number { return this.result.power_kw; }
  get torque_nm(): number { return this.result.torque_nm; }

  // ─── Steps ────────────────────────────────────────────────────

  private checkInputs(): void {
    requirePositive('diameter', this.diameter);
    if (!Number.isInteger(this.flute_num) || this.flute_num < 1) {
      throw new InvalidInputError('flute_num', this.flute_num, 'must be an integer of at least 1');
    }
    requirePositive('smm', this.smm);
    requirePositive('mmpt', this.mmpt);
    requirePositive('kc', this.kc);
    requireNonNegative('doc', this.doc);
    requireNonNegative('woc', this.woc);
    requireNonNegative('tool_stickout', this.tool_stickout);
    if (this.spindle_power !== undefined) {
      requirePositive('spindle_power', this.spindle_power);
    }
    if (this.woc > this.diameter) {
      throw new InvalidGeometryError(
        `Width of cut ${this.woc} mm exceeds tool diameter ${this.diameter} mm`
      );
    }
  }

  /** Returns the feed-per-tooth multiplier for this engagement. */
  private chipThinning(engagement: number, warnings: string[]): number {
    if (!this.chip_thinning_enabled || engagement >= FULL_CHIP_ENGAGEMENT) return 1;

    if (!this.hsm_enabled) {
      const thin = chipThinningFactor(engagement);
      warnings.push(
        `Reduced radial engagement (${pct(engagement)}% of diameter) produces thin chips: ` +
        `actual chip load is ${pct(thin)}% of feed per tooth. Enable HSM to compensate feed.`
      );
      return 1;
    }

    const cap = this.cfg.max_chip_thinning_compensation;
    const { multiplier, capped } = chipThinningCompensation(engagement, cap);
    if (capped) {
      warnings.push(
        engagement <= 0
          ? `Width of cut is 0 mm: no radial engagement, chip thinning compensation capped at ${fmt(cap)}×`
          : `Radial engagement ${pct(engagement)}% needs ${fmt(1 / chipThinningFactor(engagement))}× ` +
            `chip thinning compensation; capped at ${fmt(cap)}×`
      );
    }
    return multiplier;
  }

  private checkSpindleLoad(requiredKw: number, warnings: string[]): void {
    const capacity = this.spindle_power;
    if (capacity === undefined) return;
    if (requiredKw > capacity) {
      warnings.push(
        `Required spindle power ${fmt(requiredKw)} kW exceeds spindle capacity ${fmt(capacity)} kW`
      );
    } else if (requiredKw > capacity * this.cfg.spindle_load_warning) {
      warnings.push(
        `Required spindle power ${fmt(requiredKw)} kW is ${pct(requiredKw / capacity)}% ` +
        `of spindle capacity ${fmt(capacity)} kW`
      );
    }
  }

  /**
   * Advises only: outputs are never scaled back to fit the machine.
   * Judged on the nominal chip load, which chip thinning compensation preserves.
   */
  private checkRigidity(level: RigidityRecord, warnings: string[]): void {
    const cfg = this.cfg;
    const d = this.diameter;
    const f = level.factor;
    const limits: [string, number, number, string][] = [
      ['Depth of cut', this.doc, f * cfg.max_doc_ratio * d, 'mm'],
      ['Width of cut', this.woc, f * cfg.max_woc_ratio * d, 'mm'],
      ['Chip load', this.mmpt, f * cfg.max_chip_load_ratio * d, 'mm/tooth'],
      ['Tool stickout', this.tool_stickout, f * cfg.max_stickout_ratio * d, 'mm'],
    ];
    for (const [label, value, limit, unit] of limits) {
      if (value > limit) {
        warnings.push(
          `${label} ${fmt(value, 3)} ${unit} exceeds ${fmt(limit, 3)} ${unit} recommended for ${level.name} rigidity`
        );
      }
    }
  }

  private checkHsm(engagement: number, warnings: string[]): void {
    if (!this.hsm_enabled) return;
    if (engagement >= FULL_CHIP_ENGAGEMENT) {
      warnings.push(
        `HSM enabled at ${pct(engagement)}% radial engagement: HSM toolpaths expect engagement below ` +
        `${pct(FULL_CHIP_ENGAGEMENT)}%`
      );
    }
    const stickoutRatio = this.tool_stickout / this.diameter;
    if (stickoutRatio > this.cfg.hsm_stickout_ratio) {
      warnings.push(
        `Tool stickout ${fmt(this.tool_stickout)} mm is ${fmt(stickoutRatio, 1)}×D: ` +
        `long tools chatter at HSM speeds, shorten the stickout or reduce engagement`
      );
    }
  }

  private checkMaterial(
    configIssues: InvalidConfigError[],
    warnings: string[],
  ): void {
    if (this.material_type === undefined) return;
    const material = this.materials.get(this.material_type);
    if (!material) return;

    let speedFactor = 1;
    if (this.coating !== undefined) {
      const coating = this.coatings.get(this.coating);
      if (coating) {
        speedFactor = coating.speed_factor;
      } else {
        const issue = new InvalidConfigError('coating', this.coating, this.coatings.keys());
        configIssues.push(issue);
        warnings.push(`${issue.message}; using uncoated surface speed`);
      }
    }

    const cfg = this.cfg;
    const recommendedSmm = material.smm * speedFactor;
    const smmLow = recommendedSmm * cfg.speed_low;
    const smmHigh = recommendedSmm * cfg.speed_high;
    if (this.smm < smmLow || this.smm > smmHigh) {
      warnings.push(
        `Surface speed ${fmt(this.smm, 1)} m/min is ${this.smm < smmLow ? 'below' : 'above'} ` +
        `the recommended ${fmt(smmLow, 1)} to ${fmt(smmHigh, 1)} m/min for ${material.name}`
      );
    }

    const chipLow = material.chip_load_mm * cfg.chip_load_low;
    const chipHigh = material.chip_load_mm * cfg.chip_load_high;
    if (this.mmpt < chipLow || this.mmpt > chipHigh) {
      warnings.push(
        `Chip load ${fmt(this.mmpt, 3)} mm/tooth is ${this.mmpt < chipLow ? 'below' : 'above'} ` +
        `the recommended ${fmt(chipLow, 3)} to ${fmt(chipHigh, 3)} mm/tooth for ${material.name}`
      );
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────────

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(field, value, 'must be a positive finite number');
  }
}

type InputField = 'diameter' | 'smm' | 'mmpt' | 'doc' | 'kc';

/** A derived value overflowed: blame the input that drove it there. */
function requireFiniteOutput(
  output: string,
  value: number,
  field: InputField,
  inputs: Record<InputField, number>,
): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(field, inputs[field], `drives the ${output} out of finite range`);
  }
}

function requireNonNegative(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(field, value, 'must be a non-negative finite number');
  }
}
