/**
 * Parameter Validator: sanity bounds on computed speeds and feeds.
 *
 * Independent of the engine's reasoning: it only sees the final rpm/feed
 * and the cut geometry. Any finite number is checkable and produces
 * warnings; only NaN and ±Infinity are rejected.
 */

import { InvalidInputError } from './errors.js';
import { fmt, pct, thousands } from './format.js';

export interface ValidationConfig {
  /** Spindle speed above which a warning is raised. */
  max_rpm?: number;
  /** woc/D at or below which the tool is considered to be rubbing. */
  near_zero_engagement?: number;
  /** woc/D at or above which the cut is treated as a full slot. */
  full_slot_engagement?: number;
  /** doc/D above which tool deflection becomes a risk. */
  deflection_doc_ratio?: number;
  /** Feed (mm/min) per mm of tool diameter considered implausible. */
  max_feed_per_diameter?: number;
}

function resolveConfig(config?: ValidationConfig) {
  return {
    max_rpm: config?.max_rpm ?? 60000,
    near_zero_engagement: config?.near_zero_engagement ?? 0.02,
    full_slot_engagement: config?.full_slot_engagement ?? 0.98,
    deflection_doc_ratio: config?.deflection_doc_ratio ?? 3,
    max_feed_per_diameter: config?.max_feed_per_diameter ?? 1000,
  };
}

export function validateMachiningParameters(
  rpm: number,
  feed: number,
  doc: number,
  woc: number,
  diameter: number,
  config?: ValidationConfig,
): string[] {
  const args: [string, number][] = [['rpm', rpm], ['feed', feed], ['doc', doc], ['woc', woc], ['diameter', diameter]];
  for (const [name, value] of args) {
    if (!Number.isFinite(value)) {
      throw new InvalidInputError(name, value, 'must be a finite number');
    }
  }

  const cfg = resolveConfig(config);
  const warnings: string[] = [];

  if (rpm <= 0) {
    warnings.push(`Spindle speed ${fmt(rpm)} RPM is not positive`);
  } else if (rpm > cfg.max_rpm) {
    warnings.push(`Spindle speed ${thousands(rpm)} RPM exceeds ${thousands(cfg.max_rpm)} RPM, beyond typical spindles`);
  }
  if (feed <= 0) {
    warnings.push(`Feed rate ${fmt(feed)} mm/min is not positive`);
  }
  if (doc < 0) {
    warnings.push(`Depth of cut ${fmt(doc)} mm is negative`);
  }
  if (woc < 0) {
    warnings.push(`Width of cut ${fmt(woc)} mm is negative`);
  }

  if (diameter <= 0) {
    warnings.push(`Tool diameter ${fmt(diameter)} mm is not positive; diameter checks skipped`);
    return warnings;
  }

  const engagement = woc / diameter;
  if (woc >= 0 && engagement <= cfg.near_zero_engagement) {
    warnings.push(
      `Width of cut ${fmt(woc, 3)} mm is ${pct(engagement)}% of diameter: ` +
      `the tool rubs instead of cutting and wears quickly`
    );
  } else if (engagement >= cfg.full_slot_engagement) {
    warnings.push(
      `Width of cut ${fmt(woc, 3)} mm is ${pct(engagement)}% of diameter (full slot): ` +
      `chip evacuation and heat limit the cut, reduce depth of cut`
    );
  }

  const docLimit = cfg.deflection_doc_ratio * diameter;
  if (doc > docLimit) {
    warnings.push(
      `Depth of cut ${fmt(doc, 3)} mm exceeds ${fmt(cfg.deflection_doc_ratio)}×D (${fmt(docLimit, 3)} mm): ` +
      `high tool deflection risk`
    );
  }

  const feedLimit = cfg.max_feed_per_diameter * diameter;
  if (feed > feedLimit) {
    warnings.push(
      `Feed rate ${thousands(feed)} mm/min is implausibly high for a ${fmt(diameter, 3)} mm tool ` +
      `(limit ${thousands(feedLimit)} mm/min)`
    );
  }

  return warnings;
}
