// SPDX-FileCopyrightText: Copyright (c) 2026 NVIDIA CORPORATION. All rights reserved.
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
// http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * Efficiency Metrics
 *
 * Scalar functions deriving GPU efficiency from raw capacity signals.
 *
 * - PIF (power intensity factor): power / max power, in [0, 1]
 * - RFU (realized FLOPS utilization): realized / achievable TFLOPS, in percent
 * - Efficiency gap: utilization minus RFU; positive means busy but not productive
 */

import { MetricRangeError } from "@/lib/errors";
import { findGpuSpec, type GpuSpec, type GpuSpecRegistry } from "@/telemetry/catalog/gpu-specs";
import type { CapacityRow } from "@/telemetry/schemas";

export type EfficiencyClass = "Idle" | "Efficient" | "Bottlenecked" | "Moderate" | "Inefficient";

export const EFFICIENCY_CLASSES: readonly EfficiencyClass[] = [
  "Idle",
  "Efficient",
  "Bottlenecked",
  "Moderate",
  "Inefficient",
];

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// =============================================================================
// Scalar Metrics
// =============================================================================

export function powerIntensityFactor(powerWatts: number, spec: Pick<GpuSpec, "maxPowerWatts">): number {
  return clamp(powerWatts / spec.maxPowerWatts, 0, 1);
}

export function realizedTflops(pif: number, spec: Pick<GpuSpec, "achievableTflopsFp16">): number {
  return spec.achievableTflopsFp16 * pif;
}

/** Realized TFLOPS as a percentage of achievable, in [0, 100]. */
export function realizedTflopsUtilization(realized: number, spec: Pick<GpuSpec, "achievableTflopsFp16">): number {
  return clamp((realized / spec.achievableTflopsFp16) * 100, 0, 100);
}

export function efficiencyGap(utilizationPct: number, rfuPct: number): number {
  return utilizationPct - rfuPct;
}

/** Used share of device memory in percent; 0 when nothing is reported. */
export function memoryPressure(usedMb: number, freeMb: number): number {
  const total = usedMb + freeMb;
  return total > 0 ? (usedMb / total) * 100 : 0;
}

/**
 * Classify a sample by utilization and power intensity.
 *
 * - Idle: util < 10
 * - Efficient: util >= 70 and PIF >= 0.75
 * - Bottlenecked: util >= 70 and PIF < 0.60
 * - Moderate: util >= 40 and PIF >= 0.50
 * - Inefficient: everything else
 */
export function classifyEfficiency(utilizationPct: number, pif: number): EfficiencyClass {
  if (utilizationPct < 10) return "Idle";
  if (utilizationPct >= 70 && pif >= 0.75) return "Efficient";
  if (utilizationPct >= 70 && pif < 0.6) return "Bottlenecked";
  if (utilizationPct >= 40 && pif >= 0.5) return "Moderate";
  return "Inefficient";
}

// =============================================================================
// Per-Row Efficiency
// =============================================================================

export interface GpuEfficiency {
  pif: number;
  realizedTflops: number;
  rfuPct: number;
  efficiencyGap: number;
  memoryPressurePct: number;
  efficiencyClass: EfficiencyClass;
}

/**
 * All efficiency metrics for one capacity row.
 * Throws MetricRangeError when the row's model is not in the registry.
 */
export function gpuEfficiency(row: CapacityRow, registry: GpuSpecRegistry): GpuEfficiency {
  const spec = findGpuSpec(registry, row.gpu_model);
  if (!spec) {
    throw new MetricRangeError(
      `no spec for model '${row.gpu_model}'`,
      { entity: row.gpu_uuid, metric: "power_intensity_factor", timestamp: row.timestamp },
      row.power_usage_watts,
    );
  }
  const pif = powerIntensityFactor(row.power_usage_watts, spec);
  const realized = realizedTflops(pif, spec);
  const rfuPct = realizedTflopsUtilization(realized, spec);
  return {
    pif,
    realizedTflops: realized,
    rfuPct,
    efficiencyGap: efficiencyGap(row.gpu_util_pct, rfuPct),
    memoryPressurePct: memoryPressure(row.fb_used_mb, row.fb_free_mb),
    efficiencyClass: classifyEfficiency(row.gpu_util_pct, pif),
  };
}

// =============================================================================
// Normalization
// =============================================================================

export interface ValueRange {
  min: number;
  max: number;
}

/** Min and max of a set of values; an empty set gives [0, 0]. */
export function valueRange(values: readonly number[]): ValueRange {
  if (values.length === 0) {
    return { min: 0, max: 0 };
  }
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}

/** Min-max scale into [0, 1]. A zero-width range divides by 1. */
export function normalize(value: number, range: ValueRange): number {
  const width = range.max - range.min;
  return (value - range.min) / (width === 0 ? 1 : width);
}

export function normalizeAll(values: readonly number[]): number[] {
  const range = valueRange(values);
  return values.map((v) => normalize(v, range));
}
