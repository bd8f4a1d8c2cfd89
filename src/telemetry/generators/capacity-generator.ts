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
 * Capacity Generator
 *
 * Generates per-GPU device telemetry (utilization, power, framebuffer,
 * temperature, tensor activity, PCIe traffic).
 *
 * Utilization is the primary signal: a banded diurnal trend plus smoothed
 * noise. Power and tensor activity are derived from it through the scenario's
 * decoupling factor, and framebuffer used/free are derived from a pressure
 * fraction so that they always sum to the model's memory.
 */

import { MetricRangeError } from "@/lib/errors";
import type { Gpu } from "@/telemetry/catalog/catalog";
import type { GpuSpecRegistry } from "@/telemetry/catalog/gpu-specs";
import { RandomStream, SmoothNoise } from "@/telemetry/random";
import { GPU_TEMP_RANGE_C, type CapacityRow } from "@/telemetry/schemas";
import type { ScenarioProfile } from "@/telemetry/seed/scenarios";
import type { TimeGrid } from "@/telemetry/time-grid";

import { clip, clipRounded, loadCurve, powerFraction, tensorActivity, tensorAffinity } from "./signal-shaping";

// ============================================================================
// Generator Configuration
// ============================================================================

interface NoiseScales {
  /** Utilization noise, percentage points */
  utilization: number;
  /** Static per-GPU utilization offset, percentage points */
  deviceBias: number;
  /** Power noise, fraction of dynamic range */
  power: number;
  /** Memory pressure noise, fraction of capacity */
  memory: number;
  /** Temperature noise, degrees C */
  temperature: number;
  /** Tensor activity noise, percentage points */
  tensor: number;
}

interface GeneratorConfig {
  runSeed: number;
  profile: Readonly<ScenarioProfile>;
  registry: GpuSpecRegistry;
  noise: NoiseScales;
}

const DEFAULT_NOISE: NoiseScales = {
  utilization: 5,
  deviceBias: 3,
  power: 0.02,
  memory: 0.1,
  temperature: 2,
  tensor: 3,
};

/** Share of the utilization band's half-width the diurnal curve spans */
const TREND_AMPLITUDE = 0.8;

const MEMORY_PRESSURE_RANGE = { min: 0.05, max: 0.95 } as const;
const PCIE_BASE_BYTES = { min: 100_000, max: 1_000_000 } as const;

// ============================================================================
// Generator Class
// ============================================================================

export class CapacityGenerator {
  private config: GeneratorConfig;

  constructor(config: Pick<GeneratorConfig, "runSeed" | "profile" | "registry"> & Partial<GeneratorConfig>) {
    this.config = { noise: DEFAULT_NOISE, ...config };
  }

  /**
   * Generate the full series for one GPU.
   * DETERMINISTIC: same run seed + GPU uuid always produces the same series.
   */
  generateSeries(gpu: Gpu, grid: TimeGrid): CapacityRow[] {
    const { profile, registry, noise } = this.config;
    const spec = registry[gpu.model];
    if (spec.memoryTotalMb <= 0) {
      throw new MetricRangeError("model memory must be positive", { entity: gpu.uuid, metric: "fb_total_mb" }, spec.memoryTotalMb);
    }

    const stream = RandomStream.forEntity(this.config.runSeed, gpu.uuid);
    const utilNoise = new SmoothNoise(stream);
    const powerNoise = new SmoothNoise(stream);
    const memoryNoise = new SmoothNoise(stream);
    const deviceBias = noise.deviceBias * stream.truncatedGaussian();

    const [bandLow, bandHigh] = profile.utilizationBand;
    const bandMid = (bandLow + bandHigh) / 2;
    const bandHalfWidth = (bandHigh - bandLow) / 2;
    const decoupling = profile.powerUtilizationDecoupling;
    const affinity = tensorAffinity(gpu.nodegroupId);
    const dynamicPower = spec.maxPowerWatts - spec.idlePowerWatts;

    const rows: CapacityRow[] = [];
    for (const sample of grid.samples) {
      const at = (metric: string) => ({ entity: gpu.uuid, metric, timestamp: sample.iso });

      // 1. Base trend + 2. noise
      const utilTrend = bandMid + TREND_AMPLITUDE * bandHalfWidth * loadCurve(sample.hourOfDay) + deviceBias;
      const util = clipRounded(utilTrend + noise.utilization * utilNoise.next(), 0, 100, 1, at("gpu_util_pct"));

      // 3. Coupling: power and tensor activity follow utilization
      const fraction = powerFraction(util, decoupling) + noise.power * powerNoise.next();
      const power = clipRounded(
        spec.idlePowerWatts + dynamicPower * fraction,
        spec.idlePowerWatts,
        spec.maxPowerWatts,
        2,
        at("power_usage_watts"),
      );
      const tensor = clipRounded(
        tensorActivity(util, decoupling, affinity) + noise.tensor * stream.truncatedGaussian(),
        0,
        100,
        1,
        at("tensor_active_pct"),
      );

      // 5. Conservation: used/free derived from one pressure fraction
      const pressure = clip(
        0.3 + 0.5 * (util / 100) + noise.memory * memoryNoise.next(),
        MEMORY_PRESSURE_RANGE.min,
        MEMORY_PRESSURE_RANGE.max,
        at("fb_used_mb"),
      );
      const fbUsed = Math.round(spec.memoryTotalMb * pressure);

      const temp = clipRounded(
        30 + (power / spec.maxPowerWatts) * 45 + noise.temperature * stream.truncatedGaussian(),
        GPU_TEMP_RANGE_C.min,
        GPU_TEMP_RANGE_C.max,
        1,
        at("gpu_temp_c"),
      );

      const pcieScale = (1 + util / 100) * profile.pcieIntensity;
      const rx = Math.round(stream.int(PCIE_BASE_BYTES.min, PCIE_BASE_BYTES.max) * pcieScale);
      const tx = Math.round(stream.int(PCIE_BASE_BYTES.min, PCIE_BASE_BYTES.max) * pcieScale);

      rows.push({
        gpu_uuid: gpu.uuid,
        nodegroup: gpu.nodegroupId,
        gpu_model: gpu.model,
        timestamp: sample.iso,
        gpu_util_pct: util,
        power_usage_watts: power,
        fb_used_mb: fbUsed,
        fb_free_mb: spec.memoryTotalMb - fbUsed,
        gpu_temp_c: temp,
        tensor_active_pct: tensor,
        pcie_rx_bytes_per_sec: rx,
        pcie_tx_bytes_per_sec: tx,
      });
    }
    return rows;
  }
}
