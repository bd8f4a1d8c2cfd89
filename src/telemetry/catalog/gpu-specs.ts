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
 * GPU Specification Registry
 *
 * Published power, memory and throughput figures per GPU model. The registry
 * is an immutable value passed to whoever needs it; nothing reads it from
 * module scope at generation time.
 */

export const GPU_MODELS = ["NVIDIA A10G", "NVIDIA A100-SXM4-40GB", "NVIDIA H100 80GB HBM3"] as const;

export type GpuModel = (typeof GPU_MODELS)[number];

export interface GpuSpec {
  maxPowerWatts: number;
  idlePowerWatts: number;
  memoryTotalMb: number;
  theoreticalTflopsFp16: number;
  achievableTflopsFp16: number;
}

export type GpuSpecRegistry = Readonly<Record<GpuModel, Readonly<GpuSpec>>>;

export const DEFAULT_GPU_SPECS: GpuSpecRegistry = Object.freeze({
  "NVIDIA A10G": Object.freeze({
    maxPowerWatts: 300,
    idlePowerWatts: 40,
    memoryTotalMb: 24_576,
    theoreticalTflopsFp16: 125,
    achievableTflopsFp16: 35,
  }),
  "NVIDIA A100-SXM4-40GB": Object.freeze({
    maxPowerWatts: 400,
    idlePowerWatts: 50,
    memoryTotalMb: 40_960,
    theoreticalTflopsFp16: 312,
    achievableTflopsFp16: 102,
  }),
  "NVIDIA H100 80GB HBM3": Object.freeze({
    maxPowerWatts: 700,
    idlePowerWatts: 70,
    memoryTotalMb: 81_920,
    theoreticalTflopsFp16: 1979,
    achievableTflopsFp16: 646,
  }),
});

export function isGpuModel(value: string): value is GpuModel {
  return (GPU_MODELS as readonly string[]).includes(value);
}

/** Look up a model by name; undefined for models the registry does not know. */
export function findGpuSpec(registry: GpuSpecRegistry, model: string): Readonly<GpuSpec> | undefined {
  return isGpuModel(model) ? registry[model] : undefined;
}
