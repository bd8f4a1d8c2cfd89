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
 * Public API: dataset generation plus the derived-metric layer.
 */

export * from "./lib/config";
export * from "./lib/errors";

export { buildCatalog, distributeGpus, EntityCatalog } from "./telemetry/catalog/catalog";
export type { Cluster, Gpu, Namespace, Nodegroup, Queue } from "./telemetry/catalog/catalog";
export { DEFAULT_GPU_SPECS, GPU_MODELS, findGpuSpec } from "./telemetry/catalog/gpu-specs";
export type { GpuModel, GpuSpec, GpuSpecRegistry } from "./telemetry/catalog/gpu-specs";
export { getScenarioProfile, listScenarios, SCENARIO_NAMES } from "./telemetry/seed/scenarios";
export type { ScenarioName, ScenarioProfile } from "./telemetry/seed/scenarios";
export { TimeGrid } from "./telemetry/time-grid";
export type { TimeSample } from "./telemetry/time-grid";
export * from "./telemetry/schemas";
export { synthesizeSignals } from "./telemetry/generators";
export type { SynthesisInputs } from "./telemetry/generators";
export { enforceConsistency } from "./telemetry/consistency";
export type { ConsistencyOptions, ConsistencyReport } from "./telemetry/consistency";
export { assertValid, validateDataset } from "./telemetry/validator";
export type { ValidationContext, ValidationReport } from "./telemetry/validator";
export { buildManifest } from "./telemetry/manifest";
export { OUTPUT_FILES, writeDataset, writeTables } from "./telemetry/writer";
export { generateDataset, synthesizeDataset } from "./telemetry/pipeline";
export type { GenerationResult, SynthesisResult } from "./telemetry/pipeline";

export * from "./analysis/metrics";
export * from "./analysis/imbalance";
export * from "./analysis/aggregations";
