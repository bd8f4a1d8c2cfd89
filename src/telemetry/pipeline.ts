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
 * Generation Pipeline
 *
 * options -> catalog + scenario + grid -> synthesize -> enforce -> manifest
 * -> validate -> write
 */

import { parseGenerateOptions, type GenerateOptions } from "@/lib/config";
import { ValidationFailure } from "@/lib/errors";
import { logDebug, logInfo, logWarn } from "@/lib/logger";
import { buildCatalog, type EntityCatalog } from "@/telemetry/catalog/catalog";
import { DEFAULT_GPU_SPECS, type GpuSpecRegistry } from "@/telemetry/catalog/gpu-specs";
import { enforceConsistency, type ConsistencyReport } from "@/telemetry/consistency";
import { synthesizeSignals } from "@/telemetry/generators";
import { buildManifest } from "@/telemetry/manifest";
import type { Dataset, Manifest } from "@/telemetry/schemas";
import { getScenarioProfile } from "@/telemetry/seed/scenarios";
import { TimeGrid } from "@/telemetry/time-grid";
import { validateDataset, type ValidationReport } from "@/telemetry/validator";
import { writeDataset, writeTables } from "@/telemetry/writer";

export interface SynthesisResult {
  options: GenerateOptions;
  catalog: EntityCatalog;
  grid: TimeGrid;
  dataset: Dataset;
  manifest: Manifest;
  consistency: ConsistencyReport;
  validation: ValidationReport;
}

export interface GenerationResult {
  dataset: Dataset;
  manifest: Manifest;
  consistency: ConsistencyReport;
  validation: ValidationReport;
}

/**
 * Build, enforce and validate a dataset in memory without touching disk.
 * Throws ConfigurationError for bad options and MetricRangeError for
 * unrecoverable values; validation problems are reported, not thrown.
 */
export function synthesizeDataset(
  input: unknown = {},
  registry: GpuSpecRegistry = DEFAULT_GPU_SPECS,
): SynthesisResult {
  const options = parseGenerateOptions(input);
  const catalog = buildCatalog(options.gpuCount);
  const profile = getScenarioProfile(options.scenario);
  const grid = TimeGrid.fromOptions(options);

  logInfo(
    `Synthesizing scenario=${options.scenario} seed=${options.seed} days=${options.days} ` +
      `gpus=${catalog.gpus.length} samples=${grid.length}`,
  );

  const dataset = synthesizeSignals({ runSeed: options.seed, catalog, profile, grid, registry });
  const consistency = enforceConsistency(dataset, registry);
  logDebug("Consistency pass", consistency);

  const manifest = buildManifest({ seed: options.seed, scenario: options.scenario, grid, catalog, dataset });
  const validation = validateDataset(dataset, {
    catalog,
    grid,
    registry,
    manifest,
    seed: options.seed,
    scenario: options.scenario,
  });
  if (!validation.valid) {
    logWarn(`Validation found ${validation.violations.length} violation(s)`);
  }

  return { options, catalog, grid, dataset, manifest, consistency, validation };
}

/**
 * Generate a dataset and persist it under `options.outputDir`.
 *
 * A dataset that fails validation is still written for inspection, but
 * without manifest.json, and the call rejects with ValidationFailure.
 */
export async function generateDataset(
  input: unknown = {},
  registry: GpuSpecRegistry = DEFAULT_GPU_SPECS,
): Promise<GenerationResult> {
  const { options, dataset, manifest, consistency, validation } = synthesizeDataset(input, registry);

  if (!validation.valid) {
    await writeTables(options.outputDir, dataset);
    throw new ValidationFailure(validation.violations);
  }

  await writeDataset(options.outputDir, dataset, manifest);
  logInfo(
    `Wrote ${manifest.row_counts.demand} demand, ${manifest.row_counts.capacity} capacity and ` +
      `${manifest.row_counts.nodepool_state} nodepool rows`,
  );
  return { dataset, manifest, consistency, validation };
}
