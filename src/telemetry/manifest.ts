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

import type { EntityCatalog } from "@/telemetry/catalog/catalog";
import type { Dataset, Manifest } from "@/telemetry/schemas";
import type { ScenarioName } from "@/telemetry/seed/scenarios";
import type { TimeGrid } from "@/telemetry/time-grid";

/**
 * Run-level record for reproducing or auditing a dataset.
 * Holds no wall-clock time, so identical inputs give an identical manifest.
 */
export function buildManifest(run: {
  seed: number;
  scenario: ScenarioName;
  grid: TimeGrid;
  catalog: EntityCatalog;
  dataset: Dataset;
}): Manifest {
  return {
    seed: run.seed,
    scenario: run.scenario,
    start_time: run.grid.start.iso,
    end_time: run.grid.end.iso,
    step_seconds: run.grid.stepSeconds,
    days: run.grid.days,
    gpu_count: run.catalog.gpus.length,
    row_counts: {
      demand: run.dataset.demand.length,
      capacity: run.dataset.capacity.length,
      nodepool_state: run.dataset.nodepoolState.length,
    },
    catalog_fingerprint: run.catalog.fingerprint(),
  };
}
