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
 * Signal Synthesizer
 *
 * Runs the per-entity generators over the whole catalog in a fixed order:
 * queues in catalog order, then GPUs in catalog order, timestamps ascending
 * within each entity. Every entity draws from its own seeded stream, so the
 * order only fixes row layout, never values.
 */

import { logDebug } from "@/lib/logger";
import type { EntityCatalog } from "@/telemetry/catalog/catalog";
import type { GpuSpecRegistry } from "@/telemetry/catalog/gpu-specs";
import type { Dataset } from "@/telemetry/schemas";
import type { ScenarioProfile } from "@/telemetry/seed/scenarios";
import type { TimeGrid } from "@/telemetry/time-grid";

import { CapacityGenerator } from "./capacity-generator";
import { DemandGenerator } from "./demand-generator";
import { generateNodepoolState } from "./nodepool-generator";

export interface SynthesisInputs {
  runSeed: number;
  catalog: EntityCatalog;
  profile: Readonly<ScenarioProfile>;
  grid: TimeGrid;
  registry: GpuSpecRegistry;
}

export function synthesizeSignals({ runSeed, catalog, profile, grid, registry }: SynthesisInputs): Dataset {
  const demandGenerator = new DemandGenerator({ runSeed, profile });
  const capacityGenerator = new CapacityGenerator({ runSeed, profile, registry });

  const demand = catalog.queues.flatMap((queue) => demandGenerator.generateSeries(queue, catalog, grid));
  logDebug(`Synthesized ${demand.length} demand rows for ${catalog.queues.length} queues`);

  const capacity = catalog.gpus.flatMap((gpu) => capacityGenerator.generateSeries(gpu, grid));
  logDebug(`Synthesized ${capacity.length} capacity rows for ${catalog.gpus.length} GPUs`);

  return {
    demand,
    capacity,
    nodepoolState: generateNodepoolState(catalog),
  };
}
