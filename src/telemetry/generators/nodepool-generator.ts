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
import type { NodepoolStateRow } from "@/telemetry/schemas";

/**
 * Nodepool inventory rows, one per nodegroup.
 *
 * Reported counts come straight from the catalog: fragmentation only lowers
 * the schedulable share inside the demand generator.
 */
export function generateNodepoolState(catalog: EntityCatalog): NodepoolStateRow[] {
  return catalog.nodegroups.map((ng) => ({
    nodegroup: ng.id,
    cluster: ng.clusterId,
    gpu_model: ng.gpuModel,
    capacity_gpu_count: ng.capacityGpuCount,
    allocatable_gpu_count: ng.allocatableGpuCount,
  }));
}
