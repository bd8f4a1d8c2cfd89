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
 * Table Schemas
 *
 * Row shapes for the persisted tables. Field names are the CSV column names,
 * and the column arrays fix their order on disk.
 */

import { z } from "zod";

import { SCENARIO_NAMES } from "@/telemetry/seed/scenarios";

const count = z.number().int().nonnegative();
const isoTimestamp = z.string().datetime();

// =============================================================================
// Demand
// =============================================================================

export const DemandRowSchema = z.object({
  queue_id: z.string().min(1),
  namespace: z.string().min(1),
  nodegroup: z.string().min(1),
  timestamp: isoTimestamp,
  pending_workloads: count,
  admission_wait_time_seconds: z.number().nonnegative(),
  admitted_active_workloads: count,
  admitted_workloads_total: count,
  evicted_workloads_total: count,
  resource_usage: count,
  resource_reservation: count,
});

export type DemandRow = z.infer<typeof DemandRowSchema>;

export const DEMAND_COLUMNS = [
  "queue_id",
  "namespace",
  "nodegroup",
  "timestamp",
  "pending_workloads",
  "admission_wait_time_seconds",
  "admitted_active_workloads",
  "admitted_workloads_total",
  "evicted_workloads_total",
  "resource_usage",
  "resource_reservation",
] as const satisfies readonly (keyof DemandRow)[];

// =============================================================================
// Capacity
// =============================================================================

/** Plausible device temperature, degrees C */
export const GPU_TEMP_RANGE_C = { min: 25, max: 85 } as const;

export const CapacityRowSchema = z.object({
  gpu_uuid: z.string().min(1),
  nodegroup: z.string().min(1),
  gpu_model: z.string().min(1),
  timestamp: isoTimestamp,
  gpu_util_pct: z.number().min(0).max(100),
  power_usage_watts: z.number().nonnegative(),
  fb_used_mb: count,
  fb_free_mb: count,
  gpu_temp_c: z.number(),
  tensor_active_pct: z.number().min(0).max(100),
  pcie_rx_bytes_per_sec: count,
  pcie_tx_bytes_per_sec: count,
});

export type CapacityRow = z.infer<typeof CapacityRowSchema>;

export const CAPACITY_COLUMNS = [
  "gpu_uuid",
  "nodegroup",
  "gpu_model",
  "timestamp",
  "gpu_util_pct",
  "power_usage_watts",
  "fb_used_mb",
  "fb_free_mb",
  "gpu_temp_c",
  "tensor_active_pct",
  "pcie_rx_bytes_per_sec",
  "pcie_tx_bytes_per_sec",
] as const satisfies readonly (keyof CapacityRow)[];

// =============================================================================
// Nodepool State
// =============================================================================

export const NodepoolStateRowSchema = z.object({
  nodegroup: z.string().min(1),
  cluster: z.string().min(1),
  gpu_model: z.string().min(1),
  capacity_gpu_count: count,
  allocatable_gpu_count: count,
});

export type NodepoolStateRow = z.infer<typeof NodepoolStateRowSchema>;

export const NODEPOOL_STATE_COLUMNS = [
  "nodegroup",
  "cluster",
  "gpu_model",
  "capacity_gpu_count",
  "allocatable_gpu_count",
] as const satisfies readonly (keyof NodepoolStateRow)[];

// =============================================================================
// Manifest
// =============================================================================

export const ManifestSchema = z.object({
  seed: count,
  scenario: z.enum(SCENARIO_NAMES),
  start_time: isoTimestamp,
  end_time: isoTimestamp,
  step_seconds: z.number().int().positive(),
  days: z.number().int().positive(),
  gpu_count: z.number().int().positive(),
  row_counts: z.object({
    demand: count,
    capacity: count,
    nodepool_state: count,
  }),
  catalog_fingerprint: z.string().regex(/^[0-9a-f]{64}$/),
});

export type Manifest = z.infer<typeof ManifestSchema>;

// =============================================================================
// Dataset
// =============================================================================

/** The three generated tables for one run, in generation order. */
export interface Dataset {
  demand: DemandRow[];
  capacity: CapacityRow[];
  nodepoolState: NodepoolStateRow[];
}
