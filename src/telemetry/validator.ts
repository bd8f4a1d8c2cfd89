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
 * Dataset Validator
 *
 * Final gate before persistence. Collects every violation instead of stopping
 * at the first, so one run surfaces all problems at once.
 */

import type { ZodTypeAny } from "zod";

import { ValidationFailure, type TableName, type Violation } from "@/lib/errors";
import type { EntityCatalog } from "@/telemetry/catalog/catalog";
import { findGpuSpec, type GpuSpecRegistry } from "@/telemetry/catalog/gpu-specs";
import {
  CapacityRowSchema,
  DemandRowSchema,
  GPU_TEMP_RANGE_C,
  ManifestSchema,
  NodepoolStateRowSchema,
  type CapacityRow,
  type Dataset,
  type DemandRow,
  type Manifest,
  type NodepoolStateRow,
} from "@/telemetry/schemas";
import type { TimeGrid } from "@/telemetry/time-grid";

export interface ValidationReport {
  valid: boolean;
  violations: Violation[];
}

export interface ValidationContext {
  catalog: EntityCatalog;
  grid: TimeGrid;
  registry: GpuSpecRegistry;
  /** Checked for completeness and agreement with the dataset when present */
  manifest?: Manifest;
  /** Run identity the manifest must record, when known */
  seed?: number;
  scenario?: string;
}

// =============================================================================
// Helpers
// =============================================================================

function checkShape(
  table: TableName,
  schema: ZodTypeAny,
  rows: readonly unknown[],
  describe: (row: number) => { entity?: string; timestamp?: string },
  violations: Violation[],
): boolean[] {
  return rows.map((row, i) => {
    const result = schema.safeParse(row);
    if (result.success) {
      return true;
    }
    for (const issue of result.error.issues) {
      violations.push({ table, row: i, ...describe(i), field: issue.path.join(".") || "row", message: issue.message });
    }
    return false;
  });
}

function checkRowCount(table: TableName, actual: number, expected: number, violations: Violation[]): void {
  if (actual !== expected) {
    violations.push({ table, field: "row_count", message: `expected ${expected} rows, found ${actual}` });
  }
}

function checkUniqueKeys(table: TableName, keys: readonly string[], violations: Violation[]): void {
  const seen = new Set<string>();
  keys.forEach((key, i) => {
    if (seen.has(key)) {
      violations.push({ table, row: i, field: "key", message: `duplicate key ${key}` });
    }
    seen.add(key);
  });
}

// =============================================================================
// Tables
// =============================================================================

function validateDemand(rows: readonly DemandRow[], ctx: ValidationContext, violations: Violation[]): void {
  const { catalog, grid } = ctx;
  checkRowCount("demand", rows.length, catalog.queues.length * grid.length, violations);
  const shapeOk = checkShape(
    "demand",
    DemandRowSchema,
    rows,
    (i) => ({ entity: rows[i]?.queue_id, timestamp: rows[i]?.timestamp }),
    violations,
  );
  checkUniqueKeys(
    "demand",
    rows.map((r) => `${r.queue_id}@${r.timestamp}`),
    violations,
  );

  const lastByQueue = new Map<string, DemandRow>();
  rows.forEach((row, i) => {
    if (!shapeOk[i]) {
      return;
    }
    const base = { table: "demand" as const, row: i, entity: row.queue_id, timestamp: row.timestamp };
    const queue = catalog.getQueue(row.queue_id);
    if (!queue) {
      violations.push({ ...base, field: "queue_id", message: `unknown queue ${row.queue_id}` });
    } else {
      if (row.namespace !== queue.namespaceId) {
        violations.push({ ...base, field: "namespace", message: `expected ${queue.namespaceId}, found ${row.namespace}` });
      }
      if (row.nodegroup !== queue.targetNodegroupId) {
        violations.push({ ...base, field: "nodegroup", message: `expected ${queue.targetNodegroupId}, found ${row.nodegroup}` });
      }
    }
    if (!catalog.hasNamespace(row.namespace)) {
      violations.push({ ...base, field: "namespace", message: `unknown namespace ${row.namespace}` });
    }
    if (!catalog.getNodegroup(row.nodegroup)) {
      violations.push({ ...base, field: "nodegroup", message: `unknown nodegroup ${row.nodegroup}` });
    }
    if (!grid.contains(row.timestamp)) {
      violations.push({ ...base, field: "timestamp", message: "timestamp is not on the run's time grid" });
    }
    if (row.resource_usage > row.resource_reservation) {
      violations.push({
        ...base,
        field: "resource_usage",
        message: `usage ${row.resource_usage} exceeds reservation ${row.resource_reservation}`,
      });
    }

    // Rows are checked in table order; monotonicity holds within each queue's run
    const prev = lastByQueue.get(row.queue_id);
    if (prev && prev.timestamp < row.timestamp) {
      if (row.admitted_workloads_total < prev.admitted_workloads_total) {
        violations.push({ ...base, field: "admitted_workloads_total", message: "counter decreased" });
      }
      if (row.evicted_workloads_total < prev.evicted_workloads_total) {
        violations.push({ ...base, field: "evicted_workloads_total", message: "counter decreased" });
      }
    }
    lastByQueue.set(row.queue_id, row);
  });
}

function validateCapacity(rows: readonly CapacityRow[], ctx: ValidationContext, violations: Violation[]): void {
  const { catalog, grid, registry } = ctx;
  checkRowCount("capacity", rows.length, catalog.gpus.length * grid.length, violations);
  const shapeOk = checkShape(
    "capacity",
    CapacityRowSchema,
    rows,
    (i) => ({ entity: rows[i]?.gpu_uuid, timestamp: rows[i]?.timestamp }),
    violations,
  );
  checkUniqueKeys(
    "capacity",
    rows.map((r) => `${r.gpu_uuid}@${r.timestamp}`),
    violations,
  );

  rows.forEach((row, i) => {
    if (!shapeOk[i]) {
      return;
    }
    const base = { table: "capacity" as const, row: i, entity: row.gpu_uuid, timestamp: row.timestamp };
    const gpu = catalog.getGpu(row.gpu_uuid);
    if (!gpu) {
      violations.push({ ...base, field: "gpu_uuid", message: `unknown GPU ${row.gpu_uuid}` });
    } else {
      if (row.nodegroup !== gpu.nodegroupId) {
        violations.push({ ...base, field: "nodegroup", message: `expected ${gpu.nodegroupId}, found ${row.nodegroup}` });
      }
      if (row.gpu_model !== gpu.model) {
        violations.push({ ...base, field: "gpu_model", message: `expected ${gpu.model}, found ${row.gpu_model}` });
      }
    }
    if (!catalog.getNodegroup(row.nodegroup)) {
      violations.push({ ...base, field: "nodegroup", message: `unknown nodegroup ${row.nodegroup}` });
    }
    if (!grid.contains(row.timestamp)) {
      violations.push({ ...base, field: "timestamp", message: "timestamp is not on the run's time grid" });
    }
    if (row.gpu_temp_c < GPU_TEMP_RANGE_C.min || row.gpu_temp_c > GPU_TEMP_RANGE_C.max) {
      violations.push({
        ...base,
        field: "gpu_temp_c",
        message: `${row.gpu_temp_c} outside [${GPU_TEMP_RANGE_C.min}, ${GPU_TEMP_RANGE_C.max}]`,
      });
    }

    const spec = findGpuSpec(registry, row.gpu_model);
    if (!spec) {
      violations.push({ ...base, field: "gpu_model", message: `unknown GPU model ${row.gpu_model}` });
      return;
    }
    if (row.power_usage_watts < spec.idlePowerWatts || row.power_usage_watts > spec.maxPowerWatts) {
      violations.push({
        ...base,
        field: "power_usage_watts",
        message: `${row.power_usage_watts} outside [${spec.idlePowerWatts}, ${spec.maxPowerWatts}]`,
      });
    }
    if (row.fb_used_mb + row.fb_free_mb !== spec.memoryTotalMb) {
      violations.push({
        ...base,
        field: "fb_used_mb",
        message: `used ${row.fb_used_mb} + free ${row.fb_free_mb} != ${spec.memoryTotalMb}`,
      });
    }
  });
}

function validateNodepool(rows: readonly NodepoolStateRow[], ctx: ValidationContext, violations: Violation[]): void {
  const { catalog } = ctx;
  checkRowCount("nodepool_state", rows.length, catalog.nodegroups.length, violations);
  const shapeOk = checkShape(
    "nodepool_state",
    NodepoolStateRowSchema,
    rows,
    (i) => ({ entity: rows[i]?.nodegroup }),
    violations,
  );
  checkUniqueKeys(
    "nodepool_state",
    rows.map((r) => r.nodegroup),
    violations,
  );

  rows.forEach((row, i) => {
    if (!shapeOk[i]) {
      return;
    }
    const base = { table: "nodepool_state" as const, row: i, entity: row.nodegroup };
    const ng = catalog.getNodegroup(row.nodegroup);
    if (!ng) {
      violations.push({ ...base, field: "nodegroup", message: `unknown nodegroup ${row.nodegroup}` });
    } else {
      if (row.cluster !== ng.clusterId) {
        violations.push({ ...base, field: "cluster", message: `expected ${ng.clusterId}, found ${row.cluster}` });
      }
      if (row.gpu_model !== ng.gpuModel) {
        violations.push({ ...base, field: "gpu_model", message: `expected ${ng.gpuModel}, found ${row.gpu_model}` });
      }
      if (row.capacity_gpu_count !== catalog.gpusIn(ng.id).length) {
        violations.push({
          ...base,
          field: "capacity_gpu_count",
          message: `reported ${row.capacity_gpu_count} but catalog has ${catalog.gpusIn(ng.id).length} GPUs`,
        });
      }
    }
    if (!catalog.hasCluster(row.cluster)) {
      violations.push({ ...base, field: "cluster", message: `unknown cluster ${row.cluster}` });
    }
    if (row.allocatable_gpu_count > row.capacity_gpu_count) {
      violations.push({
        ...base,
        field: "allocatable_gpu_count",
        message: `allocatable ${row.allocatable_gpu_count} exceeds capacity ${row.capacity_gpu_count}`,
      });
    }
  });
}

function validateManifest(manifest: Manifest, dataset: Dataset, ctx: ValidationContext, violations: Violation[]): void {
  const result = ManifestSchema.safeParse(manifest);
  if (!result.success) {
    for (const issue of result.error.issues) {
      violations.push({ table: "manifest", field: issue.path.join(".") || "manifest", message: issue.message });
    }
    return;
  }

  const mismatch = (field: string, expected: string | number, found: string | number) => {
    if (expected !== found) {
      violations.push({ table: "manifest", field, message: `expected ${expected}, found ${found}` });
    }
  };
  if (ctx.seed !== undefined) mismatch("seed", ctx.seed, manifest.seed);
  if (ctx.scenario !== undefined) mismatch("scenario", ctx.scenario, manifest.scenario);
  mismatch("start_time", ctx.grid.start.iso, manifest.start_time);
  mismatch("end_time", ctx.grid.end.iso, manifest.end_time);
  mismatch("step_seconds", ctx.grid.stepSeconds, manifest.step_seconds);
  mismatch("days", ctx.grid.days, manifest.days);
  mismatch("gpu_count", ctx.catalog.gpus.length, manifest.gpu_count);
  mismatch("row_counts.demand", dataset.demand.length, manifest.row_counts.demand);
  mismatch("row_counts.capacity", dataset.capacity.length, manifest.row_counts.capacity);
  mismatch("row_counts.nodepool_state", dataset.nodepoolState.length, manifest.row_counts.nodepool_state);
  mismatch("catalog_fingerprint", ctx.catalog.fingerprint(), manifest.catalog_fingerprint);
}

// =============================================================================
// Entry Points
// =============================================================================

export function validateDataset(dataset: Dataset, ctx: ValidationContext): ValidationReport {
  const violations: Violation[] = [];
  validateNodepool(dataset.nodepoolState, ctx, violations);
  validateDemand(dataset.demand, ctx, violations);
  validateCapacity(dataset.capacity, ctx, violations);
  if (ctx.manifest) {
    validateManifest(ctx.manifest, dataset, ctx, violations);
  }
  return { valid: violations.length === 0, violations };
}

/** Throw ValidationFailure carrying every violation when the report failed. */
export function assertValid(report: ValidationReport): void {
  if (!report.valid) {
    throw new ValidationFailure(report.violations);
  }
}
