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
 * Cross-Metric Consistency Enforcer
 *
 * One in-place pass over a synthesized dataset for the invariants that span
 * several metrics or several timestamps:
 *
 * - queue flow: pending(t) >= pending(t-1) - admitted_delta(t) - evicted_delta(t),
 *   i.e. the implied new submissions are never negative; a raised pending
 *   carries an uncapped reservation up with it
 * - admitted/evicted counters never decrease
 * - fb_used + fb_free equals the model's memory
 *
 * Offending rows are adjusted, never dropped.
 */

import { MetricRangeError } from "@/lib/errors";
import { findGpuSpec, type GpuSpecRegistry } from "@/telemetry/catalog/gpu-specs";
import type { CapacityRow, Dataset, DemandRow } from "@/telemetry/schemas";

export interface ConsistencyReport {
  pendingAdjusted: number;
  countersClamped: number;
  memoryRebalanced: number;
}

export interface ConsistencyOptions {
  /** Allowed negative implied submissions per step, in workloads */
  flowTolerance?: number;
}

/** Row indices per key, each list ordered by timestamp. */
function seriesIndices<T extends { timestamp: string }>(rows: readonly T[], key: (row: T) => string): number[][] {
  const groups = new Map<string, number[]>();
  rows.forEach((row, i) => {
    const k = key(row);
    const list = groups.get(k);
    if (list) {
      list.push(i);
    } else {
      groups.set(k, [i]);
    }
  });
  const compare = (a: number, b: number) =>
    rows[a].timestamp < rows[b].timestamp ? -1 : rows[a].timestamp > rows[b].timestamp ? 1 : a - b;
  return [...groups.values()].map((indices) => indices.sort(compare));
}

function requireFinite(row: DemandRow, field: keyof DemandRow & string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new MetricRangeError("value is not finite", { entity: row.queue_id, metric: field, timestamp: row.timestamp }, value);
  }
}

function enforceDemandSeries(rows: DemandRow[], indices: number[], tolerance: number, report: ConsistencyReport): void {
  let prev: DemandRow | undefined;
  for (const i of indices) {
    const row = rows[i];
    requireFinite(row, "pending_workloads", row.pending_workloads);
    requireFinite(row, "admitted_workloads_total", row.admitted_workloads_total);
    requireFinite(row, "evicted_workloads_total", row.evicted_workloads_total);

    if (prev) {
      if (row.admitted_workloads_total < prev.admitted_workloads_total) {
        row.admitted_workloads_total = prev.admitted_workloads_total;
        report.countersClamped++;
      }
      if (row.evicted_workloads_total < prev.evicted_workloads_total) {
        row.evicted_workloads_total = prev.evicted_workloads_total;
        report.countersClamped++;
      }

      const admittedDelta = row.admitted_workloads_total - prev.admitted_workloads_total;
      const evictedDelta = row.evicted_workloads_total - prev.evicted_workloads_total;
      const submissions = row.pending_workloads - prev.pending_workloads + admittedDelta + evictedDelta;
      if (submissions < -tolerance) {
        // Fold the unexplained drop back into pending
        const raised = Math.max(0, prev.pending_workloads - admittedDelta - evictedDelta);
        // A reservation that held all of the old pending keeps holding it
        if (row.resource_reservation - row.resource_usage >= row.pending_workloads) {
          row.resource_reservation += raised - row.pending_workloads;
        }
        row.pending_workloads = raised;
        report.pendingAdjusted++;
      }
    }

    if (row.pending_workloads < 0) {
      throw new MetricRangeError(
        "pending workloads cannot be negative",
        { entity: row.queue_id, metric: "pending_workloads", timestamp: row.timestamp },
        row.pending_workloads,
      );
    }
    prev = row;
  }
}

function enforceMemory(row: CapacityRow, registry: GpuSpecRegistry, report: ConsistencyReport): void {
  const context = { entity: row.gpu_uuid, metric: "fb_used_mb", timestamp: row.timestamp };
  const spec = findGpuSpec(registry, row.gpu_model);
  if (!spec) {
    throw new MetricRangeError(`no memory capacity known for model '${row.gpu_model}'`, context, Number.NaN);
  }
  if (!(spec.memoryTotalMb > 0)) {
    throw new MetricRangeError("model memory must be positive", context, spec.memoryTotalMb);
  }
  if (!Number.isFinite(row.fb_used_mb)) {
    throw new MetricRangeError("value is not finite", context, row.fb_used_mb);
  }
  if (row.fb_used_mb + row.fb_free_mb !== spec.memoryTotalMb || row.fb_used_mb < 0 || row.fb_free_mb < 0) {
    row.fb_used_mb = Math.min(spec.memoryTotalMb, Math.max(0, Math.round(row.fb_used_mb)));
    row.fb_free_mb = spec.memoryTotalMb - row.fb_used_mb;
    report.memoryRebalanced++;
  }
}

/**
 * Enforce cross-metric invariants in place.
 * Throws MetricRangeError when a row cannot be corrected.
 */
export function enforceConsistency(
  dataset: Dataset,
  registry: GpuSpecRegistry,
  options: ConsistencyOptions = {},
): ConsistencyReport {
  const tolerance = options.flowTolerance ?? 0;
  const report: ConsistencyReport = { pendingAdjusted: 0, countersClamped: 0, memoryRebalanced: 0 };

  for (const indices of seriesIndices(dataset.demand, (row) => row.queue_id)) {
    enforceDemandSeries(dataset.demand, indices, tolerance, report);
  }
  for (const row of dataset.capacity) {
    enforceMemory(row, registry, report);
  }
  return report;
}
