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
 * Aggregations
 *
 * Joins demand, capacity and nodepool rows on (nodegroup, timestamp) and
 * scores each joined sample for imbalance.
 */

import type { GpuSpecRegistry } from "@/telemetry/catalog/gpu-specs";
import type { Dataset, DemandRow } from "@/telemetry/schemas";

import {
  classifyImbalanceSeverity,
  compositeImbalanceScore,
  DEFAULT_IMBALANCE_WEIGHTS,
  demandCapacityRatio,
  queuePressureScore,
  type ImbalanceSeverity,
  type ImbalanceWeights,
} from "./imbalance";
import { gpuEfficiency, normalize, valueRange, type EfficiencyClass } from "./metrics";

// =============================================================================
// Types
// =============================================================================

export interface NodegroupSample {
  nodegroup: string;
  timestamp: string;
  /** Absent when the nodegroup has no nodepool row */
  cluster?: string;

  // Demand (summed over queues, wait averaged)
  pendingWorkloads: number;
  admittedActiveWorkloads: number;
  resourceUsage: number;
  admissionWaitSeconds: number;

  // Inventory
  capacityGpuCount: number;
  allocatableGpuCount: number;
  /** max(allocatable - usage, 0) */
  availableCapacity: number;

  // Efficiency (averaged over GPUs)
  gpuUtilPct: number;
  powerUsageWatts: number;
  pif: number;
  rfuPct: number;
  efficiencyGap: number;
  memoryPressurePct: number;
}

export interface ScoredSample extends NodegroupSample {
  demandCapacityRatio: number;
  queuePressureScore: number;
  compositeImbalanceScore: number;
  severity: ImbalanceSeverity;
}

interface Accumulator {
  nodegroup: string;
  timestamp: string;
  pending: number;
  active: number;
  usage: number;
  waitSum: number;
  queues: number;
  util: number;
  power: number;
  pif: number;
  rfu: number;
  gap: number;
  memory: number;
  gpus: number;
}

function mean(sum: number, n: number): number {
  return n > 0 ? sum / n : 0;
}

// =============================================================================
// Join
// =============================================================================

/**
 * One sample per (nodegroup, timestamp) seen in either series, ordered by
 * timestamp then nodegroup. Sides without rows contribute zeros.
 */
export function joinByNodegroup(dataset: Dataset, registry: GpuSpecRegistry): NodegroupSample[] {
  const buckets = new Map<string, Accumulator>();
  const bucket = (nodegroup: string, timestamp: string): Accumulator => {
    const key = `${nodegroup}@${timestamp}`;
    let acc = buckets.get(key);
    if (!acc) {
      acc = {
        nodegroup,
        timestamp,
        pending: 0,
        active: 0,
        usage: 0,
        waitSum: 0,
        queues: 0,
        util: 0,
        power: 0,
        pif: 0,
        rfu: 0,
        gap: 0,
        memory: 0,
        gpus: 0,
      };
      buckets.set(key, acc);
    }
    return acc;
  };

  for (const row of dataset.demand) {
    const acc = bucket(row.nodegroup, row.timestamp);
    acc.pending += row.pending_workloads;
    acc.active += row.admitted_active_workloads;
    acc.usage += row.resource_usage;
    acc.waitSum += row.admission_wait_time_seconds;
    acc.queues++;
  }
  for (const row of dataset.capacity) {
    const acc = bucket(row.nodegroup, row.timestamp);
    const eff = gpuEfficiency(row, registry);
    acc.util += row.gpu_util_pct;
    acc.power += row.power_usage_watts;
    acc.pif += eff.pif;
    acc.rfu += eff.rfuPct;
    acc.gap += eff.efficiencyGap;
    acc.memory += eff.memoryPressurePct;
    acc.gpus++;
  }

  const inventory = new Map(dataset.nodepoolState.map((row) => [row.nodegroup, row]));

  return [...buckets.values()]
    .sort((a, b) =>
      a.timestamp === b.timestamp
        ? a.nodegroup.localeCompare(b.nodegroup)
        : a.timestamp < b.timestamp
          ? -1
          : 1,
    )
    .map((acc) => {
      const pool = inventory.get(acc.nodegroup);
      const allocatable = pool?.allocatable_gpu_count ?? 0;
      return {
        nodegroup: acc.nodegroup,
        timestamp: acc.timestamp,
        cluster: pool?.cluster,
        pendingWorkloads: acc.pending,
        admittedActiveWorkloads: acc.active,
        resourceUsage: acc.usage,
        admissionWaitSeconds: mean(acc.waitSum, acc.queues),
        capacityGpuCount: pool?.capacity_gpu_count ?? 0,
        allocatableGpuCount: allocatable,
        availableCapacity: Math.max(allocatable - acc.usage, 0),
        gpuUtilPct: mean(acc.util, acc.gpus),
        powerUsageWatts: mean(acc.power, acc.gpus),
        pif: mean(acc.pif, acc.gpus),
        rfuPct: mean(acc.rfu, acc.gpus),
        efficiencyGap: mean(acc.gap, acc.gpus),
        memoryPressurePct: mean(acc.memory, acc.gpus),
      };
    });
}

// =============================================================================
// Scoring
// =============================================================================

/**
 * Add DCR, QPS, CIS and severity. Min-max ranges are taken over `samples`,
 * so scores are relative to the set passed in.
 */
export function scoreImbalance(
  samples: readonly NodegroupSample[],
  weights: ImbalanceWeights = DEFAULT_IMBALANCE_WEIGHTS,
): ScoredSample[] {
  const dcr = samples.map((s) => demandCapacityRatio(s.pendingWorkloads, s.availableCapacity));
  const gaps = samples.map((s) => Math.max(s.efficiencyGap, 0));
  const pendingRange = valueRange(samples.map((s) => s.pendingWorkloads));
  const waitRange = valueRange(samples.map((s) => s.admissionWaitSeconds));
  const dcrRange = valueRange(dcr);
  const gapRange = valueRange(gaps);

  return samples.map((sample, i) => {
    const qps = queuePressureScore(
      normalize(sample.pendingWorkloads, pendingRange),
      normalize(sample.admissionWaitSeconds, waitRange),
      weights.queuePressure,
    );
    const cis = compositeImbalanceScore(normalize(dcr[i], dcrRange), normalize(gaps[i], gapRange), qps, weights.composite);
    return {
      ...sample,
      demandCapacityRatio: dcr[i],
      queuePressureScore: qps,
      compositeImbalanceScore: cis,
      severity: classifyImbalanceSeverity(cis, dcr[i]),
    };
  });
}

// =============================================================================
// Top Contributors
// =============================================================================

export interface NodegroupContribution {
  nodegroup: string;
  meanCompositeImbalance: number;
  totalPending: number;
  meanEfficiencyGap: number;
}

export interface QueueContribution {
  /** Queue id or namespace, depending on the grouping */
  key: string;
  totalPending: number;
  meanWaitSeconds: number;
  totalActive: number;
  queuePressure: number;
}

export interface TopContributors {
  byNodegroup: NodegroupContribution[];
  byQueue: QueueContribution[];
  byNamespace: QueueContribution[];
}

function rankQueues(
  demand: readonly DemandRow[],
  key: (row: DemandRow) => string,
  limit: number,
  weights: ImbalanceWeights,
): QueueContribution[] {
  const groups = new Map<string, { pending: number; wait: number; active: number; n: number }>();
  for (const row of demand) {
    const k = key(row);
    const g = groups.get(k) ?? { pending: 0, wait: 0, active: 0, n: 0 };
    g.pending += row.pending_workloads;
    g.wait += row.admission_wait_time_seconds;
    g.active += row.admitted_active_workloads;
    g.n++;
    groups.set(k, g);
  }

  const rows = [...groups.entries()].map(([k, g]) => ({
    key: k,
    totalPending: g.pending,
    meanWaitSeconds: mean(g.wait, g.n),
    totalActive: g.active,
  }));
  const pendingRange = valueRange(rows.map((r) => r.totalPending));
  const waitRange = valueRange(rows.map((r) => r.meanWaitSeconds));
  return rows
    .map((r) => ({
      ...r,
      queuePressure: queuePressureScore(
        normalize(r.totalPending, pendingRange),
        normalize(r.meanWaitSeconds, waitRange),
        weights.queuePressure,
      ),
    }))
    .sort((a, b) => b.queuePressure - a.queuePressure)
    .slice(0, limit);
}

/**
 * Rank nodegroups by mean CIS, and queues and namespaces by queue pressure
 * over their whole series. Ties keep first-seen order.
 */
export function topContributors(
  scored: readonly ScoredSample[],
  demand: readonly DemandRow[],
  limit = 5,
  weights: ImbalanceWeights = DEFAULT_IMBALANCE_WEIGHTS,
): TopContributors {
  const byNg = new Map<string, { cis: number; pending: number; gap: number; n: number }>();
  for (const s of scored) {
    const g = byNg.get(s.nodegroup) ?? { cis: 0, pending: 0, gap: 0, n: 0 };
    g.cis += s.compositeImbalanceScore;
    g.pending += s.pendingWorkloads;
    g.gap += s.efficiencyGap;
    g.n++;
    byNg.set(s.nodegroup, g);
  }

  const byNodegroup = [...byNg.entries()]
    .map(([nodegroup, g]) => ({
      nodegroup,
      meanCompositeImbalance: mean(g.cis, g.n),
      totalPending: g.pending,
      meanEfficiencyGap: mean(g.gap, g.n),
    }))
    .sort((a, b) => b.meanCompositeImbalance - a.meanCompositeImbalance)
    .slice(0, limit);

  return {
    byNodegroup,
    byQueue: rankQueues(demand, (row) => row.queue_id, limit, weights),
    byNamespace: rankQueues(demand, (row) => row.namespace, limit, weights),
  };
}

// =============================================================================
// Run Summary
// =============================================================================

export interface DatasetSummary {
  meanGpuUtilPct: number;
  meanPif: number;
  meanRfuPct: number;
  meanEfficiencyGap: number;
  meanMemoryPressurePct: number;
  meanPendingWorkloads: number;
  meanAdmissionWaitSeconds: number;
  meanCompositeImbalance: number;
  efficiencyClasses: Record<EfficiencyClass, number>;
  severities: Record<ImbalanceSeverity, number>;
}

function tally<K extends string>(values: readonly K[], initial: Readonly<Record<K, number>>): Record<K, number> {
  const counts: Record<K, number> = { ...initial };
  for (const v of values) {
    counts[v] += 1;
  }
  return counts;
}

/** Run-level means over raw rows, plus class and severity counts. */
export function summarizeDataset(
  dataset: Dataset,
  registry: GpuSpecRegistry,
  weights: ImbalanceWeights = DEFAULT_IMBALANCE_WEIGHTS,
): DatasetSummary {
  const efficiency = dataset.capacity.map((row) => gpuEfficiency(row, registry));
  const scored = scoreImbalance(joinByNodegroup(dataset, registry), weights);
  const n = dataset.capacity.length;
  const q = dataset.demand.length;
  const sum = (values: readonly number[]) => values.reduce((a, b) => a + b, 0);

  return {
    meanGpuUtilPct: mean(sum(dataset.capacity.map((r) => r.gpu_util_pct)), n),
    meanPif: mean(sum(efficiency.map((e) => e.pif)), n),
    meanRfuPct: mean(sum(efficiency.map((e) => e.rfuPct)), n),
    meanEfficiencyGap: mean(sum(efficiency.map((e) => e.efficiencyGap)), n),
    meanMemoryPressurePct: mean(sum(efficiency.map((e) => e.memoryPressurePct)), n),
    meanPendingWorkloads: mean(sum(dataset.demand.map((r) => r.pending_workloads)), q),
    meanAdmissionWaitSeconds: mean(sum(dataset.demand.map((r) => r.admission_wait_time_seconds)), q),
    meanCompositeImbalance: mean(sum(scored.map((s) => s.compositeImbalanceScore)), scored.length),
    efficiencyClasses: tally(
      efficiency.map((e) => e.efficiencyClass),
      { Idle: 0, Efficient: 0, Bottlenecked: 0, Moderate: 0, Inefficient: 0 },
    ),
    severities: tally(
      scored.map((s) => s.severity),
      { Critical: 0, Warning: 0, Moderate: 0, Healthy: 0 },
    ),
  };
}
