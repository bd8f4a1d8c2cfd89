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
 * Demand Generator
 *
 * Generates per-queue workload demand: pending depth, admission wait,
 * active workloads, cumulative admitted/evicted counters and GPU
 * usage/reservation.
 *
 * A queue sees a share of its target nodegroup's effective capacity, which is
 * the allocatable count reduced by the scenario's fragmentation factor and
 * split evenly between the queues targeting that nodegroup.
 *
 * Series are flow-consistent as generated: pending(t) - pending(t-1) +
 * admitted_delta(t) + evicted_delta(t) is never negative.
 */

import { MetricRangeError } from "@/lib/errors";
import type { EntityCatalog, Queue } from "@/telemetry/catalog/catalog";
import { RandomStream, SmoothNoise } from "@/telemetry/random";
import type { DemandRow } from "@/telemetry/schemas";
import { HOTSPOT_DEMAND_MULTIPLIER, type ScenarioProfile } from "@/telemetry/seed/scenarios";
import type { TimeGrid } from "@/telemetry/time-grid";

import { clip, loadCurve, roundTo } from "./signal-shaping";

// ============================================================================
// Generator Configuration
// ============================================================================

interface GeneratorConfig {
  runSeed: number;
  profile: Readonly<ScenarioProfile>;
  /** Mean time an admitted workload stays active, seconds */
  meanRuntimeSeconds: number;
  /** Initial admitted counter range, so series do not all start from zero */
  initialAdmitted: { min: number; max: number };
}

const DEFAULT_CONFIG: Pick<GeneratorConfig, "meanRuntimeSeconds" | "initialAdmitted"> = {
  meanRuntimeSeconds: 1800,
  initialAdmitted: { min: 1000, max: 5000 },
};

/** Diurnal swing of pending demand around its baseline */
const PENDING_DIURNAL_SWING = 0.3;
/** Diurnal swing of active workloads around their baseline */
const ACTIVE_DIURNAL_SWING = 0.1;
/** Pending noise as a fraction of the pending mean (floored at one workload) */
const PENDING_NOISE_FRACTION = 0.2;
/** Active noise as a fraction of the capacity share */
const ACTIVE_NOISE_FRACTION = 0.05;
const WAIT_NOISE_SECONDS = 10;
/** Share of the queue's capacity reserved ahead of admission for pending work */
const RESERVATION_HEADROOM = 0.2;

const UNBOUNDED = Number.MAX_SAFE_INTEGER;

// ============================================================================
// Generator Class
// ============================================================================

export class DemandGenerator {
  private config: GeneratorConfig;

  constructor(config: Pick<GeneratorConfig, "runSeed" | "profile"> & Partial<GeneratorConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Effective GPUs available to one queue.
   * Throws MetricRangeError when fragmentation leaves nothing schedulable.
   */
  capacityShare(queue: Queue, catalog: EntityCatalog): number {
    const nodegroup = catalog.getNodegroup(queue.targetNodegroupId);
    if (!nodegroup) {
      throw new MetricRangeError(
        `unknown target nodegroup ${queue.targetNodegroupId}`,
        { entity: queue.id, metric: "capacity_share" },
        Number.NaN,
      );
    }
    const sharing = catalog.queuesTargeting(nodegroup.id).length;
    const share = (nodegroup.allocatableGpuCount * (1 - this.config.profile.fragmentationFactor)) / sharing;
    if (!(share > 0)) {
      throw new MetricRangeError("effective capacity must be positive", { entity: queue.id, metric: "capacity_share" }, share);
    }
    return share;
  }

  /**
   * Generate the full series for one queue.
   * DETERMINISTIC: same run seed + queue id always produces the same series.
   */
  generateSeries(queue: Queue, catalog: EntityCatalog, grid: TimeGrid): DemandRow[] {
    const { profile, meanRuntimeSeconds, initialAdmitted } = this.config;
    const share = this.capacityShare(queue, catalog);
    const hotspot = profile.demandHotspots.includes(queue.targetNodegroupId) ? HOTSPOT_DEMAND_MULTIPLIER : 1;

    const stream = RandomStream.forEntity(this.config.runSeed, queue.id);
    const pendingNoise = new SmoothNoise(stream);
    const activeNoise = new SmoothNoise(stream);
    const waitNoise = new SmoothNoise(stream);

    let admittedTotal = stream.int(initialAdmitted.min, initialAdmitted.max);
    let evictedTotal = Math.round(admittedTotal * profile.evictionRate);
    const headroomCap = Math.round(share * RESERVATION_HEADROOM);
    let previousPending: number | undefined;

    const rows: DemandRow[] = [];
    for (const sample of grid.samples) {
      const at = (metric: string) => ({ entity: queue.id, metric, timestamp: sample.iso });
      const load = loadCurve(sample.hourOfDay);

      // 1. Base trend: diurnal baseline plus scenario drift
      const pendingMean =
        (share * profile.demandCapacityRatio * (1 + PENDING_DIURNAL_SWING * load) +
          profile.queueGrowthRate * sample.elapsedHours) *
        hotspot;
      const activeMean = share * profile.activeRatio * (1 + ACTIVE_DIURNAL_SWING * load);

      // 2. Noise
      const pending = Math.round(
        clip(
          pendingMean + PENDING_NOISE_FRACTION * Math.max(pendingMean, 1) * pendingNoise.next(),
          0,
          UNBOUNDED,
          at("pending_workloads"),
        ),
      );
      const active = Math.round(
        clip(activeMean + ACTIVE_NOISE_FRACTION * share * activeNoise.next(), 0, share, at("admitted_active_workloads")),
      );
      const wait = roundTo(
        clip(
          profile.baseWaitSeconds * profile.waitTimeInflation * (1 + pending / Math.max(share, 1)) +
            WAIT_NOISE_SECONDS * waitNoise.next(),
          0,
          UNBOUNDED,
          at("admission_wait_time_seconds"),
        ),
        1,
      );

      // 3. Counters: accumulate non-negative increments. Pending can only
      // shrink through admissions and evictions, so a drop larger than the
      // turnover draw is booked as extra admissions.
      const admissionRate = (active * grid.stepSeconds) / meanRuntimeSeconds;
      const evicted = stream.count(admissionRate * profile.evictionRate);
      const drained = previousPending === undefined ? 0 : previousPending - pending - evicted;
      admittedTotal += Math.max(stream.count(admissionRate), drained);
      evictedTotal += evicted;
      previousPending = pending;

      rows.push({
        queue_id: queue.id,
        namespace: queue.namespaceId,
        nodegroup: queue.targetNodegroupId,
        timestamp: sample.iso,
        pending_workloads: pending,
        admission_wait_time_seconds: wait,
        admitted_active_workloads: active,
        admitted_workloads_total: admittedTotal,
        evicted_workloads_total: evictedTotal,
        resource_usage: active,
        resource_reservation: active + Math.min(pending, headroomCap),
      });
    }
    return rows;
  }
}
