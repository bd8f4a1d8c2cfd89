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
 * Scenario Profiles
 *
 * Defines how demand and capacity signals trend and correlate over a run.
 * Profiles are pure data: the synthesizer reads the same fields for every
 * scenario, so adding one means adding an entry here and nothing else.
 */

import { ConfigurationError } from "@/lib/errors";

export const SCENARIO_NAMES = ["balanced", "demand_exceeds_capacity", "capacity_fragmentation", "io_bottleneck"] as const;

export type ScenarioName = (typeof SCENARIO_NAMES)[number];

interface ProfileFields {
  description: string;
  /** Target band for mean gpu_util_pct, [low, high] */
  utilizationBand: readonly [number, number];
  /** 0 = power tracks utilization, 1 = power pinned near idle */
  powerUtilizationDecoupling: number;
  /** Net pending drift per queue, workloads/hour */
  queueGrowthRate: number;
  waitTimeInflation: number;
  /** Fraction of allocatable GPUs that cannot be scheduled; reported capacity is unchanged */
  fragmentationFactor: number;
  /** Pending baseline as a fraction of the queue's capacity share */
  demandCapacityRatio: number;
  baseWaitSeconds: number;
  /** Admitted active workloads as a fraction of the queue's capacity share */
  activeRatio: number;
  /** Evictions per admission */
  evictionRate: number;
  /** Nodegroups that receive amplified demand */
  demandHotspots: readonly string[];
  /** PCIe traffic multiplier */
  pcieIntensity: number;
}

export type BalancedProfile = ProfileFields & { name: "balanced" };
export type DemandExceedsCapacityProfile = ProfileFields & { name: "demand_exceeds_capacity" };
export type CapacityFragmentationProfile = ProfileFields & { name: "capacity_fragmentation" };
export type IoBottleneckProfile = ProfileFields & { name: "io_bottleneck" };

export type ScenarioProfile =
  | BalancedProfile
  | DemandExceedsCapacityProfile
  | CapacityFragmentationProfile
  | IoBottleneckProfile;

/** Demand multiplier applied to hotspot nodegroups */
export const HOTSPOT_DEMAND_MULTIPLIER = 1.8;

// ============================================================================
// Built-in Profiles
// ============================================================================

const PROFILES: { readonly [K in ScenarioName]: Readonly<Extract<ScenarioProfile, { name: K }>> } = {
  balanced: {
    name: "balanced",
    description: "Demand roughly matches capacity. Healthy queue dynamics with moderate utilization.",
    utilizationBand: [45, 75],
    powerUtilizationDecoupling: 0.1,
    queueGrowthRate: 0,
    waitTimeInflation: 1,
    fragmentationFactor: 0,
    demandCapacityRatio: 0.12,
    baseWaitSeconds: 45,
    activeRatio: 0.55,
    evictionRate: 0.01,
    demandHotspots: [],
    pcieIntensity: 1,
  },
  demand_exceeds_capacity: {
    name: "demand_exceeds_capacity",
    description: "More workloads submitted than can be scheduled. Growing queues and long wait times.",
    utilizationBand: [80, 98],
    powerUtilizationDecoupling: 0.05,
    queueGrowthRate: 1.5,
    waitTimeInflation: 2.5,
    fragmentationFactor: 0,
    demandCapacityRatio: 1.2,
    baseWaitSeconds: 300,
    activeRatio: 0.95,
    evictionRate: 0.05,
    demandHotspots: ["ml-training-h100", "ml-training-a100"],
    pcieIntensity: 1.2,
  },
  capacity_fragmentation: {
    name: "capacity_fragmentation",
    description: "GPUs exist but cannot be effectively scheduled due to fragmentation or constraints.",
    utilizationBand: [20, 45],
    powerUtilizationDecoupling: 0.3,
    queueGrowthRate: 0.3,
    waitTimeInflation: 1.8,
    fragmentationFactor: 0.4,
    demandCapacityRatio: 0.6,
    baseWaitSeconds: 180,
    activeRatio: 0.45,
    evictionRate: 0.08,
    demandHotspots: [],
    pcieIntensity: 0.8,
  },
  io_bottleneck: {
    name: "io_bottleneck",
    description: "GPUs report high utilization but low power draw. Data-starved or I/O bound workloads.",
    utilizationBand: [75, 95],
    powerUtilizationDecoupling: 0.7,
    queueGrowthRate: 0,
    waitTimeInflation: 1,
    fragmentationFactor: 0,
    demandCapacityRatio: 0.15,
    baseWaitSeconds: 30,
    activeRatio: 0.85,
    evictionRate: 0.02,
    demandHotspots: [],
    pcieIntensity: 2.5,
  },
};

export function isScenarioName(value: string): value is ScenarioName {
  return (SCENARIO_NAMES as readonly string[]).includes(value);
}

/**
 * Get the profile for a named scenario.
 * Throws ConfigurationError listing the available names when unrecognized.
 */
export function getScenarioProfile(name: string): Readonly<ScenarioProfile> {
  if (!isScenarioName(name)) {
    throw new ConfigurationError(`Unknown scenario '${name}'. Available: ${SCENARIO_NAMES.join(", ")}`);
  }
  return PROFILES[name];
}

/** Scenario names and their descriptions, in declaration order. */
export function listScenarios(): Record<ScenarioName, string> {
  return {
    balanced: PROFILES.balanced.description,
    demand_exceeds_capacity: PROFILES.demand_exceeds_capacity.description,
    capacity_fragmentation: PROFILES.capacity_fragmentation.description,
    io_bottleneck: PROFILES.io_bottleneck.description,
  };
}
