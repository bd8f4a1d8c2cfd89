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
 * Entity Catalog
 *
 * The fixed universe of clusters, nodegroups, GPUs, namespaces and queues for
 * a run, plus lookups over their static relationships. Built once from the
 * requested GPU count and read-only afterwards.
 */

import { createHash } from "node:crypto";

import { ConfigurationError } from "@/lib/errors";
import { RandomStream, hashString } from "@/telemetry/random";
import type { GpuModel } from "./gpu-specs";

// ============================================================================
// Types
// ============================================================================

export interface Cluster {
  id: string;
  region: string;
}

export interface Nodegroup {
  id: string;
  clusterId: string;
  gpuModel: GpuModel;
  capacityGpuCount: number;
  allocatableGpuCount: number;
}

export interface Gpu {
  uuid: string;
  nodegroupId: string;
  model: GpuModel;
  /** Position within the nodegroup */
  index: number;
}

export interface Namespace {
  id: string;
}

export interface Queue {
  id: string;
  namespaceId: string;
  targetNodegroupId: string;
}

// ============================================================================
// Base Topology
// ============================================================================

export const CLUSTERS: readonly Cluster[] = [
  { id: "gen-ai-cluster-1", region: "us-west-2" },
  { id: "gen-ai-cluster-2", region: "us-east-1" },
  { id: "gen-ai-cluster-3", region: "eu-west-1" },
];

interface NodegroupTemplate {
  id: string;
  clusterId: string;
  gpuModel: GpuModel;
  /** Capacity at the default GPU count; also the proportional weight */
  baseGpuCount: number;
}

export const NODEGROUP_TEMPLATES: readonly NodegroupTemplate[] = [
  { id: "ml-training-h100", clusterId: "gen-ai-cluster-1", gpuModel: "NVIDIA H100 80GB HBM3", baseGpuCount: 32 },
  { id: "ml-training-a100", clusterId: "gen-ai-cluster-1", gpuModel: "NVIDIA A100-SXM4-40GB", baseGpuCount: 48 },
  { id: "ml-inference-a10g", clusterId: "gen-ai-cluster-3", gpuModel: "NVIDIA A10G", baseGpuCount: 64 },
  { id: "research-a100", clusterId: "gen-ai-cluster-2", gpuModel: "NVIDIA A100-SXM4-40GB", baseGpuCount: 24 },
  { id: "research-h100", clusterId: "gen-ai-cluster-2", gpuModel: "NVIDIA H100 80GB HBM3", baseGpuCount: 16 },
];

export const NAMESPACES: readonly Namespace[] = [
  { id: "ml-training" },
  { id: "ml-inference" },
  { id: "research" },
  { id: "fraud-detection" },
  { id: "recommendations" },
  { id: "nlp-platform" },
];

export const QUEUES: readonly Queue[] = [
  { id: "training-h100-queue", namespaceId: "ml-training", targetNodegroupId: "ml-training-h100" },
  { id: "training-a100-queue", namespaceId: "ml-training", targetNodegroupId: "ml-training-a100" },
  { id: "inference-a10g-queue", namespaceId: "ml-inference", targetNodegroupId: "ml-inference-a10g" },
  { id: "research-a100-queue", namespaceId: "research", targetNodegroupId: "research-a100" },
  { id: "research-h100-queue", namespaceId: "research", targetNodegroupId: "research-h100" },
  { id: "batch-training-queue", namespaceId: "nlp-platform", targetNodegroupId: "ml-training-a100" },
];

/** Share of capacity the scheduler may hand out */
export const ALLOCATABLE_FRACTION = 0.95;

// ============================================================================
// Capacity Distribution
// ============================================================================

/**
 * Split `total` GPUs across weights proportionally (largest remainder),
 * giving every slot at least one GPU.
 */
export function distributeGpus(total: number, weights: readonly number[]): number[] {
  if (total < weights.length) {
    throw new ConfigurationError(`gpu_count must be at least ${weights.length}, got ${total}`);
  }
  const weightSum = weights.reduce((sum, w) => sum + w, 0);
  const shares = weights.map((w) => (total * w) / weightSum);
  const counts = shares.map((share) => Math.max(1, Math.floor(share)));
  const remainders = shares.map((share, i) => share - counts[i]);

  // Largest remainder first; index breaks ties so the split is stable
  const byRemainderDesc = weights.map((_, i) => i).sort((a, b) => remainders[b] - remainders[a] || a - b);

  let remaining = total - counts.reduce((sum, c) => sum + c, 0);
  for (let k = 0; remaining > 0; k = (k + 1) % byRemainderDesc.length) {
    counts[byRemainderDesc[k]]++;
    remaining--;
  }
  // Minimum-one bumps can overshoot; take back from the smallest remainders
  for (let k = byRemainderDesc.length - 1; remaining < 0; k = k === 0 ? byRemainderDesc.length - 1 : k - 1) {
    const i = byRemainderDesc[k];
    if (counts[i] > 1) {
      counts[i]--;
      remaining++;
    }
  }
  return counts;
}

// ============================================================================
// Catalog
// ============================================================================

export class EntityCatalog {
  readonly clusters: readonly Cluster[];
  readonly nodegroups: readonly Nodegroup[];
  readonly gpus: readonly Gpu[];
  readonly namespaces: readonly Namespace[];
  readonly queues: readonly Queue[];

  private readonly nodegroupById: ReadonlyMap<string, Nodegroup>;
  private readonly gpuByUuid: ReadonlyMap<string, Gpu>;
  private readonly queueById: ReadonlyMap<string, Queue>;
  private readonly clusterIds: ReadonlySet<string>;
  private readonly namespaceIds: ReadonlySet<string>;

  constructor(parts: {
    clusters: readonly Cluster[];
    nodegroups: readonly Nodegroup[];
    gpus: readonly Gpu[];
    namespaces: readonly Namespace[];
    queues: readonly Queue[];
  }) {
    this.clusters = parts.clusters;
    this.nodegroups = parts.nodegroups;
    this.gpus = parts.gpus;
    this.namespaces = parts.namespaces;
    this.queues = parts.queues;

    this.nodegroupById = new Map(parts.nodegroups.map((ng) => [ng.id, ng]));
    this.gpuByUuid = new Map(parts.gpus.map((gpu) => [gpu.uuid, gpu]));
    this.queueById = new Map(parts.queues.map((q) => [q.id, q]));
    this.clusterIds = new Set(parts.clusters.map((c) => c.id));
    this.namespaceIds = new Set(parts.namespaces.map((ns) => ns.id));

    const problems = this.checkIntegrity();
    if (problems.length > 0) {
      throw new ConfigurationError("Inconsistent entity catalog", problems);
    }
  }

  getNodegroup(id: string): Nodegroup | undefined {
    return this.nodegroupById.get(id);
  }

  getGpu(uuid: string): Gpu | undefined {
    return this.gpuByUuid.get(uuid);
  }

  getQueue(id: string): Queue | undefined {
    return this.queueById.get(id);
  }

  hasCluster(id: string): boolean {
    return this.clusterIds.has(id);
  }

  hasNamespace(id: string): boolean {
    return this.namespaceIds.has(id);
  }

  gpusIn(nodegroupId: string): Gpu[] {
    return this.gpus.filter((gpu) => gpu.nodegroupId === nodegroupId);
  }

  queuesTargeting(nodegroupId: string): Queue[] {
    return this.queues.filter((q) => q.targetNodegroupId === nodegroupId);
  }

  /** SHA-256 over the canonical JSON of every entity, in catalog order. */
  fingerprint(): string {
    const canonical = JSON.stringify({
      clusters: this.clusters.map((c) => [c.id, c.region]),
      nodegroups: this.nodegroups.map((ng) => [
        ng.id,
        ng.clusterId,
        ng.gpuModel,
        ng.capacityGpuCount,
        ng.allocatableGpuCount,
      ]),
      gpus: this.gpus.map((gpu) => [gpu.uuid, gpu.nodegroupId, gpu.model, gpu.index]),
      namespaces: this.namespaces.map((ns) => ns.id),
      queues: this.queues.map((q) => [q.id, q.namespaceId, q.targetNodegroupId]),
    });
    return createHash("sha256").update(canonical).digest("hex");
  }

  private checkIntegrity(): string[] {
    const problems: string[] = [];
    for (const ng of this.nodegroups) {
      if (!this.clusterIds.has(ng.clusterId)) {
        problems.push(`nodegroup ${ng.id} references unknown cluster ${ng.clusterId}`);
      }
      if (ng.allocatableGpuCount > ng.capacityGpuCount) {
        problems.push(`nodegroup ${ng.id} allocatable ${ng.allocatableGpuCount} exceeds capacity ${ng.capacityGpuCount}`);
      }
      const gpuCount = this.gpus.filter((gpu) => gpu.nodegroupId === ng.id).length;
      if (gpuCount !== ng.capacityGpuCount) {
        problems.push(`nodegroup ${ng.id} has ${gpuCount} GPUs but capacity ${ng.capacityGpuCount}`);
      }
    }
    for (const gpu of this.gpus) {
      const ng = this.nodegroupById.get(gpu.nodegroupId);
      if (!ng) {
        problems.push(`gpu ${gpu.uuid} references unknown nodegroup ${gpu.nodegroupId}`);
      } else if (ng.gpuModel !== gpu.model) {
        problems.push(`gpu ${gpu.uuid} is ${gpu.model} but nodegroup ${ng.id} is ${ng.gpuModel}`);
      }
    }
    if (this.gpuByUuid.size !== this.gpus.length) {
      problems.push("gpu uuids are not unique");
    }
    for (const q of this.queues) {
      if (!this.nodegroupById.has(q.targetNodegroupId)) {
        problems.push(`queue ${q.id} references unknown nodegroup ${q.targetNodegroupId}`);
      }
      if (!this.namespaceIds.has(q.namespaceId)) {
        problems.push(`queue ${q.id} references unknown namespace ${q.namespaceId}`);
      }
    }
    return problems;
  }
}

/**
 * GPU uuids for a nodegroup's slots, in index order.
 * DETERMINISTIC: depends on the nodegroup and slot count only, never on the run seed.
 */
export function gpuUuids(nodegroupId: string, count: number): string[] {
  const stream = new RandomStream(hashString(nodegroupId));
  return Array.from({ length: count }, () => `GPU-${stream.uuid()}`);
}

/** Build the catalog for a run with `gpuCount` physical GPUs. */
export function buildCatalog(gpuCount: number): EntityCatalog {
  const capacities = distributeGpus(
    gpuCount,
    NODEGROUP_TEMPLATES.map((t) => t.baseGpuCount),
  );

  const nodegroups: Nodegroup[] = NODEGROUP_TEMPLATES.map((template, i) => ({
    id: template.id,
    clusterId: template.clusterId,
    gpuModel: template.gpuModel,
    capacityGpuCount: capacities[i],
    allocatableGpuCount: Math.max(1, Math.floor(capacities[i] * ALLOCATABLE_FRACTION)),
  }));

  const gpus: Gpu[] = nodegroups.flatMap((ng) =>
    gpuUuids(ng.id, ng.capacityGpuCount).map((uuid, index) => ({
      uuid,
      nodegroupId: ng.id,
      model: ng.gpuModel,
      index,
    })),
  );

  return new EntityCatalog({
    clusters: CLUSTERS,
    nodegroups,
    gpus,
    namespaces: NAMESPACES,
    queues: QUEUES,
  });
}
