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


import { describe, it, expect } from "vitest";

import { ConfigurationError } from "@/lib/errors";

import { buildCatalog, distributeGpus, EntityCatalog, gpuUuids, NODEGROUP_TEMPLATES, QUEUES } from "./catalog";

const WEIGHTS = NODEGROUP_TEMPLATES.map((t) => t.baseGpuCount);

describe("distributeGpus", () => {
  it("reproduces the base layout at the default count", () => {
    expect(distributeGpus(184, WEIGHTS)).toEqual([32, 48, 64, 24, 16]);
  });

  it("hands leftovers to the largest remainders", () => {
    expect(distributeGpus(20, WEIGHTS)).toEqual([3, 5, 7, 3, 2]);
  });

  it("gives every nodegroup at least one GPU", () => {
    expect(distributeGpus(5, WEIGHTS)).toEqual([1, 1, 1, 1, 1]);
  });

  it("always sums to the total", () => {
    for (const total of [5, 6, 7, 13, 99, 184, 1000, 4321]) {
      const counts = distributeGpus(total, WEIGHTS);
      expect(counts.reduce((a, b) => a + b, 0)).toBe(total);
      expect(Math.min(...counts)).toBeGreaterThanOrEqual(1);
    }
  });

  it("throws when there are fewer GPUs than nodegroups", () => {
    expect(() => distributeGpus(4, WEIGHTS)).toThrow(ConfigurationError);
  });
});

describe("buildCatalog", () => {
  it("builds the fixed topology", () => {
    const catalog = buildCatalog(184);
    expect(catalog.clusters).toHaveLength(3);
    expect(catalog.nodegroups).toHaveLength(5);
    expect(catalog.namespaces).toHaveLength(6);
    expect(catalog.queues).toHaveLength(6);
    expect(catalog.gpus).toHaveLength(184);
  });

  it("sets allocatable to 95% of capacity, rounded down", () => {
    const catalog = buildCatalog(20);
    expect(catalog.nodegroups.map((ng) => ng.capacityGpuCount)).toEqual([3, 5, 7, 3, 2]);
    expect(catalog.nodegroups.map((ng) => ng.allocatableGpuCount)).toEqual([2, 4, 6, 2, 1]);
  });

  it("keeps at least one allocatable GPU per nodegroup", () => {
    const catalog = buildCatalog(5);
    expect(catalog.nodegroups.every((ng) => ng.allocatableGpuCount === 1)).toBe(true);
  });

  it("gives every GPU its nodegroup's model", () => {
    const catalog = buildCatalog(40);
    for (const gpu of catalog.gpus) {
      expect(gpu.model).toBe(catalog.getNodegroup(gpu.nodegroupId)?.gpuModel);
    }
  });

  it("resolves queue targets and namespaces", () => {
    const catalog = buildCatalog(20);
    for (const queue of catalog.queues) {
      expect(catalog.getNodegroup(queue.targetNodegroupId)).toBeDefined();
      expect(catalog.hasNamespace(queue.namespaceId)).toBe(true);
    }
    expect(catalog.queuesTargeting("ml-training-a100").map((q) => q.id)).toEqual([
      "training-a100-queue",
      "batch-training-queue",
    ]);
  });

  it("is identical across builds", () => {
    const a = buildCatalog(50);
    const b = buildCatalog(50);
    expect(a.gpus).toEqual(b.gpus);
    expect(a.fingerprint()).toBe(b.fingerprint());
  });

  it("changes the fingerprint with the GPU count", () => {
    expect(buildCatalog(50).fingerprint()).not.toBe(buildCatalog(51).fingerprint());
    expect(buildCatalog(50).fingerprint()).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("gpuUuids", () => {
  it("extends the same sequence as the count grows", () => {
    const three = gpuUuids("ml-training-h100", 3);
    const five = gpuUuids("ml-training-h100", 5);
    expect(five.slice(0, 3)).toEqual(three);
    expect(new Set(five).size).toBe(5);
    expect(three[0]).toMatch(/^GPU-[0-9a-f-]{36}$/);
  });
});

describe("EntityCatalog integrity", () => {
  it("rejects a queue targeting an unknown nodegroup", () => {
    const base = buildCatalog(5);
    expect(
      () =>
        new EntityCatalog({
          clusters: base.clusters,
          nodegroups: base.nodegroups,
          gpus: base.gpus,
          namespaces: base.namespaces,
          queues: [...QUEUES, { id: "orphan-queue", namespaceId: "research", targetNodegroupId: "missing" }],
        }),
    ).toThrow("queue orphan-queue references unknown nodegroup missing");
  });

  it("rejects a GPU count that disagrees with capacity", () => {
    const base = buildCatalog(5);
    expect(
      () =>
        new EntityCatalog({
          clusters: base.clusters,
          nodegroups: base.nodegroups,
          gpus: base.gpus.slice(1),
          namespaces: base.namespaces,
          queues: base.queues,
        }),
    ).toThrow(ConfigurationError);
  });
});
