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


import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { joinByNodegroup } from "@/analysis/aggregations";
import { demandCapacityRatio } from "@/analysis/imbalance";
import { powerIntensityFactor } from "@/analysis/metrics";
import { ConfigurationError, MetricRangeError, ValidationFailure } from "@/lib/errors";
import { DEFAULT_GPU_SPECS, findGpuSpec, type GpuSpecRegistry } from "@/telemetry/catalog/gpu-specs";
import type { CapacityRow, DemandRow } from "@/telemetry/schemas";

import { generateDataset, synthesizeDataset } from "./pipeline";
import { OUTPUT_FILES } from "./writer";

function mean(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Ordinary least-squares slope of y over x. */
function olsSlope(xs: readonly number[], ys: readonly number[]): number {
  const mx = mean(xs);
  const my = mean(ys);
  let num = 0;
  let den = 0;
  for (let i = 0; i < xs.length; i++) {
    num += (xs[i] - mx) * (ys[i] - my);
    den += (xs[i] - mx) ** 2;
  }
  return num / den;
}

function pif(row: CapacityRow): number {
  const spec = findGpuSpec(DEFAULT_GPU_SPECS, row.gpu_model);
  return spec ? powerIntensityFactor(row.power_usage_watts, spec) : Number.NaN;
}

/** A10G pinned to a power level that two-decimal rounding cannot represent */
const unroundable: GpuSpecRegistry = {
  ...DEFAULT_GPU_SPECS,
  "NVIDIA A10G": { ...DEFAULT_GPU_SPECS["NVIDIA A10G"], idlePowerWatts: 299.996, maxPowerWatts: 299.996 },
};

/** A10G with half a megabyte of memory: fb_free_mb can never be a whole number */
const fractionalMemory: GpuSpecRegistry = {
  ...DEFAULT_GPU_SPECS,
  "NVIDIA A10G": { ...DEFAULT_GPU_SPECS["NVIDIA A10G"], memoryTotalMb: 24_576.5 },
};

describe("synthesizeDataset", () => {
  it("is deterministic for the same options", () => {
    const options = { seed: 9, days: 1, gpuCount: 12, stepSeconds: 1800 };
    const a = synthesizeDataset(options);
    const b = synthesizeDataset(options);
    expect(a.dataset).toEqual(b.dataset);
    expect(a.manifest).toEqual(b.manifest);
  });

  it("throws when a limit leaves no representable reading", () => {
    const options = { days: 1, gpuCount: 5, stepSeconds: 3600 };
    expect(() => synthesizeDataset(options, unroundable)).toThrow(MetricRangeError);
    expect(() => synthesizeDataset(options, unroundable)).toThrow("no 2-decimal value within [299.996, 299.996]");
  });

  it("changes values, not the catalog, with the seed", () => {
    const a = synthesizeDataset({ seed: 1, days: 1, gpuCount: 12, stepSeconds: 1800 });
    const b = synthesizeDataset({ seed: 2, days: 1, gpuCount: 12, stepSeconds: 1800 });
    expect(a.dataset.capacity).not.toEqual(b.dataset.capacity);
    expect(a.manifest.catalog_fingerprint).toBe(b.manifest.catalog_fingerprint);
  });

  it("rejects bad options before generating", () => {
    expect(() => synthesizeDataset({ scenario: "chaos" })).toThrow(ConfigurationError);
  });

  it("reports validation problems instead of throwing", () => {
    // One A10G at hourly steps: rows 48 to 71
    const result = synthesizeDataset({ days: 1, gpuCount: 5, stepSeconds: 3600 }, fractionalMemory);
    expect(result.validation.valid).toBe(false);
    expect(result.validation.violations).toHaveLength(24);
    expect(result.validation.violations.every((v) => v.table === "capacity" && v.field === "fb_free_mb")).toBe(true);
    expect(result.validation.violations[0]).toMatchObject({ row: 48, entity: result.dataset.capacity[48].gpu_uuid });
  });
});

describe.each([600, 60])("scenario shapes at %s-second steps", (stepSeconds) => {
  const options = { seed: 42, days: 1, gpuCount: 184, stepSeconds };
  const samples = 86_400 / stepSeconds;

  it("balanced: moderate utilization and demand below capacity", () => {
    const { dataset, consistency } = synthesizeDataset({ ...options, scenario: "balanced" });
    expect(consistency.pendingAdjusted).toBe(0);
    const util = mean(dataset.capacity.map((r) => r.gpu_util_pct));
    expect(util).toBeGreaterThanOrEqual(40);
    expect(util).toBeLessThanOrEqual(80);

    const byTimestamp = new Map<string, { pending: number; available: number }>();
    for (const sample of joinByNodegroup(dataset, DEFAULT_GPU_SPECS)) {
      const t = byTimestamp.get(sample.timestamp) ?? { pending: 0, available: 0 };
      t.pending += sample.pendingWorkloads;
      t.available += sample.availableCapacity;
      byTimestamp.set(sample.timestamp, t);
    }
    const ratios = [...byTimestamp.values()].map((t) => t.pending / (t.available + 1e-6));
    expect(ratios).toHaveLength(samples);
    expect(ratios.filter((r) => r < 1).length / ratios.length).toBeGreaterThanOrEqual(0.95);
  });

  it("demand_exceeds_capacity: pending grows on every nodegroup", () => {
    const { dataset, grid, consistency } = synthesizeDataset({ ...options, scenario: "demand_exceeds_capacity" });
    expect(consistency.pendingAdjusted).toBe(0);
    const hours = new Map(grid.samples.map((s) => [s.iso, s.elapsedHours]));
    const byNodegroup = new Map<string, DemandRow[]>();
    for (const row of dataset.demand) {
      byNodegroup.set(row.nodegroup, [...(byNodegroup.get(row.nodegroup) ?? []), row]);
    }
    expect(byNodegroup.size).toBe(5);
    for (const rows of byNodegroup.values()) {
      const slope = olsSlope(
        rows.map((r) => hours.get(r.timestamp) ?? Number.NaN),
        rows.map((r) => r.pending_workloads),
      );
      expect(slope).toBeGreaterThan(0);
    }
  });

  it("io_bottleneck: high utilization at low power intensity", () => {
    const { dataset, consistency } = synthesizeDataset({ ...options, scenario: "io_bottleneck" });
    expect(consistency.pendingAdjusted).toBe(0);
    expect(mean(dataset.capacity.map((r) => r.gpu_util_pct))).toBeGreaterThan(70);
    expect(mean(dataset.capacity.map(pif))).toBeLessThan(0.5);
  });

  it("capacity_fragmentation: low utilization with queued work", () => {
    const frag = synthesizeDataset({ ...options, scenario: "capacity_fragmentation" });
    const balanced = synthesizeDataset({ ...options, scenario: "balanced" });
    expect(frag.consistency.pendingAdjusted).toBe(0);
    expect(mean(frag.dataset.capacity.map((r) => r.gpu_util_pct))).toBeLessThan(45);
    expect(mean(frag.dataset.demand.map((r) => r.pending_workloads))).toBeGreaterThan(
      mean(balanced.dataset.demand.map((r) => r.pending_workloads)),
    );
    // Reported inventory is not reduced by fragmentation
    expect(frag.dataset.nodepoolState).toEqual(balanced.dataset.nodepoolState);
  });
});

describe("balanced demand per nodegroup sample", () => {
  it("keeps nearly every nodegroup below capacity at the default step", () => {
    const { dataset } = synthesizeDataset({ seed: 42, days: 1, gpuCount: 20, scenario: "balanced" });
    const ratios = joinByNodegroup(dataset, DEFAULT_GPU_SPECS).map((s) =>
      demandCapacityRatio(s.pendingWorkloads, s.availableCapacity),
    );
    expect(ratios).toHaveLength(5 * 1440);
    expect(ratios.filter((r) => r < 1).length / ratios.length).toBeGreaterThanOrEqual(0.95);
  });
});

describe("generateDataset", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), "gpu-telemetry-pipeline-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("generates one day of the balanced scenario end to end", async () => {
    const outputDir = path.join(workDir, "synthetic");
    const result = await generateDataset({ seed: 42, days: 1, scenario: "balanced", gpuCount: 20, outputDir });

    expect(result.validation).toEqual({ valid: true, violations: [] });
    expect(result.dataset.capacity).toHaveLength(20 * 1440);
    expect(result.dataset.demand).toHaveLength(6 * 1440);
    expect(result.dataset.nodepoolState).toHaveLength(5);
    expect(result.manifest).toMatchObject({
      seed: 42,
      scenario: "balanced",
      days: 1,
      step_seconds: 60,
      gpu_count: 20,
      start_time: "2026-01-20T00:00:00.000Z",
      end_time: "2026-01-20T23:59:00.000Z",
      row_counts: { demand: 8640, capacity: 28_800, nodepool_state: 5 },
    });

    const manifest: unknown = JSON.parse(await readFile(path.join(outputDir, OUTPUT_FILES.manifest), "utf8"));
    expect(manifest).toEqual(result.manifest);
    const capacityLines = (await readFile(path.join(outputDir, OUTPUT_FILES.capacity), "utf8")).trimEnd().split("\n");
    expect(capacityLines).toHaveLength(28_801);
  });

  it("writes byte-identical files for the same options", async () => {
    const options = { seed: 9, days: 1, gpuCount: 12, stepSeconds: 1800 };
    await generateDataset({ ...options, outputDir: path.join(workDir, "a") });
    await generateDataset({ ...options, outputDir: path.join(workDir, "b") });
    for (const file of Object.values(OUTPUT_FILES)) {
      const a = await readFile(path.join(workDir, "a", file));
      const b = await readFile(path.join(workDir, "b", file));
      expect(a.length).toBeGreaterThan(0);
      expect(a.equals(b)).toBe(true);
    }
  });

  it("leaves tables without a manifest when validation fails", async () => {
    const outputDir = path.join(workDir, "broken");
    await expect(
      generateDataset({ days: 1, gpuCount: 5, stepSeconds: 3600, outputDir }, fractionalMemory),
    ).rejects.toBeInstanceOf(ValidationFailure);
    expect((await readdir(outputDir)).sort()).toEqual(
      [OUTPUT_FILES.capacity, OUTPUT_FILES.demand, OUTPUT_FILES.nodepoolState].sort(),
    );
  });

  it("writes nothing for invalid options", async () => {
    const outputDir = path.join(workDir, "never");
    await expect(generateDataset({ days: 0, outputDir })).rejects.toBeInstanceOf(ConfigurationError);
    expect(await readdir(workDir)).toEqual([]);
  });
});
