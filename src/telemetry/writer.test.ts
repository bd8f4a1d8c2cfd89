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


import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { synthesizeDataset } from "@/telemetry/pipeline";
import { CAPACITY_COLUMNS, DEMAND_COLUMNS, NODEPOOL_STATE_COLUMNS } from "@/telemetry/schemas";

import { formatCsvCell, formatCsvLine, OUTPUT_FILES, writeDataset, writeTables } from "./writer";

const run = synthesizeDataset({ seed: 5, days: 1, gpuCount: 5, stepSeconds: 3600 });

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(path.join(os.tmpdir(), "gpu-telemetry-writer-"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe("CSV formatting", () => {
  it("leaves plain cells alone", () => {
    expect(formatCsvCell("ml-training-h100")).toBe("ml-training-h100");
    expect(formatCsvCell(42.5)).toBe("42.5");
    expect(formatCsvCell(0)).toBe("0");
  });

  it("quotes cells containing separators, quotes or newlines", () => {
    expect(formatCsvCell("a,b")).toBe('"a,b"');
    expect(formatCsvCell('say "hi"')).toBe('"say ""hi"""');
    expect(formatCsvCell("two\nlines")).toBe('"two\nlines"');
  });

  it("orders cells by the column list", () => {
    expect(formatCsvLine(["b", "a"], { a: 1, b: "x" })).toBe("x,1");
  });
});

describe("writeDataset", () => {
  it("writes every table and the manifest", async () => {
    const outputDir = path.join(workDir, "out");
    await writeDataset(outputDir, run.dataset, run.manifest);

    expect((await readdir(outputDir)).sort()).toEqual(
      [OUTPUT_FILES.capacity, OUTPUT_FILES.demand, OUTPUT_FILES.manifest, OUTPUT_FILES.nodepoolState].sort(),
    );

    const demand = (await readFile(path.join(outputDir, OUTPUT_FILES.demand), "utf8")).split("\n");
    expect(demand[0]).toBe(DEMAND_COLUMNS.join(","));
    expect(demand).toHaveLength(run.dataset.demand.length + 2);
    expect(demand[demand.length - 1]).toBe("");

    const capacity = (await readFile(path.join(outputDir, OUTPUT_FILES.capacity), "utf8")).split("\n");
    expect(capacity[0]).toBe(CAPACITY_COLUMNS.join(","));
    expect(capacity[1]).toBe(formatCsvLine(CAPACITY_COLUMNS, run.dataset.capacity[0]));

    const nodepool = (await readFile(path.join(outputDir, OUTPUT_FILES.nodepoolState), "utf8")).trimEnd().split("\n");
    expect(nodepool).toEqual([
      NODEPOOL_STATE_COLUMNS.join(","),
      "ml-training-h100,gen-ai-cluster-1,NVIDIA H100 80GB HBM3,1,1",
      "ml-training-a100,gen-ai-cluster-1,NVIDIA A100-SXM4-40GB,1,1",
      "ml-inference-a10g,gen-ai-cluster-3,NVIDIA A10G,1,1",
      "research-a100,gen-ai-cluster-2,NVIDIA A100-SXM4-40GB,1,1",
      "research-h100,gen-ai-cluster-2,NVIDIA H100 80GB HBM3,1,1",
    ]);

    const manifestText = await readFile(path.join(outputDir, OUTPUT_FILES.manifest), "utf8");
    expect(manifestText).toBe(`${JSON.stringify(run.manifest, null, 2)}\n`);
  });

  it("leaves no staging directory behind", async () => {
    await writeDataset(path.join(workDir, "out"), run.dataset, run.manifest);
    expect(await readdir(workDir)).toEqual(["out"]);
  });

  it("overwrites a previous dataset in place", async () => {
    const outputDir = path.join(workDir, "out");
    await writeDataset(outputDir, run.dataset, run.manifest);
    const other = synthesizeDataset({ seed: 6, days: 1, gpuCount: 5, stepSeconds: 3600 });
    await writeDataset(outputDir, other.dataset, other.manifest);
    const manifest: unknown = JSON.parse(await readFile(path.join(outputDir, OUTPUT_FILES.manifest), "utf8"));
    expect(manifest).toMatchObject({ seed: 6 });
  });

  it("cleans up and writes nothing when the output path is unusable", async () => {
    const blocker = path.join(workDir, "out");
    await writeFile(blocker, "not a directory");
    await expect(writeDataset(blocker, run.dataset, run.manifest)).rejects.toThrow();
    expect(await readdir(workDir)).toEqual(["out"]);
    expect(await readFile(blocker, "utf8")).toBe("not a directory");
  });
});

describe("writeTables", () => {
  it("writes tables without a manifest and drops a stale one", async () => {
    const outputDir = path.join(workDir, "out");
    await writeDataset(outputDir, run.dataset, run.manifest);
    await writeTables(outputDir, run.dataset);
    expect((await readdir(outputDir)).sort()).toEqual(
      [OUTPUT_FILES.capacity, OUTPUT_FILES.demand, OUTPUT_FILES.nodepoolState].sort(),
    );
  });
});
