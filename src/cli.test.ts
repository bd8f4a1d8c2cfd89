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


import { mkdtemp, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { ConfigurationError } from "@/lib/errors";

import { main, parseCliArgs } from "./cli";

describe("parseCliArgs", () => {
  it("maps every flag onto generation options", () => {
    const args = parseCliArgs([
      "--seed",
      "7",
      "--days",
      "2",
      "--scenario",
      "io_bottleneck",
      "--gpus",
      "40",
      "--output",
      "out/run",
      "--step-seconds",
      "300",
      "--start",
      "2026-03-01T00:00:00Z",
      "--summary",
    ]);

    expect(args).toEqual({
      options: {
        seed: 7,
        days: 2,
        scenario: "io_bottleneck",
        gpuCount: 40,
        outputDir: "out/run",
        stepSeconds: 300,
        startTime: "2026-03-01T00:00:00Z",
      },
      listScenarios: false,
      summary: true,
      help: false,
    });
  });

  it("leaves unset flags to the defaults", () => {
    expect(parseCliArgs([]).options).toEqual({});
    expect(parseCliArgs(["-h"]).help).toBe(true);
  });

  it("rejects an unknown scenario", () => {
    expect(() => parseCliArgs(["--scenario", "nope"])).toThrow(ConfigurationError);
  });

  it("rejects an unknown flag", () => {
    expect(() => parseCliArgs(["--bogus"])).toThrow();
  });
});

describe("main", () => {
  let workDir: string;
  let stdout: string[];

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), "gpu-telemetry-cli-"));
    stdout = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
  });

  it("lists the scenarios", async () => {
    expect(await main(["--list-scenarios"])).toBe(0);
    expect(stdout.map((line) => line.split(" ")[0])).toEqual([
      "balanced",
      "demand_exceeds_capacity",
      "capacity_fragmentation",
      "io_bottleneck",
    ]);
  });

  it("prints usage", async () => {
    expect(await main(["--help"])).toBe(0);
    expect(stdout[0].startsWith("Usage: gpu-telemetry [options]")).toBe(true);
  });

  it("exits 1 on invalid options", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(await main(["--days", "0", "--output", workDir])).toBe(1);
    expect(errors).toHaveBeenCalledTimes(1);
    expect(errors).toHaveBeenCalledWith(
      expect.stringMatching(/^\[gpu-telemetry\] ConfigurationError: Invalid generation options: days: /),
    );
    expect(await readdir(workDir)).toEqual([]);
  });

  it("generates a dataset and reports row counts", async () => {
    const output = path.join(workDir, "run");
    const code = await main([
      "--seed",
      "11",
      "--days",
      "1",
      "--gpus",
      "5",
      "--step-seconds",
      "3600",
      "--output",
      output,
      "--summary",
    ]);

    expect(code).toBe(0);
    expect(stdout[0]).toBe("Generated scenario 'balanced' (seed 11): 144 demand, 120 capacity, 5 nodepool rows\n");
    expect(stdout[1].startsWith("Summary:\n")).toBe(true);
    expect((await readdir(output)).sort()).toEqual([
      "capacity.csv",
      "demand.csv",
      "manifest.json",
      "nodepool_state.csv",
    ]);
  });
});
