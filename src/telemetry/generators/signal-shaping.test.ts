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

import { MetricRangeError } from "@/lib/errors";

import {
  clip,
  clipRounded,
  DECOUPLED_POWER_FRACTION,
  loadCurve,
  powerFraction,
  roundTo,
  tensorActivity,
  tensorAffinity,
} from "./signal-shaping";

const ctx = { entity: "GPU-test", metric: "gpu_util_pct", timestamp: "2026-01-20T00:00:00.000Z" };

describe("loadCurve", () => {
  it("crosses zero at 09:00, peaks at 15:00 and bottoms at 03:00", () => {
    expect(loadCurve(9)).toBe(0);
    expect(loadCurve(15)).toBeCloseTo(1, 12);
    expect(loadCurve(3)).toBeCloseTo(-1, 12);
  });

  it("averages to zero over a day", () => {
    let sum = 0;
    for (let h = 0; h < 24; h += 0.25) sum += loadCurve(h);
    expect(sum / 96).toBeCloseTo(0, 10);
  });
});

describe("clip", () => {
  it("clamps into range", () => {
    expect(clip(120, 0, 100, ctx)).toBe(100);
    expect(clip(-3, 0, 100, ctx)).toBe(0);
    expect(clip(42.5, 0, 100, ctx)).toBe(42.5);
  });

  it("throws on non-finite values", () => {
    expect(() => clip(Number.NaN, 0, 100, ctx)).toThrow(MetricRangeError);
    expect(() => clip(Infinity, 0, 100, ctx)).toThrow("GPU-test/gpu_util_pct at 2026-01-20T00:00:00.000Z: value is not finite");
  });

  it("throws on an empty range", () => {
    expect(() => clip(5, 10, 0, ctx)).toThrow("empty valid range [10, 0]");
  });
});

describe("powerFraction", () => {
  it("tracks utilization when coupled", () => {
    expect(powerFraction(80, 0)).toBeCloseTo(0.8, 12);
  });

  it("pins to the decoupled floor when fully decoupled", () => {
    expect(powerFraction(80, 1)).toBeCloseTo(DECOUPLED_POWER_FRACTION, 12);
  });

  it("blends in between", () => {
    expect(powerFraction(50, 0.5)).toBeCloseTo(0.3, 12);
  });
});

describe("tensor activity", () => {
  it("favours training nodegroups", () => {
    expect(tensorAffinity("ml-training-h100")).toBe(0.85);
    expect(tensorAffinity("research-a100")).toBe(0.35);
  });

  it("scales with utilization and coupling", () => {
    expect(tensorActivity(80, 0, 0.85)).toBeCloseTo(68, 10);
    expect(tensorActivity(80, 0.5, 0.85)).toBeCloseTo(34, 10);
  });
});

describe("roundTo", () => {
  it("rounds to the given decimals", () => {
    expect(roundTo(3.14159, 2)).toBe(3.14);
    expect(roundTo(2.5, 0)).toBe(3);
    expect(roundTo(17.04, 1)).toBe(17);
  });
});

describe("clipRounded", () => {
  it("rounds values inside the range", () => {
    expect(clipRounded(42.456, 0, 100, 1, ctx)).toBe(42.5);
  });

  it("never rounds past a bound that is finer than the decimals", () => {
    // 99.996 would round up to 100.00
    expect(clipRounded(99.996, 0, 99.995, 2, ctx)).toBe(99.99);
    expect(clipRounded(100, 0, 99.995, 2, ctx)).toBe(99.99);
    expect(clipRounded(-1, 0.004, 10, 2, ctx)).toBe(0.01);
  });

  it("throws when no value at the given decimals fits the range", () => {
    expect(() => clipRounded(300, 299.996, 299.996, 2, ctx)).toThrow(MetricRangeError);
    expect(() => clipRounded(300, 299.996, 299.996, 2, ctx)).toThrow(
      "no 2-decimal value within [299.996, 299.996]",
    );
  });
});
