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
 * Signal Shaping
 *
 * Trend, coupling and clipping primitives shared by the demand and capacity
 * generators. Everything here is a pure function of its arguments.
 */

import { MetricRangeError, type MetricContext } from "@/lib/errors";

/** Hour of day at which the diurnal load curve crosses zero on its way up */
export const LOAD_CURVE_PHASE_HOURS = 9;

/** Power fraction a fully decoupled GPU settles at, regardless of utilization */
export const DECOUPLED_POWER_FRACTION = 0.1;

/** Tensor-core share of utilization for training nodegroups vs everything else */
export const TRAINING_TENSOR_AFFINITY = 0.85;
export const DEFAULT_TENSOR_AFFINITY = 0.35;

/**
 * Shared diurnal load curve in [-1, 1].
 * Every entity reads the same curve, which correlates demand and capacity
 * across the whole cluster.
 */
export function loadCurve(hourOfDay: number): number {
  return Math.sin((2 * Math.PI * (hourOfDay - LOAD_CURVE_PHASE_HOURS)) / 24);
}

/**
 * Clip `value` into [min, max].
 * Throws MetricRangeError when the range is empty or the value is not a number.
 */
export function clip(value: number, min: number, max: number, context: MetricContext): number {
  if (!Number.isFinite(value)) {
    throw new MetricRangeError("value is not finite", context, value);
  }
  if (!(min <= max)) {
    throw new MetricRangeError(`empty valid range [${min}, ${max}]`, context, value);
  }
  return Math.min(max, Math.max(min, value));
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Clip into the part of [min, max] that is representable at `decimals`, then
 * round, so the result never leaves [min, max].
 * Throws MetricRangeError when no value at that precision fits.
 */
export function clipRounded(value: number, min: number, max: number, decimals: number, context: MetricContext): number {
  const factor = 10 ** decimals;
  const low = Math.ceil(min * factor) / factor;
  const high = Math.floor(max * factor) / factor;
  if (min <= max && !(low <= high)) {
    throw new MetricRangeError(`no ${decimals}-decimal value within [${min}, ${max}]`, context, value);
  }
  return roundTo(clip(value, low, high, context), decimals);
}

/**
 * Power draw as a fraction of the model's dynamic range (max - idle).
 *
 * decoupling = 0: power follows utilization exactly.
 * decoupling = 1: power sits at DECOUPLED_POWER_FRACTION whatever the utilization.
 */
export function powerFraction(utilizationPct: number, decoupling: number): number {
  const u = utilizationPct / 100;
  return (1 - decoupling) * u + decoupling * DECOUPLED_POWER_FRACTION;
}

export function tensorAffinity(nodegroupId: string): number {
  return nodegroupId.includes("training") ? TRAINING_TENSOR_AFFINITY : DEFAULT_TENSOR_AFFINITY;
}

/** Tensor-core activity implied by utilization under the same decoupling as power. */
export function tensorActivity(utilizationPct: number, decoupling: number, affinity: number): number {
  return utilizationPct * (1 - decoupling) * affinity;
}
