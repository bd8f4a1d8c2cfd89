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
 * Imbalance Scores
 *
 * DCR = pending / (available + eps)
 * QPS = w_pending * norm(pending) + w_wait * norm(wait)
 * CIS = w_dcr * norm(DCR) + w_gap * norm(max(gap, 0)) + w_qps * QPS
 *
 * Normalization is done by the caller over whatever set it is scoring, so
 * these functions take already-normalized inputs.
 */

export type ImbalanceSeverity = "Critical" | "Warning" | "Moderate" | "Healthy";

export const IMBALANCE_SEVERITIES: readonly ImbalanceSeverity[] = ["Critical", "Warning", "Moderate", "Healthy"];

export interface ImbalanceWeights {
  queuePressure: { pending: number; wait: number };
  composite: { dcr: number; gap: number; qps: number };
}

export const DEFAULT_IMBALANCE_WEIGHTS: Readonly<ImbalanceWeights> = Object.freeze({
  queuePressure: { pending: 0.6, wait: 0.4 },
  composite: { dcr: 0.5, gap: 0.3, qps: 0.2 },
});

export const DCR_EPSILON = 1e-6;

export function demandCapacityRatio(pending: number, available: number, epsilon = DCR_EPSILON): number {
  return pending / (available + epsilon);
}

export function queuePressureScore(
  normPending: number,
  normWait: number,
  weights: ImbalanceWeights["queuePressure"] = DEFAULT_IMBALANCE_WEIGHTS.queuePressure,
): number {
  return weights.pending * normPending + weights.wait * normWait;
}

export function compositeImbalanceScore(
  normDcr: number,
  normGap: number,
  qps: number,
  weights: ImbalanceWeights["composite"] = DEFAULT_IMBALANCE_WEIGHTS.composite,
): number {
  return weights.dcr * normDcr + weights.gap * normGap + weights.qps * qps;
}

/**
 * Severity from CIS, escalated by a raw DCR over 1 (Warning) or 2 (Critical).
 */
export function classifyImbalanceSeverity(cis: number, dcr: number): ImbalanceSeverity {
  if (cis > 0.7 || dcr > 2) return "Critical";
  if (cis > 0.5 || dcr > 1) return "Warning";
  if (cis > 0.3) return "Moderate";
  return "Healthy";
}
