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
 * Error taxonomy for dataset generation.
 *
 * - ConfigurationError: rejected before any generation starts
 * - MetricRangeError: a value cannot satisfy a hard invariant; aborts the run
 * - ValidationFailure: the validator found one or more violations
 */

// =============================================================================
// Configuration
// =============================================================================

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

// =============================================================================
// Hard invariants
// =============================================================================

export interface MetricContext {
  /** Queue id, GPU uuid or nodegroup id */
  entity: string;
  metric: string;
  /** ISO timestamp, absent for static values */
  timestamp?: string;
}

/**
 * A synthesized or corrected value that cannot be brought into range.
 * Extends the built-in RangeError so callers can catch either.
 */
export class MetricRangeError extends RangeError {
  readonly entity: string;
  readonly metric: string;
  readonly timestamp?: string;
  readonly value: number;

  constructor(reason: string, context: MetricContext, value: number) {
    const at = context.timestamp ? ` at ${context.timestamp}` : "";
    super(`${context.entity}/${context.metric}${at}: ${reason} (value=${value})`);
    this.name = "MetricRangeError";
    this.entity = context.entity;
    this.metric = context.metric;
    this.timestamp = context.timestamp;
    this.value = value;
  }
}

// =============================================================================
// Validation
// =============================================================================

export type TableName = "demand" | "capacity" | "nodepool_state" | "manifest";

export interface Violation {
  table: TableName;
  /** Row index within the table, absent for table-level checks */
  row?: number;
  entity?: string;
  field: string;
  timestamp?: string;
  message: string;
}

export function formatViolation(v: Violation): string {
  const location = [v.table, v.row !== undefined ? `row ${v.row}` : null, v.entity, v.timestamp]
    .filter((part): part is string => part !== null && part !== undefined)
    .join(" ");
  return `[${location}] ${v.field}: ${v.message}`;
}

export class ValidationFailure extends Error {
  readonly violations: Violation[];

  constructor(violations: Violation[]) {
    const preview = violations.slice(0, 5).map(formatViolation).join("\n  ");
    const more = violations.length > 5 ? `\n  ... and ${violations.length - 5} more` : "";
    super(`Dataset validation failed with ${violations.length} violation(s):\n  ${preview}${more}`);
    this.name = "ValidationFailure";
    this.violations = violations;
  }
}
