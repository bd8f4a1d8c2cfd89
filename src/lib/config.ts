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
 * Generation Options
 *
 * All run inputs are resolved and validated here before synthesis starts.
 */

import { z } from "zod";

import { ConfigurationError } from "@/lib/errors";
import { SCENARIO_NAMES } from "@/telemetry/seed/scenarios";

// =============================================================================
// Defaults
// =============================================================================

export const SECONDS_PER_DAY = 86_400;

export const DEFAULT_SEED = 42;
export const DEFAULT_DAYS = 7;
export const DEFAULT_GPU_COUNT = 184;
export const DEFAULT_STEP_SECONDS = 60;
export const DEFAULT_START_TIME = "2026-01-20T00:00:00.000Z";
export const DEFAULT_OUTPUT_DIR = "data/synthetic";

/** One GPU per nodegroup is the smallest catalog that can be built */
export const MIN_GPU_COUNT = 5;
export const MAX_GPU_COUNT = 10_000;
export const MAX_DAYS = 90;

// =============================================================================
// Schema
// =============================================================================

export const GenerateOptionsSchema = z.object({
  seed: z
    .number()
    .int()
    .min(0)
    .max(2 ** 32 - 1)
    .default(DEFAULT_SEED),
  days: z.number().int().min(1).max(MAX_DAYS).default(DEFAULT_DAYS),
  scenario: z.enum(SCENARIO_NAMES).default("balanced"),
  gpuCount: z.number().int().min(MIN_GPU_COUNT).max(MAX_GPU_COUNT).default(DEFAULT_GPU_COUNT),
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  stepSeconds: z
    .number()
    .int()
    .positive()
    .refine((step) => SECONDS_PER_DAY % step === 0, { message: "must divide 86400 evenly" })
    .default(DEFAULT_STEP_SECONDS),
  startTime: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), { message: "must be an ISO-8601 timestamp" })
    .default(DEFAULT_START_TIME),
});

export type GenerateOptionsInput = z.input<typeof GenerateOptionsSchema>;
export type GenerateOptions = z.output<typeof GenerateOptionsSchema>;

/**
 * Validate raw options, filling defaults.
 * Throws ConfigurationError with one entry per offending field.
 */
export function parseGenerateOptions(input: unknown = {}): GenerateOptions {
  const result = GenerateOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`);
    throw new ConfigurationError("Invalid generation options", issues);
  }
  return result.data;
}
