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
 * Command-line entry point.
 *
 * Usage:
 *   tsx src/cli.ts --seed 42 --days 7 --scenario balanced --gpus 184 --output data/synthetic
 *   tsx src/cli.ts --list-scenarios
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import { IMBALANCE_SEVERITIES } from "@/analysis/imbalance";
import { EFFICIENCY_CLASSES } from "@/analysis/metrics";
import { summarizeDataset, type DatasetSummary } from "@/analysis/aggregations";
import type { GenerateOptionsInput } from "@/lib/config";
import { ConfigurationError, formatViolation, MetricRangeError, ValidationFailure } from "@/lib/errors";
import { logError } from "@/lib/logger";
import { DEFAULT_GPU_SPECS } from "@/telemetry/catalog/gpu-specs";
import { generateDataset } from "@/telemetry/pipeline";
import { getScenarioProfile, listScenarios } from "@/telemetry/seed/scenarios";

const USAGE = `Usage: gpu-telemetry [options]

Options:
  --seed <n>            Run seed (default 42)
  --days <n>            Days to generate (default 7)
  --scenario <name>     Scenario profile (default balanced)
  --gpus <n>            Total GPU count (default 184)
  --output <dir>        Output directory (default data/synthetic)
  --step-seconds <n>    Sample interval in seconds (default 60)
  --start <iso>         First sample timestamp
  --list-scenarios      Print available scenarios and exit
  --summary             Print run-level derived metrics after writing
  -h, --help            Show this help`;

/** Numeric flags stay strings until zod sees them; NaN is rejected there. */
function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

export function parseCliArgs(argv: string[]): {
  options: GenerateOptionsInput;
  listScenarios: boolean;
  summary: boolean;
  help: boolean;
} {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    options: {
      seed: { type: "string" },
      days: { type: "string" },
      scenario: { type: "string" },
      gpus: { type: "string" },
      output: { type: "string" },
      "step-seconds": { type: "string" },
      start: { type: "string" },
      "list-scenarios": { type: "boolean", default: false },
      summary: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const options: GenerateOptionsInput = {};
  const seed = toNumber(values.seed);
  const days = toNumber(values.days);
  const gpuCount = toNumber(values.gpus);
  const stepSeconds = toNumber(values["step-seconds"]);
  if (seed !== undefined) options.seed = seed;
  if (days !== undefined) options.days = days;
  if (gpuCount !== undefined) options.gpuCount = gpuCount;
  if (stepSeconds !== undefined) options.stepSeconds = stepSeconds;
  if (values.output !== undefined) options.outputDir = values.output;
  if (values.start !== undefined) options.startTime = values.start;

  if (values.scenario !== undefined) options.scenario = getScenarioProfile(values.scenario).name;

  return {
    options,
    listScenarios: values["list-scenarios"] ?? false,
    summary: values.summary ?? false,
    help: values.help ?? false,
  };
}

function formatSummary(summary: DatasetSummary): string {
  const fixed = (v: number, digits = 2) => v.toFixed(digits);
  const lines = [
    "Summary:",
    `  mean gpu util        ${fixed(summary.meanGpuUtilPct, 1)}%`,
    `  mean PIF             ${fixed(summary.meanPif, 3)}`,
    `  mean RFU             ${fixed(summary.meanRfuPct, 1)}%`,
    `  mean efficiency gap  ${fixed(summary.meanEfficiencyGap, 1)} pts`,
    `  mean memory pressure ${fixed(summary.meanMemoryPressurePct, 1)}%`,
    `  mean pending         ${fixed(summary.meanPendingWorkloads, 1)}`,
    `  mean admission wait  ${fixed(summary.meanAdmissionWaitSeconds, 1)}s`,
    `  mean CIS             ${fixed(summary.meanCompositeImbalance, 3)}`,
    `  efficiency classes   ${EFFICIENCY_CLASSES.map((c) => `${c}=${summary.efficiencyClasses[c]}`).join(" ")}`,
    `  severities           ${IMBALANCE_SEVERITIES.map((s) => `${s}=${summary.severities[s]}`).join(" ")}`,
  ];
  return lines.join("\n");
}

function describeError(error: unknown): string {
  if (error instanceof ValidationFailure) {
    return [`${error.violations.length} validation violation(s):`, ...error.violations.map(formatViolation)].join("\n  ");
  }
  if (error instanceof ConfigurationError || error instanceof MetricRangeError) {
    return `${error.name}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export async function main(argv: string[]): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      process.stdout.write(`${USAGE}\n`);
      return 0;
    }
    if (args.listScenarios) {
      for (const [name, description] of Object.entries(listScenarios())) {
        process.stdout.write(`${name.padEnd(26)}${description}\n`);
      }
      return 0;
    }

    const { dataset, manifest } = await generateDataset(args.options);
    process.stdout.write(
      `Generated scenario '${manifest.scenario}' (seed ${manifest.seed}): ` +
        `${manifest.row_counts.demand} demand, ${manifest.row_counts.capacity} capacity, ` +
        `${manifest.row_counts.nodepool_state} nodepool rows\n`,
    );
    if (args.summary) {
      process.stdout.write(`${formatSummary(summarizeDataset(dataset, DEFAULT_GPU_SPECS))}\n`);
    }
    return 0;
  } catch (error) {
    logError(describeError(error));
    return 1;
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logError(describeError(error));
      process.exitCode = 1;
    },
  );
}
