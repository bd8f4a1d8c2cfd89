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
 * Dataset Writer
 *
 * Persists the three tables as CSV plus manifest.json. Files are written to a
 * staging directory beside the output directory and only moved into place
 * once every file is complete; the manifest moves last and marks the dataset
 * as usable.
 */

import { createWriteStream } from "node:fs";
import { mkdir, mkdtemp, rename, rm, writeFile } from "node:fs/promises";
import { once } from "node:events";
import path from "node:path";
import { finished } from "node:stream/promises";

import { logInfo } from "@/lib/logger";
import {
  CAPACITY_COLUMNS,
  DEMAND_COLUMNS,
  NODEPOOL_STATE_COLUMNS,
  type Dataset,
  type Manifest,
} from "@/telemetry/schemas";

export const OUTPUT_FILES = {
  demand: "demand.csv",
  capacity: "capacity.csv",
  nodepoolState: "nodepool_state.csv",
  manifest: "manifest.json",
} as const;

/** Lines buffered per stream write */
const WRITE_BATCH_LINES = 1000;

// =============================================================================
// CSV
// =============================================================================

export function formatCsvCell(value: string | number): string {
  if (typeof value === "number") {
    return String(value);
  }
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvLine<C extends string>(columns: readonly C[], row: Readonly<Record<C, string | number>>): string {
  return columns.map((column) => formatCsvCell(row[column])).join(",");
}

async function writeCsv<C extends string>(
  filePath: string,
  columns: readonly C[],
  rows: readonly Readonly<Record<C, string | number>>[],
): Promise<void> {
  const stream = createWriteStream(filePath, { encoding: "utf8" });
  try {
    let batch = `${columns.join(",")}\n`;
    let batched = 0;
    for (const row of rows) {
      batch += `${formatCsvLine(columns, row)}\n`;
      if (++batched === WRITE_BATCH_LINES) {
        if (!stream.write(batch)) {
          await once(stream, "drain");
        }
        batch = "";
        batched = 0;
      }
    }
    stream.end(batch);
    await finished(stream);
  } catch (error) {
    stream.destroy();
    throw error;
  }
}

async function writeTablesInto(dir: string, dataset: Dataset): Promise<string[]> {
  await writeCsv(path.join(dir, OUTPUT_FILES.demand), DEMAND_COLUMNS, dataset.demand);
  await writeCsv(path.join(dir, OUTPUT_FILES.capacity), CAPACITY_COLUMNS, dataset.capacity);
  await writeCsv(path.join(dir, OUTPUT_FILES.nodepoolState), NODEPOOL_STATE_COLUMNS, dataset.nodepoolState);
  return [OUTPUT_FILES.demand, OUTPUT_FILES.capacity, OUTPUT_FILES.nodepoolState];
}

// =============================================================================
// Staging
// =============================================================================

async function withStagingDir<T>(outputDir: string, fn: (stagingDir: string) => Promise<T>): Promise<T> {
  const resolved = path.resolve(outputDir);
  await mkdir(path.dirname(resolved), { recursive: true });
  const stagingDir = await mkdtemp(path.join(path.dirname(resolved), `.${path.basename(resolved)}.staging-`));
  try {
    return await fn(stagingDir);
  } finally {
    await rm(stagingDir, { recursive: true, force: true });
  }
}

async function promote(stagingDir: string, outputDir: string, files: readonly string[]): Promise<void> {
  await mkdir(outputDir, { recursive: true });
  for (const file of files) {
    await rename(path.join(stagingDir, file), path.join(outputDir, file));
  }
}

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Write tables and manifest. Nothing appears in `outputDir` unless every file
 * was written.
 */
export async function writeDataset(outputDir: string, dataset: Dataset, manifest: Manifest): Promise<void> {
  await withStagingDir(outputDir, async (stagingDir) => {
    const tables = await writeTablesInto(stagingDir, dataset);
    await writeFile(path.join(stagingDir, OUTPUT_FILES.manifest), `${JSON.stringify(manifest, null, 2)}\n`, "utf8");
    await promote(stagingDir, outputDir, [...tables, OUTPUT_FILES.manifest]);
  });
  logInfo(`Dataset written to ${outputDir}`);
}

/**
 * Write tables only, without a manifest. Used to leave the rows of a
 * failed validation behind for inspection; the missing manifest marks them
 * as unusable.
 */
export async function writeTables(outputDir: string, dataset: Dataset): Promise<void> {
  await withStagingDir(outputDir, async (stagingDir) => {
    const tables = await writeTablesInto(stagingDir, dataset);
    await rm(path.join(outputDir, OUTPUT_FILES.manifest), { force: true });
    await promote(stagingDir, outputDir, tables);
  });
  logInfo(`Unvalidated tables written to ${outputDir} (no manifest)`);
}
