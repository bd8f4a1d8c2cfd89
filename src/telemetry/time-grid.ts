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

import { SECONDS_PER_DAY } from "@/lib/config";
import { ConfigurationError } from "@/lib/errors";

export interface TimeSample {
  /** Position in the grid */
  index: number;
  epochMs: number;
  iso: string;
  /** Hours since the first sample */
  elapsedHours: number;
  /** Fractional UTC hour of day, [0, 24) */
  hourOfDay: number;
}

/** Ordered sample timestamps for a run: `days` worth of samples, `stepSeconds` apart. */
export class TimeGrid {
  readonly samples: readonly TimeSample[];
  private readonly isoSet: ReadonlySet<string>;

  constructor(
    readonly startMs: number,
    readonly stepSeconds: number,
    readonly days: number,
  ) {
    if (!Number.isFinite(startMs)) {
      throw new ConfigurationError(`Invalid grid start: ${startMs}`);
    }
    if (!Number.isInteger(stepSeconds) || stepSeconds <= 0 || SECONDS_PER_DAY % stepSeconds !== 0) {
      throw new ConfigurationError(`step_seconds must be a positive divisor of ${SECONDS_PER_DAY}, got ${stepSeconds}`);
    }
    if (!Number.isInteger(days) || days < 1) {
      throw new ConfigurationError(`days must be a positive integer, got ${days}`);
    }

    const count = (days * SECONDS_PER_DAY) / stepSeconds;
    const samples: TimeSample[] = [];
    for (let index = 0; index < count; index++) {
      const epochMs = startMs + index * stepSeconds * 1000;
      const date = new Date(epochMs);
      samples.push({
        index,
        epochMs,
        iso: date.toISOString(),
        elapsedHours: (index * stepSeconds) / 3600,
        hourOfDay: date.getUTCHours() + date.getUTCMinutes() / 60 + date.getUTCSeconds() / 3600,
      });
    }
    this.samples = samples;
    this.isoSet = new Set(samples.map((s) => s.iso));
  }

  static fromOptions(options: { startTime: string; stepSeconds: number; days: number }): TimeGrid {
    return new TimeGrid(Date.parse(options.startTime), options.stepSeconds, options.days);
  }

  get length(): number {
    return this.samples.length;
  }

  get start(): TimeSample {
    return this.samples[0];
  }

  get end(): TimeSample {
    return this.samples[this.samples.length - 1];
  }

  contains(iso: string): boolean {
    return this.isoSet.has(iso);
  }
}
