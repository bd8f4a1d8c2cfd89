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
 * Seeded Random Streams
 *
 * Each entity owns a private faker instance seeded from (runSeed, entityId),
 * so the values an entity receives never depend on how many draws another
 * entity made before it.
 */

import { SimpleFaker } from "@faker-js/faker";

/** Truncation bound for Gaussian draws, in standard deviations */
export const GAUSSIAN_TRUNCATION = 3;

/** Smoothing coefficient for AR(1) noise */
export const DEFAULT_NOISE_PERSISTENCE = 0.9;

const MAX_REJECTION_ATTEMPTS = 16;

export function hashString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash;
  }
  return hash;
}

/** Sub-seed for one entity within a run. */
export function deriveSeed(runSeed: number, entityId: string): number {
  return hashString(`${runSeed}:${entityId}`) >>> 0;
}

export class RandomStream {
  private readonly faker: SimpleFaker;

  constructor(seed: number) {
    this.faker = new SimpleFaker();
    this.faker.seed(seed >>> 0);
  }

  static forEntity(runSeed: number, entityId: string): RandomStream {
    return new RandomStream(deriveSeed(runSeed, entityId));
  }

  uniform(min = 0, max = 1): number {
    return this.faker.number.float({ min, max });
  }

  int(min: number, max: number): number {
    return this.faker.number.int({ min, max });
  }

  uuid(): string {
    return this.faker.string.uuid();
  }

  /** Standard normal draw (Box-Muller). */
  gaussian(): number {
    const u1 = 1 - this.uniform();
    const u2 = this.uniform();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }

  /** Standard normal draw restricted to [-limit, limit]. */
  truncatedGaussian(limit = GAUSSIAN_TRUNCATION): number {
    for (let attempt = 0; attempt < MAX_REJECTION_ATTEMPTS; attempt++) {
      const z = this.gaussian();
      if (Math.abs(z) <= limit) {
        return z;
      }
    }
    // 16 consecutive rejections at 3 sigma is ~1e-41; clip rather than loop
    return Math.max(-limit, Math.min(limit, this.gaussian()));
  }

  /**
   * Non-negative integer whose expectation is `mean`: the fractional part
   * becomes a Bernoulli trial.
   */
  count(mean: number): number {
    if (mean <= 0) {
      return 0;
    }
    const whole = Math.floor(mean);
    return whole + (this.uniform() < mean - whole ? 1 : 0);
  }
}

/**
 * Unit-variance AR(1) noise: e(t) = phi * e(t-1) + sqrt(1 - phi^2) * z(t).
 * Consecutive samples are correlated, so shaped signals drift instead of
 * jumping independently between steps.
 */
export class SmoothNoise {
  private state: number;
  private readonly innovationScale: number;

  constructor(
    private readonly stream: RandomStream,
    private readonly persistence = DEFAULT_NOISE_PERSISTENCE,
  ) {
    this.innovationScale = Math.sqrt(1 - persistence * persistence);
    this.state = stream.truncatedGaussian();
  }

  next(): number {
    const current = this.state;
    this.state = this.persistence * this.state + this.innovationScale * this.stream.truncatedGaussian();
    return current;
  }
}
