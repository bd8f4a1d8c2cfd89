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
 * Telemetry Generators
 *
 * Generation is deterministic per entity:
 * - Same (run seed, entity id) always produces the same series
 * - No entity's stream is shared with another, so generation order between
 *   entities never changes values
 */

export { DemandGenerator } from "./demand-generator";
export { CapacityGenerator } from "./capacity-generator";
export { generateNodepoolState } from "./nodepool-generator";
export { synthesizeSignals, type SynthesisInputs } from "./synthesizer";
export {
  clip,
  loadCurve,
  powerFraction,
  roundTo,
  tensorActivity,
  tensorAffinity,
  DECOUPLED_POWER_FRACTION,
} from "./signal-shaping";
