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
 * Simple logger that can be configured for different environments.
 *
 * Errors are always logged. Info and warnings are shown when verbose output is
 * enabled (NODE_ENV=development or GPU_TELEMETRY_VERBOSE=true); debug output
 * additionally requires GPU_TELEMETRY_DEBUG=true.
 */

const PREFIX = "[gpu-telemetry]";

function isVerbose(): boolean {
  return process.env.NODE_ENV === "development" || process.env.GPU_TELEMETRY_VERBOSE === "true";
}

function isDebug(): boolean {
  return process.env.GPU_TELEMETRY_DEBUG === "true";
}

/**
 * Log an error. Always logged.
 */
export function logError(message: string, ...args: unknown[]): void {
  console.error(`${PREFIX} ${message}`, ...args);
}

/**
 * Log a warning. Only logged in verbose mode.
 */
export function logWarn(message: string, ...args: unknown[]): void {
  if (isVerbose()) {
    console.warn(`${PREFIX} ${message}`, ...args);
  }
}

/**
 * Log info. Only logged in verbose mode.
 */
export function logInfo(message: string, ...args: unknown[]): void {
  if (isVerbose()) {
    console.info(`${PREFIX} ${message}`, ...args);
  }
}

/**
 * Log debug info. Only logged when debug output is enabled.
 */
export function logDebug(message: string, ...args: unknown[]): void {
  if (isDebug()) {
    console.log(`${PREFIX} ${message}`, ...args);
  }
}
