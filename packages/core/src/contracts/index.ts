/**
 * Capstack Core — Contract Table
 *
 * Maps each capability group to its operation contract. The Router consults
 * this table for every dispatch; it is the only source of truth for which
 * operations a group exposes.
 */

import { CapabilityGroup } from '../types/capability.js';
import type { GroupContract } from './shared.js';
import { INFERENCE_CONTRACT } from './inference.js';
import { SAFETY_CONTRACT } from './safety.js';
import { MEMORY_CONTRACT } from './memory.js';
import { AGENTS_CONTRACT } from './agents.js';
import { TELEMETRY_CONTRACT } from './telemetry.js';
import { SHIELDS_CONTRACT } from './shields.js';

export const CONTRACTS: Readonly<Record<CapabilityGroup, GroupContract>> = {
  [CapabilityGroup.Inference]: INFERENCE_CONTRACT,
  [CapabilityGroup.Safety]: SAFETY_CONTRACT,
  [CapabilityGroup.Memory]: MEMORY_CONTRACT,
  [CapabilityGroup.Agents]: AGENTS_CONTRACT,
  [CapabilityGroup.Telemetry]: TELEMETRY_CONTRACT,
  [CapabilityGroup.Shields]: SHIELDS_CONTRACT,
};

/** Operation names of a group, in declaration order. */
export function operationNames(capability: CapabilityGroup): ReadonlyArray<string> {
  return Object.keys(CONTRACTS[capability]);
}
