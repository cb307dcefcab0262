/**
 * Capstack Core — Stack Client
 *
 * Typed facades over a Dispatch function, one per capability group. Results
 * are parsed with the same schemas the Router validates against, so a client
 * reads identically whether the dispatch goes to an inline or a remote
 * adapter.
 */

import type { Dispatch, DispatchOptions } from '../contracts/shared.js';
import type { InferenceClient } from '../contracts/inference.js';
import { inferenceClient } from '../contracts/inference.js';
import type { SafetyClient } from '../contracts/safety.js';
import { safetyClient } from '../contracts/safety.js';
import type { MemoryClient } from '../contracts/memory.js';
import { memoryClient } from '../contracts/memory.js';
import type { AgentsClient } from '../contracts/agents.js';
import { agentsClient } from '../contracts/agents.js';
import type { TelemetryClient } from '../contracts/telemetry.js';
import { telemetryClient } from '../contracts/telemetry.js';
import type { ShieldsClient } from '../contracts/shields.js';
import { shieldsClient } from '../contracts/shields.js';

export class StackClient {
  readonly inference: InferenceClient;
  readonly safety: SafetyClient;
  readonly memory: MemoryClient;
  readonly agents: AgentsClient;
  readonly telemetry: TelemetryClient;
  readonly shields: ShieldsClient;

  constructor(
    private readonly dispatcher: Dispatch,
    private readonly options: DispatchOptions = {},
  ) {
    this.inference = inferenceClient(dispatcher, options);
    this.safety = safetyClient(dispatcher, options);
    this.memory = memoryClient(dispatcher, options);
    this.agents = agentsClient(dispatcher, options);
    this.telemetry = telemetryClient(dispatcher, options);
    this.shields = shieldsClient(dispatcher, options);
  }

  /**
   * A client whose calls carry the given options, merged over this one's.
   *
   * @example
   * client.withOptions({ provider_id: 'guard-model', timeout_ms: 5000 }).inference.chat_completion(...)
   */
  withOptions(options: DispatchOptions): StackClient {
    return new StackClient(this.dispatcher, { ...this.options, ...options });
  }

  /** Untyped dispatch; the result is returned exactly as routed. */
  call(capability: string, operation: string, payload: unknown): Promise<unknown> {
    return this.dispatcher(capability, operation, payload, this.options);
  }
}
