/**
 * Capstack Telemetry Module — Provider Manifest
 */

import { z } from 'zod';
import { CapabilityGroup, ConfigError, InlineAdapter, defineProvider, telemetryOperations } from '@capstack/core';
import { FileStateIO, MemoryStateIO } from '@capstack/runtime-host';
import type { StateIO } from '@capstack/runtime-host';
import { TraceLog } from './trace-log.js';

export const TelemetryProviderConfigSchema = z.object({
  /** `file` writes `<home>/logs/telemetry.jsonl`. */
  sink: z.enum(['memory', 'file']).default('memory'),
  /** Print every event as it is logged. */
  echo: z.boolean().default(false),
});
export type TelemetryProviderConfig = z.output<typeof TelemetryProviderConfigSchema>;

export const TELEMETRY_PROVIDER = defineProvider({
  capability: CapabilityGroup.Telemetry,
  provider_type: 'inline::meta-reference',
  description: 'JSONL trace log with deduplicated, time-ordered trace reads',
  config: TelemetryProviderConfigSchema,
  build(config, context) {
    let stateIO: StateIO;
    if (config.sink === 'file') {
      if (context.home === undefined) {
        throw new ConfigError(
          'InvalidProviderConfig',
          `Provider '${context.provider_id}' uses a file sink but the stack has no home directory`,
          { capability: CapabilityGroup.Telemetry, provider_id: context.provider_id },
        );
      }
      stateIO = new FileStateIO(context.home);
    } else {
      stateIO = new MemoryStateIO();
    }

    const traceLog = new TraceLog(stateIO, {
      echo: config.echo ? (line) => console.log(line) : undefined,
    });
    return new InlineAdapter({
      provider_id: context.provider_id,
      provider_type: 'inline::meta-reference',
      capability: CapabilityGroup.Telemetry,
      operations: telemetryOperations(traceLog),
    });
  },
});
