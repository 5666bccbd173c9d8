/**
 * Timeline configuration: built-in defaults, optionally overridden by a YAML file.
 *
 * ```yaml
 * phaseMapping:
 *   VERIFICATION: verify
 * fallbackRunId: default_run
 * iterationSeparator: ":"
 * telemetryLevel: info
 * ```
 *
 * @module config/timeline-config
 */

import { promises as fs } from 'fs';
import { ConfigError } from '../errors/config-error';
import { IOError } from '../errors/io-error';
import { TelemetryEventLevel, setTelemetryLevel } from '../telemetry/telemetry';
import { DEFAULT_PHASE_MAPPING } from '../timeline/phase-names';
import { TimelineOptions } from '../timeline/types';
import { yamlContent } from '../validation/common';
import { normalizeValidationError } from '../validation/errors';
import {
  TimelineConfigFile,
  TimelineConfigInput,
  TimelineConfigSchema,
} from '../validation/schemas/config-schema';

export const CONFIG_PATH_ENV_VAR = 'RUN_TIMELINE_CONFIG';

const MAX_CONFIG_SIZE = 64 * 1024;

export interface TimelineConfig extends TimelineOptions {
  telemetryLevel?: TelemetryEventLevel;
}

function fromFile(file: TimelineConfigFile): TimelineConfig {
  const config: TimelineConfig = {
    phaseMapping: Object.freeze({ ...DEFAULT_PHASE_MAPPING, ...file.phaseMapping }),
    fallbackRunId: file.fallbackRunId,
    iterationSeparator: file.iterationSeparator,
  };
  if (file.telemetryLevel) {
    config.telemetryLevel = file.telemetryLevel;
  }
  return config;
}

/**
 * Validate overrides and merge them over the defaults. The built-in phase
 * table is always present; entries in `phaseMapping` extend or replace it.
 */
export function resolveTimelineConfig(input: TimelineConfigInput = {}): TimelineConfig {
  const parsed = TimelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const validationError = normalizeValidationError(parsed.error);
    throw new ConfigError(`Invalid timeline configuration: ${validationError.message}`, {
      cause: validationError,
      context: { module: 'config/timeline-config' },
    });
  }
  return fromFile(parsed.data);
}

export async function loadTimelineConfig(filePath: string): Promise<TimelineConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw IOError.fromReadFailure(`Configuration file not readable: ${filePath}`, error, {
      module: 'config/timeline-config',
      data: { filePath },
    });
  }

  try {
    return fromFile(yamlContent(raw, { schema: TimelineConfigSchema, maxSize: MAX_CONFIG_SIZE }));
  } catch (error) {
    throw new ConfigError(
      `Invalid timeline configuration in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      {
        cause: error,
        context: { module: 'config/timeline-config', data: { filePath } },
      }
    );
  }
}

export function toTimelineOptions(config: TimelineConfig): TimelineOptions {
  return {
    phaseMapping: config.phaseMapping,
    fallbackRunId: config.fallbackRunId,
    iterationSeparator: config.iterationSeparator,
  };
}

/**
 * Push config-level settings into the process-wide telemetry module.
 */
export function applyTelemetryConfig(config: TimelineConfig): void {
  if (config.telemetryLevel) {
    setTelemetryLevel(config.telemetryLevel);
  }
}
