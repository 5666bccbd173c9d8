import { DEFAULT_PHASE_MAPPING } from './phase-names';
import { TimelineOptions } from './types';

export const DEFAULT_FALLBACK_RUN_ID = 'default_run';
export const DEFAULT_ITERATION_SEPARATOR = ':';

export const DEFAULT_TIMELINE_OPTIONS: TimelineOptions = Object.freeze({
  phaseMapping: DEFAULT_PHASE_MAPPING,
  fallbackRunId: DEFAULT_FALLBACK_RUN_ID,
  iterationSeparator: DEFAULT_ITERATION_SEPARATOR,
});
