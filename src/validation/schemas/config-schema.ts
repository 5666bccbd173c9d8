import { z } from 'zod';

const PhaseLabel = z.string().trim().min(1, 'Phase label cannot be empty');

export const TimelineConfigSchema = z
  .object({
    phaseMapping: z
      .record(PhaseLabel, z.string().trim().toLowerCase().min(1, 'Phase name cannot be empty'))
      .optional(),
    fallbackRunId: z.string().trim().min(1).default('default_run'),
    iterationSeparator: z.string().min(1).max(4).default(':'),
    telemetryLevel: z.enum(['info', 'warning', 'error']).optional(),
  })
  .strict();

export type TimelineConfigInput = z.input<typeof TimelineConfigSchema>;
export type TimelineConfigFile = z.infer<typeof TimelineConfigSchema>;
