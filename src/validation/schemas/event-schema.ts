import { z } from 'zod';

/**
 * Envelope every progress event must have. Anything else is malformed.
 */
export const RawEventEnvelopeSchema = z
  .object({
    type: z.string().min(1),
    payload: z.unknown().optional(),
  })
  .passthrough();

/**
 * Lenient payload schema: a field with the wrong shape reads as absent
 * instead of failing the whole event.
 */
export const RawEventPayloadSchema = z
  .object({
    run_id: z.string().min(1).optional().catch(undefined),
    phase: z.string().optional().catch(undefined),
    seq: z.number().int().optional().catch(undefined),
    iteration: z.number().int().nonnegative().optional().catch(undefined),
    mode: z.string().min(1).optional().catch(undefined),
    timestamp: z.string().min(1).optional().catch(undefined),
    agent: z.string().min(1).optional().catch(undefined),
  })
  .passthrough();

export type RawEventEnvelope = z.infer<typeof RawEventEnvelopeSchema>;
export type RawEventPayload = z.infer<typeof RawEventPayloadSchema>;

/**
 * Tool-facing schema: events handed to the server must at least carry a type.
 */
export const TimelineEventInputSchema = z
  .object({
    type: z.string().min(1, 'Event type cannot be empty'),
    payload: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();
