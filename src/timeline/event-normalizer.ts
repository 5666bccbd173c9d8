/**
 * Maps canonical and legacy progress events onto one tagged shape.
 *
 * @module timeline/event-normalizer
 */

import {
  RawEventEnvelopeSchema,
  RawEventPayload,
  RawEventPayloadSchema,
} from '../validation/schemas/event-schema';
import { resolvePhaseName } from './phase-names';
import { KnownEventType, NormalizedEvent, PhaseStatus, RunMetadata, TimelineOptions } from './types';

type PayloadNormalizer = (payload: RawEventPayload, options: TimelineOptions) => NormalizedEvent;

function toRunMetadata(payload: RawEventPayload): RunMetadata {
  const metadata: RunMetadata = {};
  if (payload.iteration !== undefined) {
    metadata.iteration = payload.iteration;
  }
  if (payload.mode !== undefined) {
    metadata.mode = payload.mode;
  }
  if (payload.timestamp !== undefined) {
    metadata.startedAt = payload.timestamp;
  }
  return metadata;
}

function phaseUpdate(status: PhaseStatus): PayloadNormalizer {
  return (payload, options) => ({
    kind: 'phase_update',
    runId: payload.run_id,
    phase: resolvePhaseName(payload.phase, options.phaseMapping) ?? undefined,
    status,
    sequence: payload.seq,
    agent: payload.agent,
  });
}

const startRun: PayloadNormalizer = (payload) => {
  if (payload.run_id === undefined) {
    return { kind: 'malformed' };
  }
  return {
    kind: 'run_started',
    runId: payload.run_id,
    sequence: payload.seq,
    metadata: toRunMetadata(payload),
  };
};

const NORMALIZERS: Readonly<Record<KnownEventType, PayloadNormalizer>> = {
  RUN_STARTED: startRun,
  PHASE_STARTED: phaseUpdate('running'),
  PHASE_COMPLETED: phaseUpdate('completed'),
  // Legacy vocabulary.
  phase_start: phaseUpdate('running'),
  phase_completed: phaseUpdate('completed'),
  conversation_init: () => ({ kind: 'reset' }),
};

export function isKnownEventType(type: string): type is KnownEventType {
  return Object.prototype.hasOwnProperty.call(NORMALIZERS, type);
}

/**
 * Never throws: records without a usable envelope come back as `malformed`,
 * unknown types as `ignored`.
 */
export function normalizeEvent(raw: unknown, options: TimelineOptions): NormalizedEvent {
  const envelope = RawEventEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return { kind: 'malformed' };
  }

  const parsedPayload = RawEventPayloadSchema.safeParse(envelope.data.payload);
  const payload: RawEventPayload = parsedPayload.success ? parsedPayload.data : {};
  const { type } = envelope.data;

  if (!isKnownEventType(type)) {
    return { kind: 'ignored', sequence: payload.seq };
  }

  return NORMALIZERS[type](payload, options);
}

export interface RawEventSummary {
  type?: string;
  runId?: string;
  sequence?: number;
}

/**
 * Identifying fields of a raw event, for logs. Missing or mistyped fields are omitted.
 */
export function summarizeRawEvent(raw: unknown): RawEventSummary {
  const envelope = RawEventEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return {};
  }
  const summary: RawEventSummary = { type: envelope.data.type };
  const payload = RawEventPayloadSchema.safeParse(envelope.data.payload);
  if (payload.success) {
    if (payload.data.run_id !== undefined) {
      summary.runId = payload.data.run_id;
    }
    if (payload.data.seq !== undefined) {
      summary.sequence = payload.data.seq;
    }
  }
  return summary;
}
