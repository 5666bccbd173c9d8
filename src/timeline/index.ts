export * from './types';
export { DEFAULT_PHASE_MAPPING, resolvePhaseName } from './phase-names';
export {
  DEFAULT_FALLBACK_RUN_ID,
  DEFAULT_ITERATION_SEPARATOR,
  DEFAULT_TIMELINE_OPTIONS,
} from './options';
export { isKnownEventType, normalizeEvent, summarizeRawEvent } from './event-normalizer';
export type { RawEventSummary } from './event-normalizer';
export { INITIAL_SEQUENCE } from './ordering-guard';
export { canTransition } from './phase-state-machine';
export { buildProjection, describeRuns, orderRunIds, parseIterationSuffix } from './timeline-aggregator';
export { createInitialTimelineState, resetTimeline } from './reset-controller';
export { reduceTimeline, reduceTimelineEvent, replayTimelineEvents } from './reducer';
export { TimelineStore } from './store';
export type { TimelineListener, TimelineStoreOptions } from './store';
export { DEFAULT_CHANNEL_EVENT, subscribeToChannel, unwrapChannelEvent } from './subscription';
export type {
  EmitterChannel,
  SubscribeOptions,
  TargetChannel,
  TimelineChannel,
  TimelineSubscription,
} from './subscription';
export { loadTimelineEventLog, parseTimelineEventLog } from './event-log';
