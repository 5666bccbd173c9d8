import { INITIAL_SEQUENCE } from './ordering-guard';
import { TimelineState } from './types';

export function createInitialTimelineState(): TimelineState {
  return {
    activeRunId: null,
    lastSequence: INITIAL_SEQUENCE,
    runs: new Map(),
  };
}

/**
 * A reset is never stale: whatever sequence it carried, the result is a
 * fresh state with the cursor rewound.
 */
export function resetTimeline(): TimelineState {
  return createInitialTimelineState();
}
