/** Cursor value before any sequenced event has been accepted. */
export const INITIAL_SEQUENCE = -1;

export function isStaleSequence(lastSequence: number, sequence?: number): boolean {
  return sequence !== undefined && sequence <= lastSequence;
}

/**
 * Cursor after accepting an event. Sequence-less events leave it in place.
 */
export function advanceSequence(lastSequence: number, sequence?: number): number {
  return sequence ?? lastSequence;
}
