import { PhaseStatus, RunState } from './types';

/**
 * absent -> running -> completed. The only rejected move is
 * completed -> running; repeats of the current status are allowed.
 */
export function canTransition(current: PhaseStatus | undefined, next: PhaseStatus): boolean {
  return !(current === 'completed' && next === 'running');
}

/**
 * Returns the run with `phase` set to `status`, or null when the move is
 * illegal. The input run is never modified. Without `agent` the phase keeps
 * the agent it last had.
 */
export function applyPhaseStatus(
  run: RunState,
  phase: string,
  status: PhaseStatus,
  agent?: string
): RunState | null {
  if (!canTransition(run.phases.get(phase), status)) {
    return null;
  }
  const phases = new Map(run.phases);
  phases.set(phase, status);
  if (agent === undefined) {
    return { ...run, phases };
  }
  const agents = new Map(run.agents);
  agents.set(phase, agent);
  return { ...run, phases, agents };
}
