import type { CycleOutcome, FailureStage } from './types';

export interface LastCycleSummary {
  finishedAt: string;
  status: CycleOutcome['status'];
  slotCount?: number;
  stage?: FailureStage;
  error?: string;
}

export interface CycleStatsSnapshot {
  startedAt: string;
  cyclesRun: number;
  cyclesWithSlots: number;
  cyclesWithoutSlots: number;
  failures: Record<FailureStage, number>;
  notificationsSent: number;
  notificationsFailed: number;
  lastCycle: LastCycleSummary | null;
}

export interface CycleStats {
  record(outcome: CycleOutcome, finishedAt?: Date): void;
  snapshot(): CycleStatsSnapshot;
}

function summariseOutcome(outcome: CycleOutcome, finishedAt: Date): LastCycleSummary {
  switch (outcome.status) {
    case 'notified':
      return { finishedAt: finishedAt.toISOString(), status: outcome.status, slotCount: outcome.slots.length };
    case 'no_slots':
      return { finishedAt: finishedAt.toISOString(), status: outcome.status, slotCount: 0 };
    case 'failed':
      return {
        finishedAt: finishedAt.toISOString(),
        status: outcome.status,
        stage: outcome.stage,
        error: outcome.error.message,
      };
  }
}

/**
 * In-memory counters for the status endpoint. Reset on restart.
 */
export function createCycleStats(startedAt: Date = new Date()): CycleStats {
  const counts: Omit<CycleStatsSnapshot, 'startedAt' | 'lastCycle' | 'failures'> = {
    cyclesRun: 0,
    cyclesWithSlots: 0,
    cyclesWithoutSlots: 0,
    notificationsSent: 0,
    notificationsFailed: 0,
  };
  const failures: Record<FailureStage, number> = { session: 0, availability: 0, parse: 0, unexpected: 0 };
  let lastCycle: LastCycleSummary | null = null;

  return {
    record(outcome, finishedAt = new Date()) {
      counts.cyclesRun += 1;
      switch (outcome.status) {
        case 'notified':
          counts.cyclesWithSlots += 1;
          counts.notificationsSent += outcome.delivery.sent;
          counts.notificationsFailed += outcome.delivery.failed;
          break;
        case 'no_slots':
          counts.cyclesWithoutSlots += 1;
          break;
        case 'failed':
          failures[outcome.stage] += 1;
          break;
        default:
          break;
      }
      lastCycle = summariseOutcome(outcome, finishedAt);
    },
    snapshot() {
      return {
        startedAt: startedAt.toISOString(),
        ...counts,
        failures: { ...failures },
        lastCycle: lastCycle ? { ...lastCycle } : null,
      };
    },
  };
}
