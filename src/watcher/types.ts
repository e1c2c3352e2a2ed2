import type { Slot } from '../booking/parser';
import type { DeliverySummary } from '../notifications/dispatch';

export type FailureStage = 'session' | 'availability' | 'parse' | 'unexpected';

export type CycleOutcome =
  | { status: 'notified'; slots: Slot[]; delivery: DeliverySummary }
  | { status: 'no_slots' }
  | { status: 'failed'; stage: FailureStage; error: Error };
