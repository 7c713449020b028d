import { JOB_STATUSES, TERMINAL_STATUSES, type JobStatus } from "../constants.js";

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Status only moves forward along the pipeline order (stages may be
 * skipped, and a stage may repeat to report progress), or jumps to "failed"
 * from any non-terminal state. Terminal states never change.
 */
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  if (isTerminal(from)) return false;
  if (to === "failed") return true;
  return JOB_STATUSES.indexOf(to) >= JOB_STATUSES.indexOf(from);
}

// Absent fields leave the stored value untouched
export interface StatusUpdate {
  status: JobStatus;
  progress?: string;
  progressPercent?: number;
}

/**
 * Tracks one run's position in the state machine. Percent is clamped so it
 * never decreases within the run.
 */
export class JobStateTracker {
  private current: JobStatus;
  private percent = 0;

  constructor(initial: JobStatus = "pending") {
    this.current = initial;
  }

  get status(): JobStatus {
    return this.current;
  }

  get progressPercent(): number {
    return this.percent;
  }

  advance(status: JobStatus, progress?: string, progressPercent?: number): StatusUpdate {
    if (!canTransition(this.current, status)) {
      throw new Error(`Illegal job status transition ${this.current} -> ${status}`);
    }
    this.current = status;
    const update: StatusUpdate = { status };
    if (progress !== undefined) update.progress = progress;
    if (progressPercent !== undefined) {
      this.percent = Math.min(100, Math.max(this.percent, Math.round(progressPercent)));
      update.progressPercent = this.percent;
    }
    return update;
  }
}
