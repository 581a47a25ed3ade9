/**
 * Deadline timer for phase boundaries. Holds one pending deadline;
 * scheduling a new one replaces it.
 */
export interface Timer {
  scheduleAt(callback: () => void, deadlineMs: number): void;
  scheduleImmediate(callback: () => void): void;
  clear(): void;
}
