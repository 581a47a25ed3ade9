export interface TickScheduler {
  start(callback: () => void): void;
  stop(): void;
}
