/** Wall-clock source, epoch milliseconds. */
export interface Clock {
  now(): number;
}
