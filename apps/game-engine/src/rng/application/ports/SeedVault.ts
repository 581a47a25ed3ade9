export interface SeedVault {
  store(commitmentId: string, serverSeed: string): void;
  /** Throws if nothing is stored under the id. */
  get(commitmentId: string): string;
  delete(commitmentId: string): void;
}
