import { SeedVault } from '@rng/application/ports/SeedVault';

export class InMemorySeedVault implements SeedVault {
  private readonly seeds = new Map<string, string>();

  store(commitmentId: string, serverSeed: string): void {
    if (this.seeds.has(commitmentId)) {
      throw new Error(`Seed already stored for commitment ${commitmentId}`);
    }
    this.seeds.set(commitmentId, serverSeed);
  }

  get(commitmentId: string): string {
    const seed = this.seeds.get(commitmentId);
    if (seed === undefined) {
      throw new Error(`No seed stored for commitment ${commitmentId}`);
    }
    return seed;
  }

  delete(commitmentId: string): void {
    this.seeds.delete(commitmentId);
  }

  get size(): number {
    return this.seeds.size;
  }
}
