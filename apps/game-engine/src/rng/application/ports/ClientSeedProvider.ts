export interface ClientSeedProvider {
  next(): string;
}
