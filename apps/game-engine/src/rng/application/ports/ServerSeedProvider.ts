export interface ServerSeedProvider {
  next(): string;
}
