import {
  IProxySource,
  ProxySeed,
} from '@/shared/proxy/interfaces/proxy.interface';

export class InMemoryProxySource implements IProxySource {
  readonly name = 'memory';

  constructor(private readonly seeds: ProxySeed[]) {}

  async load(): Promise<ProxySeed[]> {
    return this.seeds.map((seed) => ({ ...seed }));
  }
}

export function seedsFor(count: number): ProxySeed[] {
  return Array.from({ length: count }, (_, i) => ({
    host: `10.0.0.${i + 1}`,
    port: 8000 + i,
    username: '',
    password: '',
  }));
}
