import type { FlowDefinition } from '@core/interfaces/flow.types.js';
import type { FlowSource } from '@core/repositories/flow.repo.js';
import { RwLock } from '@utils/locks.js';

/** Parsed flow definitions per tenant, shared read-only once stored. */
export class FlowConfigCache {
  private readonly lock = new RwLock();
  private readonly flows = new Map<string, FlowDefinition>();

  get(tenant: string): Promise<FlowDefinition | null> {
    return this.lock.read(() => this.flows.get(tenant) ?? null);
  }

  set(tenant: string, definition: FlowDefinition): Promise<void> {
    return this.lock.write(() => {
      this.flows.set(tenant, definition);
    });
  }
}

/**
 * Load-on-miss access to tenant flows. Two first loads of the same tenant may
 * run side by side; the later `set` wins. A load that fails stores nothing.
 */
export class FlowResolver {
  constructor(
    private readonly cache: FlowConfigCache,
    private readonly source: FlowSource,
  ) {}

  async resolve(tenant: string): Promise<FlowDefinition> {
    const cached = await this.cache.get(tenant);
    if (cached) return cached;

    const loaded = await this.source.load(tenant);
    await this.cache.set(tenant, loaded);
    return loaded;
  }
}
