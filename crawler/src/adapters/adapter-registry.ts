import type { IAdapter, AdapterStatus, AdapterStats } from './adapter.interface.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('adapter-registry');

export class AdapterRegistry {
  private adapters: Map<string, IAdapter> = new Map();

  register(adapter: IAdapter): void {
    if (this.adapters.has(adapter.sourceId)) {
      throw new Error(`Adapter "${adapter.sourceId}" already registered`);
    }
    this.adapters.set(adapter.sourceId, adapter);
    log.info(`Registered adapter: ${adapter.sourceId}`);
  }

  /** Start every adapter; one failing to start does not hold back the others. */
  async startAll(signal: AbortSignal): Promise<string[]> {
    const failed: string[] = [];
    const startPromises: Promise<void>[] = [];
    for (const [id, adapter] of this.adapters) {
      log.info(`Starting adapter: ${id}`);
      startPromises.push(
        adapter.start(signal).catch((err: unknown) => {
          failed.push(id);
          log.error(`Failed to start adapter "${id}"`, err);
        })
      );
    }
    await Promise.all(startPromises);
    return failed;
  }

  async stopAll(): Promise<void> {
    const stopPromises: Promise<void>[] = [];
    for (const [id, adapter] of this.adapters) {
      log.info(`Stopping adapter: ${id}`);
      stopPromises.push(
        adapter.stop().catch((err: unknown) => {
          log.error(`Failed to stop adapter "${id}"`, err);
        })
      );
    }
    await Promise.all(stopPromises);
  }

  getStatuses(): Map<string, AdapterStatus> {
    const statuses = new Map<string, AdapterStatus>();
    for (const [id, adapter] of this.adapters) {
      statuses.set(id, adapter.getStatus());
    }
    return statuses;
  }

  getStats(): Map<string, AdapterStats> {
    const stats = new Map<string, AdapterStats>();
    for (const [id, adapter] of this.adapters) {
      stats.set(id, adapter.getStats());
    }
    return stats;
  }

  get size(): number {
    return this.adapters.size;
  }
}
