// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE DATA REGISTRY — One-Time Load Lifecycle
// ═══════════════════════════════════════════════════════════════════════════════
//
//   idle ──load()──► loading ──► ready
//                       │
//                       └──────► failed
//
// Evaluations read the provider through getProvider(), which refuses to hand
// it out until the state is `ready`.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ReferenceDataNotReadyError, type ReferenceDataState } from '../engine/errors.js';
import { loggers } from '../logging/index.js';
import { loadReferenceData } from './loader.js';
import type { ReferenceDataProvider } from './types.js';

export type ReferenceDataLoadFn = () => Promise<ReferenceDataProvider>;

export class ReferenceDataRegistry {
  private currentState: ReferenceDataState = 'idle';
  private provider: ReferenceDataProvider | null = null;
  private pending: Promise<ReferenceDataProvider> | null = null;
  private failure: Error | null = null;
  private loadedAt: Date | null = null;

  constructor(private readonly loadFn: ReferenceDataLoadFn) {}

  static fromDirectory(dir: string): ReferenceDataRegistry {
    return new ReferenceDataRegistry(() => loadReferenceData(dir));
  }

  /**
   * Registry that is ready from the start.
   */
  static preloaded(provider: ReferenceDataProvider): ReferenceDataRegistry {
    const registry = new ReferenceDataRegistry(() => Promise.resolve(provider));
    registry.provider = provider;
    registry.currentState = 'ready';
    registry.loadedAt = new Date();
    return registry;
  }

  get state(): ReferenceDataState {
    return this.currentState;
  }

  get error(): Error | null {
    return this.failure;
  }

  get readySince(): Date | null {
    return this.loadedAt;
  }

  isReady(): boolean {
    return this.currentState === 'ready';
  }

  /**
   * Load once. Concurrent and later callers share the same promise, so a
   * failed load stays failed.
   */
  load(): Promise<ReferenceDataProvider> {
    if (this.provider) {
      return Promise.resolve(this.provider);
    }
    if (!this.pending) {
      this.pending = this.runLoad();
    }
    return this.pending;
  }

  getProvider(): ReferenceDataProvider {
    if (this.currentState !== 'ready' || !this.provider) {
      throw new ReferenceDataNotReadyError(this.currentState);
    }
    return this.provider;
  }

  private async runLoad(): Promise<ReferenceDataProvider> {
    const logger = loggers.data();
    this.currentState = 'loading';

    try {
      const provider = await this.loadFn();
      this.provider = provider;
      this.loadedAt = new Date();
      this.currentState = 'ready';
      logger.info('Reference data ready', { sectors: provider.allSectors().size });
      return provider;
    } catch (error) {
      this.failure = error instanceof Error ? error : new Error(String(error));
      this.currentState = 'failed';
      logger.error('Reference data failed to load', this.failure);
      throw this.failure;
    }
  }
}
