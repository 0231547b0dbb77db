// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE CONTEXT — Registry + Engine Config Shared by the Routes
// ═══════════════════════════════════════════════════════════════════════════════

import { RiskEngine, type EngineConfig } from '../engine/index.js';
import type { ReferenceDataProvider, ReferenceDataRegistry } from '../reference/index.js';

export class EngineContext {
  private engine: RiskEngine | null = null;
  private engineProvider: ReferenceDataProvider | null = null;

  constructor(
    readonly registry: ReferenceDataRegistry,
    readonly engineConfig: EngineConfig
  ) {}

  /**
   * Throws ReferenceDataNotReadyError until the registry has loaded.
   */
  provider(): ReferenceDataProvider {
    return this.registry.getProvider();
  }

  /**
   * One engine per loaded provider.
   */
  riskEngine(): RiskEngine {
    const provider = this.provider();
    if (!this.engine || this.engineProvider !== provider) {
      this.engine = new RiskEngine(provider, this.engineConfig);
      this.engineProvider = provider;
    }
    return this.engine;
  }
}
