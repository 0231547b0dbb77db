// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HANDLER — Graceful Shutdown Coordinator
// ═══════════════════════════════════════════════════════════════════════════════
//
// Handles graceful shutdown:
// - Signal handlers (SIGTERM, SIGINT)
// - Hooks run in reverse registration order, each under a timeout
// - Exit code management
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type ShutdownHookFn = () => Promise<void> | void;

export interface ShutdownHook {
  readonly name: string;
  readonly fn: ShutdownHookFn;
}

export interface HookResult {
  readonly name: string;
  readonly success: boolean;
  readonly durationMs: number;
  readonly error?: Error;
  readonly timedOut?: boolean;
}

export interface ShutdownResult {
  readonly reason: string;
  readonly success: boolean;
  readonly totalDurationMs: number;
  readonly hooks: readonly HookResult[];
  readonly failed: readonly string[];
}

export interface ShutdownConfig {
  /** Per-hook timeout in ms */
  readonly hookTimeoutMs: number;

  readonly signals: readonly NodeJS.Signals[];

  readonly exitCodeSuccess: number;
  readonly exitCodeFailure: number;

  /** Whether to call process.exit() once hooks have run */
  readonly exitProcess: boolean;
}

export const DEFAULT_SHUTDOWN_CONFIG: ShutdownConfig = {
  hookTimeoutMs: 10000,
  signals: ['SIGTERM', 'SIGINT'],
  exitCodeSuccess: 0,
  exitCodeFailure: 1,
  exitProcess: true,
};

const HOOK_TIMEOUT_MESSAGE = 'Hook timed out';

const logger = getLogger({ component: 'shutdown' });

// ─────────────────────────────────────────────────────────────────────────────────
// COORDINATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class ShutdownCoordinator {
  private readonly config: ShutdownConfig;
  private readonly hooks: ShutdownHook[] = [];
  private readonly listeners = new Map<NodeJS.Signals, () => void>();
  private shutdownPromise: Promise<ShutdownResult> | null = null;

  constructor(config: Partial<ShutdownConfig> = {}) {
    this.config = { ...DEFAULT_SHUTDOWN_CONFIG, ...config };
  }

  get isShuttingDown(): boolean {
    return this.shutdownPromise !== null;
  }

  /**
   * Hooks run last-registered first, so a server registered after the
   * resources it uses is closed before them.
   */
  registerHook(name: string, fn: ShutdownHookFn): void {
    this.hooks.push({ name, fn });
    logger.debug('Registered shutdown hook', { name });
  }

  installSignalHandlers(): void {
    for (const signal of this.config.signals) {
      if (this.listeners.has(signal)) continue;

      const listener = (): void => {
        if (this.isShuttingDown) {
          logger.warn('Received signal during shutdown, ignoring', { signal });
          return;
        }
        logger.info('Received shutdown signal', { signal });
        this.initiateShutdown(signal).catch((error: unknown) => {
          logger.fatal('Shutdown failed', error instanceof Error ? error : new Error(String(error)));
          process.exit(this.config.exitCodeFailure);
        });
      };

      process.on(signal, listener);
      this.listeners.set(signal, listener);
    }
  }

  removeSignalHandlers(): void {
    for (const [signal, listener] of this.listeners) {
      process.off(signal, listener);
    }
    this.listeners.clear();
  }

  /**
   * Run every hook once. Repeated calls share the first run.
   */
  initiateShutdown(reason: string = 'manual'): Promise<ShutdownResult> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown(reason);
    }
    return this.shutdownPromise;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // INTERNALS
  // ───────────────────────────────────────────────────────────────────────────

  private async performShutdown(reason: string): Promise<ShutdownResult> {
    const startTime = Date.now();
    logger.info('Starting graceful shutdown', { reason, hooks: this.hooks.length });

    const results: HookResult[] = [];
    for (const hook of [...this.hooks].reverse()) {
      results.push(await this.executeHook(hook));
    }

    const failed = results.filter((result) => !result.success).map((result) => result.name);
    const result: ShutdownResult = {
      reason,
      success: failed.length === 0,
      totalDurationMs: Date.now() - startTime,
      hooks: results,
      failed,
    };

    if (result.success) {
      logger.info('Graceful shutdown completed', { totalDurationMs: result.totalDurationMs });
    } else {
      logger.warn('Shutdown completed with failures', { failed });
    }

    this.removeSignalHandlers();

    if (this.config.exitProcess) {
      process.exit(result.success ? this.config.exitCodeSuccess : this.config.exitCodeFailure);
    }

    return result;
  }

  private async executeHook(hook: ShutdownHook): Promise<HookResult> {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      await Promise.race([
        Promise.resolve(hook.fn()),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error(HOOK_TIMEOUT_MESSAGE)), this.config.hookTimeoutMs);
        }),
      ]);

      return { name: hook.name, success: true, durationMs: Date.now() - startTime };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      const timedOut = failure.message === HOOK_TIMEOUT_MESSAGE;

      logger.error('Shutdown hook failed', failure, { name: hook.name, timedOut });

      return {
        name: hook.name,
        success: false,
        durationMs: Date.now() - startTime,
        error: failure,
        timedOut,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
