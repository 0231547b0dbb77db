// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

import { isConfigLoaded, loadConfig } from './config/index.js';
import { ShutdownCoordinator } from './infrastructure/shutdown/index.js';
import { getLogger } from './logging/index.js';
import { startServer } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const shutdown = new ShutdownCoordinator();

  const running = await startServer({ config });
  shutdown.registerHook('http-server', () => running.close());
  shutdown.installSignalHandlers();
}

main().catch((error: unknown) => {
  const failure = error instanceof Error ? error : new Error(String(error));

  // The logger reads its level from config, which may be what failed
  if (isConfigLoaded()) {
    getLogger({ component: 'startup' }).fatal('Startup failed', failure);
  } else {
    console.error(`Startup failed: ${failure.message}`);
  }
  process.exit(1);
});
