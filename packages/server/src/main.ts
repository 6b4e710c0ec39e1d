// ──────────────────────────────────────────
// Entry point: load env, bootstrap, listen
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError, loadConfig } from '@plantgate/core';
import { createPlantGateApp } from './app';

async function main(): Promise<void> {
  // Broken plant credentials stop the process here, not at the first request
  const config = loadConfig(process.env);

  const { app, registry, pools } = createPlantGateApp(config);

  const server = app.listen(config.http.port, () => {
    console.log(
      `[App] PlantGate listening on port ${config.http.port} (${registry.size} plant(s): ${registry.keys().join(', ') || 'none'})`
    );
  });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('[App] Shutting down...');
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
    await pools.closeAll();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      console.error('[App] Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`[App] ${err.message}`);
  } else {
    console.error('[App] Fatal error:', err);
  }
  process.exit(1);
});
