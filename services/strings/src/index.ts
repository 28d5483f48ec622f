import { buildApp } from './server';
import { config } from './config';

/**
 * Main entrypoint for the string analyzer service.
 * Builds the app around a fresh in-memory store and listens on the configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel } });

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting string analyzer:', err);
  process.exit(1);
});
