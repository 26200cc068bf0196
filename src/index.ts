import { buildApp } from './app.js';
import { config } from './config.js';

async function main(): Promise<void> {
  const { app, stateStore, logger } = await buildApp(config);

  const shutdown = async (signal: string): Promise<void> => {
    await logger.log('info', 'shutdown.start', { signal });
    await app.close();
    await stateStore.flush();
    await logger.log('info', 'shutdown.complete', { signal });
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      console.error(error);
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  await app.listen({ port: config.app.port, host: '0.0.0.0' });

  await logger.log('info', 'server.started', {
    port: config.app.port,
    env: config.app.env,
    governanceAddress: config.governance.address,
    majorityPercentage: stateStore.snapshot().governance.majorityPercentage,
    votingWindowMs: config.governance.votingWindowMs,
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
