import { getConfig } from './lib/config.js';
import { buildServer } from './server.js';

/**
 * Start the server
 */
async function start(): Promise<void> {
  const config = getConfig();
  const server = await buildServer({ config });

  try {
    await server.listen({
      port: config.api.port,
      host: config.api.host,
    });

    server.log.info(
      {
        port: config.api.port,
        host: config.api.host,
        scorer: config.fusion.modelPath ? 'trained-model' : 'weighted-average',
        webhookIngestion: config.webhook.secret !== undefined,
      },
      'Riskweave API started',
    );
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

start().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
