// apps/http/src/index.ts
import path from 'node:path';
import { loadConfig, parseListen, readEnv } from '@fieldlink/config';
import { createLogger } from '@fieldlink/core';
import { Registry } from '@fieldlink/resolver';
import { createConnector } from './relations';
import { buildServer } from './server';

async function main() {
  const env = readEnv();
  const logger = createLogger({ level: env.LOG_LEVEL });

  // ---- config + relations: any failure here stops the process before it listens ----
  const config = loadConfig(env);
  const { host, port } = parseListen(config.listen);
  logger.info(
    {
      config: config.path,
      fields: config.fields.map((f) => f.id),
      relations: config.relations.map((r) => r.name),
      maxDepth: config.maxDepth,
      requestTimeoutMs: config.requestTimeoutMs,
    },
    'config-loaded'
  );

  const registry = await Registry.build(config, createConnector({ baseDir: path.dirname(config.path) }), logger);

  const app = await buildServer({
    registry,
    logger,
    maxDepth: config.maxDepth,
    requestTimeoutMs: config.requestTimeoutMs,
    corsOrigin: env.CORS_ORIGIN,
  });

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await app.close();
      await registry.close(app.log);
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'shutdown-failed');
      process.exit(1);
    }
  };
  process.once('SIGINT', () => void onShutdown('SIGINT'));
  process.once('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ host, port });
  app.log.info(`HTTP on ${host}:${port}`);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
