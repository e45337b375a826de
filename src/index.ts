import { env } from './env';
import { log } from './log';
import { buildServer } from './server';

const { server, wss, registry } = buildServer();

server.listen(env.PORT, () => {
  log.info({ port: env.PORT, media_path: env.MEDIA_PATH }, 'server listening');
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info({ signal, sessions: registry.size }, 'shutting down');

  await registry.closeAll('server_shutdown');
  for (const client of wss.clients) {
    client.close(1001, 'server_shutdown');
  }
  wss.close();
  server.close((error) => {
    if (error) {
      log.error({ err: error }, 'server close failed');
      process.exitCode = 1;
    }
  });
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.error({ err: error }, 'shutdown failed');
      process.exitCode = 1;
    });
  });
}
