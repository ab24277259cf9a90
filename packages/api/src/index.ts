import { loadConfig } from './config.js';
import { createServer } from './server.js';
import { shutdown } from './shutdown.js';

async function main() {
  const config = loadConfig();
  const server = createServer({ config });

  await server.listen({ port: config.server.port, host: config.server.host });

  // Graceful shutdown
  const onSignal = () => {
    void shutdown(server).then((code) => process.exit(code));
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
