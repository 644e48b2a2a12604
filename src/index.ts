/**
 * Replicated Chat Log node
 *
 * Boots one cluster member:
 * 1. Configuration from the environment (and .env)
 * 2. Message store, static cluster view and HTTP transport to peers
 * 3. Replication coordinator in quorum or gossip mode
 * 4. HTTP API for clients and peers
 */
import * as dotenv from 'dotenv';
import { loadConfig } from './config/config';
import { HttpTransport } from './modules/3transport/httpTransport';
import { createReplicaNode } from './modules/6coordinator/replicaNode';
import { ChatHttpServer } from './modules/7api/httpServer';
import { describeError } from './utils/errors';
import { logError, logInfo, setLogLevel } from './utils/logger';

// Load environment configurations
dotenv.config();

async function main() {
  const { node: config, logLevel } = loadConfig();
  setLogLevel(logLevel);

  logInfo(`Initializing node ${config.id} (${config.mode}) with peers: ${config.peers.map((p) => p.id).join(', ') || 'none'}`);

  const node = createReplicaNode(
    config,
    (liveness) => new HttpTransport(config.id, config.requestTimeoutMs, liveness)
  );
  const server = new ChatHttpServer(node.coordinator);

  await server.start(config.port, config.host);
  node.coordinator.start();

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logInfo(`Received ${signal}, shutting down node ${config.id}...`);
    node.coordinator.stop();
    server.stop().then(
      () => process.exit(0),
      (error) => {
        logError(`Error while stopping HTTP server: ${describeError(error)}`);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  logError(`Node failed to start: ${describeError(error)}`);
  process.exit(1);
});
