import type { Server } from 'node:http';
import dotenv from 'dotenv';
import { launchPipeline, startNode, type NodeHandle } from '../simulation/engine/Pipeline.js';
import { ClientNode, type ClientSummary } from '../simulation/nodes/ClientNode.js';
import { AddressBook } from '../simulation/runtime/AddressBook.js';
import { findNodeDefinition } from '../simulation/types/topology.js';
import { createLogger, setLogLevel } from '../simulation/utils/log.js';
import { describeError } from '../simulation/utils/random.js';
import { adminPortFor, loadConfig, type ServerConfig } from './config.js';
import { closeAdminServer, createAdminApp, startAdminServer } from './services/adminServer.js';

dotenv.config();

const log = createLogger('pipeline');

function formatSummary(summary: ClientSummary): string {
  return [
    `Client ${summary.clientId} summary:`,
    `  Total requests: ${summary.total}`,
    `  Successful: ${summary.successful}`,
    `  Failed: ${summary.failed}`,
    `  Success rate: ${(summary.successRate * 100).toFixed(1)}%`
  ].join('\n');
}

async function startAdmin(settings: ServerConfig, handles: readonly NodeHandle[]): Promise<Server[]> {
  const base = settings.adminPortBase;
  if (base === null) return [];

  const servers: Server[] = [];
  for (const handle of handles) {
    const port = adminPortFor(base, handle.id);
    if (port === null) continue;
    const app = createAdminApp({ node: handle.node, corsOrigin: settings.corsOrigin });
    servers.push(await startAdminServer(app, port, settings.pipeline.host));
  }
  return servers;
}

async function runWorkloads(clients: readonly ClientNode[], settings: ServerConfig): Promise<void> {
  const { requestCount, requestIntervalMs } = settings.pipeline.client;
  const summaries = await Promise.all(
    clients.map((client) => client.runWorkload({ count: requestCount, intervalMs: requestIntervalMs }))
  );
  for (const summary of summaries) {
    console.log(formatSummary(summary));
  }
}

async function main(): Promise<void> {
  const settings = loadConfig(process.env);
  setLogLevel(settings.logLevel);

  let handles: readonly NodeHandle[];
  let stopNodes: () => Promise<void>;
  let clients: ClientNode[];

  if (settings.node === 'all') {
    const pipeline = await launchPipeline(settings.pipeline);
    handles = pipeline.handles;
    clients = pipeline.clients;
    stopNodes = async () => {
      const snapshot = pipeline.snapshot();
      log.info(
        `processed ${snapshot.totalProcessed} requests, success rate ${(snapshot.successRate * 100).toFixed(1)}%, bottleneck ${snapshot.bottleneckNodeId ?? 'none'}`
      );
      await pipeline.stop();
    };
  } else {
    const definition = findNodeDefinition(settings.node);
    if (!definition) throw new Error(`Unknown node ${settings.node}`);
    const addressBook = AddressBook.fromPorts(settings.pipeline.host, settings.pipeline.ports);
    const handle = await startNode(definition, { config: settings.pipeline, addressBook });
    handles = [handle];
    clients = handle.node instanceof ClientNode ? [handle.node] : [];
    stopNodes = () => handle.stop();
  }

  const adminServers = await startAdmin(settings, handles);

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    stopping ??= (async () => {
      log.info('shutting down');
      await Promise.all(adminServers.map((server) => closeAdminServer(server)));
      await stopNodes();
    })();
    return stopping;
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    log.info(`received ${signal}`);
    shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error(`shutdown failed: ${describeError(err)}`);
        process.exit(1);
      });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  if (clients.length > 0) {
    await runWorkloads(clients, settings);
    await shutdown();
  }
}

main().catch((err: unknown) => {
  log.error(`fatal: ${describeError(err)}`);
  process.exit(1);
});
