import { z } from 'zod';
import { ConsistencyMode, NodeConfiguration, NodeInfo } from '../types/types';
import { ConfigError } from '../utils/errors';
import { LogLevel, logWarning, parseLogLevel } from '../utils/logger';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const modeSchema = z
  .string()
  .default('quorum')
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(['quorum', 'strong', 'gossip', 'eventual']))
  .transform((v) => (v === 'gossip' || v === 'eventual' ? ConsistencyMode.GOSSIP : ConsistencyMode.QUORUM));

const EnvSchema = z.object({
  NODE_ID: z.string().trim().min(1).optional(),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  MODE: modeSchema,
  PEERS: z.string().default(''),
  GOSSIP_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
  GOSSIP_JITTER_MS: z.coerce.number().int().nonnegative().default(0),
  GOSSIP_FANOUT: z.coerce.number().int().nonnegative().default(0),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  DEBUG: booleanFlag
});

export interface LoadedConfig {
  node: NodeConfiguration;
  logLevel: LogLevel;
}

/**
 * Accepts `host:port`, `http(s)://host:port` or `id=url`. Without an explicit
 * id the peer is known by its `host:port`.
 */
export function parsePeer(entry: string): NodeInfo {
  const separator = entry.indexOf('=');
  const explicitId = separator > 0 ? entry.slice(0, separator).trim() : undefined;
  const target = separator > 0 ? entry.slice(separator + 1).trim() : entry.trim();
  const address = /^https?:\/\//.test(target) ? target : `http://${target}`;

  let url: URL;
  try {
    url = new URL(address);
  } catch {
    throw new ConfigError([{ path: 'PEERS', message: `"${entry}" is not a valid peer address` }]);
  }

  return {
    id: explicitId || url.host,
    address: `${url.protocol}//${url.host}`
  };
}

export function parsePeers(raw: string, selfId: string): NodeInfo[] {
  const peers: NodeInfo[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(',').map((p) => p.trim()).filter((p) => p.length > 0)) {
    const peer = parsePeer(entry);
    if (peer.id === selfId) {
      logWarning(`Ignoring peer ${entry}: it is this node`);
      continue;
    }
    if (seen.has(peer.id)) {
      throw new ConfigError([{ path: 'PEERS', message: `duplicate peer ${peer.id}` }]);
    }
    seen.add(peer.id);
    peers.push(peer);
  }

  return peers;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  random: () => number = Math.random
): LoadedConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }

  const values = parsed.data;
  const id = values.NODE_ID ?? `node-${Math.floor(random() * 1000)}`;

  return {
    node: {
      id,
      host: values.HOST,
      port: values.PORT,
      mode: values.MODE,
      peers: parsePeers(values.PEERS, id),
      gossipIntervalMs: values.GOSSIP_INTERVAL_MS,
      gossipJitterMs: values.GOSSIP_JITTER_MS,
      gossipFanout: values.GOSSIP_FANOUT,
      requestTimeoutMs: values.REQUEST_TIMEOUT_MS
    },
    logLevel: values.DEBUG ? LogLevel.DEBUG : parseLogLevel(values.LOG_LEVEL)
  };
}
