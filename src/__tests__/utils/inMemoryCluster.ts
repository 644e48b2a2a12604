/**
 * Builds a cluster of nodes wired through an InMemoryNetwork.
 */
import { ConsistencyMode, NodeConfiguration } from '../../types/types';
import { VersionClock } from '../../modules/1storage/versionClock';
import { InMemoryNetwork } from '../../modules/3transport/inMemoryTransport';
import { ReplicaNode, createReplicaNode } from '../../modules/6coordinator/replicaNode';

export interface TestClusterOptions {
  timeoutMs?: number;
  gossipIntervalMs?: number;
  gossipFanout?: number;
}

export interface TestCluster {
  network: InMemoryNetwork;
  nodes: Map<string, ReplicaNode>;
  node(id: string): ReplicaNode;
  /** Replaces a node with a fresh, empty one under the same id. */
  restart(id: string, clock: VersionClock): ReplicaNode;
  stop(): void;
}

export function createInMemoryCluster(
  ids: string[],
  mode: ConsistencyMode,
  options: TestClusterOptions = {}
): TestCluster {
  const network = new InMemoryNetwork();
  const nodes = new Map<string, ReplicaNode>();
  const timeoutMs = options.timeoutMs ?? 200;

  const boot = (config: NodeConfiguration, clock: VersionClock): ReplicaNode => {
    const node = createReplicaNode(
      config,
      (liveness) => network.transportFor(config.id, timeoutMs, liveness),
      { clock }
    );
    network.register(config.id, node.coordinator);
    nodes.set(config.id, node);
    return node;
  };

  for (const id of ids) {
    const config: NodeConfiguration = {
      id,
      host: 'localhost',
      port: 0,
      mode,
      peers: ids.filter((peerId) => peerId !== id).map((peerId) => ({ id: peerId, address: `memory://${peerId}` })),
      gossipIntervalMs: options.gossipIntervalMs ?? 1000,
      gossipJitterMs: 0,
      gossipFanout: options.gossipFanout ?? 0,
      requestTimeoutMs: timeoutMs
    };

    boot(config, new VersionClock(() => 0));
  }

  const node = (id: string): ReplicaNode => {
    const found = nodes.get(id);
    if (!found) {
      throw new Error(`No node ${id} in test cluster`);
    }
    return found;
  };

  return {
    network,
    nodes,
    node,
    restart(id: string, clock: VersionClock) {
      const previous = node(id);
      previous.coordinator.stop();
      return boot(previous.config, clock);
    },
    stop() {
      nodes.forEach((node) => node.coordinator.stop());
    }
  };
}

export function ids(messages: { id: string }[]): string[] {
  return messages.map((message) => message.id).sort();
}
