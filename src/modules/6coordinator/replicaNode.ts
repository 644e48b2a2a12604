import { NodeConfiguration } from '../../types/types';
import { MessageStore } from '../1storage/messageStore';
import { VersionClock } from '../1storage/versionClock';
import { ClusterView, StaticClusterView } from '../2cluster/clusterView';
import { PeerLivenessTracker } from '../2cluster/peerLiveness';
import { Transport } from '../3transport/transport';
import { ReplicationCoordinator } from './replicationCoordinator';

export interface ReplicaNode {
  config: NodeConfiguration;
  store: MessageStore;
  cluster: ClusterView;
  liveness: PeerLivenessTracker;
  coordinator: ReplicationCoordinator;
}

export interface ReplicaNodeOverrides {
  clock?: VersionClock;
  now?: () => number;
  random?: () => number;
}

export function createReplicaNode(
  config: NodeConfiguration,
  makeTransport: (liveness: PeerLivenessTracker) => Transport,
  overrides: ReplicaNodeOverrides = {}
): ReplicaNode {
  const cluster = new StaticClusterView({ id: config.id, address: `http://${config.host}:${config.port}` }, config.peers);
  const store = new MessageStore(config.id);
  const liveness = new PeerLivenessTracker(config.id, config.peers.map((peer) => peer.id), overrides.now);

  const coordinator = new ReplicationCoordinator({
    mode: config.mode,
    store,
    cluster,
    transport: makeTransport(liveness),
    liveness,
    gossip: {
      intervalMs: config.gossipIntervalMs,
      jitterMs: config.gossipJitterMs,
      fanout: config.gossipFanout,
      random: overrides.random
    },
    clock: overrides.clock,
    now: overrides.now
  });

  return { config, store, cluster, liveness, coordinator };
}
