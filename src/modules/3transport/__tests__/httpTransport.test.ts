import { createServer, Server } from 'http';
import { HttpTransport } from '../httpTransport';
import { InMemoryNetwork } from '../inMemoryTransport';
import { PeerLivenessTracker } from '../../2cluster/peerLiveness';
import { VersionClock } from '../../1storage/versionClock';
import { ReplicaNode, createReplicaNode } from '../../6coordinator/replicaNode';
import { messageIdFor } from '../../6coordinator/replicationCoordinator';
import { ChatHttpServer } from '../../7api/httpServer';
import {
  PeerResponseError,
  PeerTimeoutError,
  PeerUnreachableError
} from '../../../utils/errors';
import { ConsistencyMode, Message } from '../../../types/types';

function buildNode(id: string, mode: ConsistencyMode): ReplicaNode {
  const network = new InMemoryNetwork();
  return createReplicaNode(
    {
      id,
      host: '127.0.0.1',
      port: 0,
      mode,
      peers: [],
      gossipIntervalMs: 1000,
      gossipJitterMs: 0,
      gossipFanout: 0,
      requestTimeoutMs: 100
    },
    (liveness) => network.transportFor(id, 100, liveness),
    { clock: new VersionClock(() => 0) }
  );
}

const message: Message = {
  id: messageIdFor('node-a', 1),
  text: 'over the wire',
  user: 'alice',
  originNode: 'node-a',
  version: 1,
  acceptedAt: 1_700_000_000_000
};

describe('HttpTransport', () => {
  let gossipNode: ReplicaNode;
  let quorumNode: ReplicaNode;
  let gossipServer: ChatHttpServer;
  let quorumServer: ChatHttpServer;
  let gossipPeer: { id: string; address: string };
  let quorumPeer: { id: string; address: string };

  beforeEach(async () => {
    gossipNode = buildNode('node-b', ConsistencyMode.GOSSIP);
    quorumNode = buildNode('node-c', ConsistencyMode.QUORUM);
    gossipServer = new ChatHttpServer(gossipNode.coordinator);
    quorumServer = new ChatHttpServer(quorumNode.coordinator);
    const gossipAddress = await gossipServer.start(0, '127.0.0.1');
    const quorumAddress = await quorumServer.start(0, '127.0.0.1');
    gossipPeer = { id: 'node-b', address: `http://127.0.0.1:${gossipAddress.port}` };
    quorumPeer = { id: 'node-c', address: `http://127.0.0.1:${quorumAddress.port}` };
  });

  afterEach(async () => {
    await gossipServer.stop();
    await quorumServer.stop();
  });

  it('replicates a message and reports duplicates', async () => {
    const transport = new HttpTransport('node-a', 1000);

    await expect(transport.replicate(gossipPeer, message)).resolves.toEqual({ nodeId: 'node-b', duplicate: false });
    await expect(transport.replicate(gossipPeer, message)).resolves.toEqual({ nodeId: 'node-b', duplicate: true });
    expect(gossipNode.store.listAll()).toEqual([message]);
  });

  it('exchanges digests and messages', async () => {
    const transport = new HttpTransport('node-a', 1000);

    const response = await transport.exchange(gossipPeer, {
      from: 'node-a',
      digest: {},
      messages: [message]
    });

    expect(response).toEqual({ from: 'node-b', digest: { 'node-a': [1] }, messages: [message] });
    expect(gossipNode.store.contains(message.id)).toBe(true);
  });

  it('reports an error status from the peer as a response error', async () => {
    const transport = new HttpTransport('node-a', 1000);

    const failure = transport.exchange(quorumPeer, { from: 'node-a', digest: {} });

    await expect(failure).rejects.toBeInstanceOf(PeerResponseError);
    await expect(failure).rejects.toMatchObject({ status: 409, peerId: 'node-c' });
  });

  it('reports a closed port as unreachable', async () => {
    const { port } = quorumServer.address();
    await quorumServer.stop();
    const liveness = new PeerLivenessTracker('node-a', ['node-c']);
    const transport = new HttpTransport('node-a', 1000, liveness);

    await expect(
      transport.replicate({ id: 'node-c', address: `http://127.0.0.1:${port}` }, message)
    ).rejects.toBeInstanceOf(PeerUnreachableError);
    expect(liveness.get('node-c')?.reachable).toBe(false);
  });

  describe('against a peer that never answers', () => {
    let silent: Server;
    let address: string;

    beforeEach(async () => {
      silent = createServer(() => undefined);
      await new Promise<void>((resolve) => silent.listen(0, '127.0.0.1', resolve));
      const info = silent.address();
      if (!info || typeof info === 'string') {
        throw new Error('expected a TCP address');
      }
      address = `http://127.0.0.1:${info.port}`;
    });

    afterEach(async () => {
      silent.closeAllConnections();
      await new Promise<void>((resolve) => silent.close(() => resolve()));
    });

    it('times out', async () => {
      const transport = new HttpTransport('node-a', 50);

      await expect(transport.replicate({ id: 'node-d', address }, message)).rejects.toBeInstanceOf(PeerTimeoutError);
    });
  });
});
