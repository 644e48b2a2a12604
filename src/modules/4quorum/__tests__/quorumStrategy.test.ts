import { QuorumStrategy } from '../quorumStrategy';
import { ConsistencyMode, Message } from '../../../types/types';
import { messageIdFor } from '../../6coordinator/replicationCoordinator';
import { TestCluster, createInMemoryCluster } from '../../../__tests__/utils/inMemoryCluster';

function createMessage(originNode: string, version: number): Message {
  return {
    id: messageIdFor(originNode, version),
    text: `message ${version}`,
    user: 'alice',
    originNode,
    version,
    acceptedAt: 1_700_000_000_000
  };
}

function holders(cluster: TestCluster, id: string): string[] {
  return Array.from(cluster.nodes.values())
    .filter((node) => node.store.contains(id))
    .map((node) => node.config.id)
    .sort();
}

function strategyFor(cluster: TestCluster, nodeId: string, timeoutMs = 200): QuorumStrategy {
  const node = cluster.node(nodeId);
  return new QuorumStrategy(node.store, node.cluster, cluster.network.transportFor(nodeId, timeoutMs));
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('QuorumStrategy', () => {
  let cluster: TestCluster;

  afterEach(() => {
    cluster.network.heal();
    cluster.stop();
  });

  describe('three nodes', () => {
    beforeEach(() => {
      cluster = createInMemoryCluster(['node-a', 'node-b', 'node-c'], ConsistencyMode.QUORUM);
    });

    it('commits once a majority acknowledges', async () => {
      const message = createMessage('node-a', 1);

      const outcome = await strategyFor(cluster, 'node-a').write(message);

      expect(outcome.status).toBe('committed');
      expect(outcome.acks).toBe(2);
      expect(outcome.required).toBe(2);
      expect(outcome.total).toBe(3);
      expect(outcome.ackedBy).toHaveLength(2);
      expect(outcome.ackedBy[0]).toBe('node-a');
      expect(cluster.node('node-a').store.listAll()).toEqual([message]);
    });

    it('lets lagging peers receive the message after the commit', async () => {
      const message = createMessage('node-a', 1);

      await strategyFor(cluster, 'node-a').write(message);
      await flush();

      expect(holders(cluster, message.id)).toEqual(['node-a', 'node-b', 'node-c']);
    });

    it('holds the message on a majority at the moment of commit', async () => {
      const message = createMessage('node-a', 1);
      const origin = cluster.node('node-a');
      const peersHoldingAtCommit: number[] = [];
      const append = origin.store.append.bind(origin.store);
      jest.spyOn(origin.store, 'append').mockImplementation((incoming) => {
        peersHoldingAtCommit.push(holders(cluster, incoming.id).length);
        return append(incoming);
      });

      await strategyFor(cluster, 'node-a').write(message);

      // the origin itself is the remaining vote
      expect(peersHoldingAtCommit).toHaveLength(1);
      expect(peersHoldingAtCommit[0]).toBeGreaterThanOrEqual(1);
    });

    it('rejects and keeps nothing locally when the origin is isolated', async () => {
      cluster.network.isolate('node-a');
      const message = createMessage('node-a', 1);

      const outcome = await strategyFor(cluster, 'node-a').write(message);

      expect(outcome).toEqual({
        status: 'rejected',
        message,
        acks: 1,
        required: 2,
        total: 3,
        ackedBy: ['node-a']
      });
      expect(holders(cluster, message.id)).toEqual([]);
    });

    it('commits without waiting for a hung peer', async () => {
      cluster.network.setHung('node-c', true);
      const strategy = strategyFor(cluster, 'node-a', 5000);
      const started = Date.now();

      const outcome = await strategy.write(createMessage('node-a', 1));

      expect(outcome.status).toBe('committed');
      expect(outcome.ackedBy).toEqual(['node-a', 'node-b']);
      expect(Date.now() - started).toBeLessThan(1000);
    });

    it('rejects as soon as quorum becomes impossible, without waiting for timeouts', async () => {
      cluster.network.unregister('node-b');
      cluster.network.unregister('node-c');
      const strategy = strategyFor(cluster, 'node-a', 5000);
      const started = Date.now();

      const outcome = await strategy.write(createMessage('node-a', 1));

      expect(outcome.status).toBe('rejected');
      expect(Date.now() - started).toBeLessThan(1000);
    });

    it('waits for the timeout while a hung peer could still make quorum', async () => {
      cluster.network.unregister('node-b');
      cluster.network.setHung('node-c', true);
      const strategy = strategyFor(cluster, 'node-a', 50);

      const outcome = await strategy.write(createMessage('node-a', 1));

      expect(outcome.status).toBe('rejected');
      expect(outcome.acks).toBe(1);
    });

    it('has no pending writes once decided', async () => {
      const strategy = strategyFor(cluster, 'node-a');
      const write = strategy.write(createMessage('node-a', 1));

      expect(strategy.pendingWrites).toBe(1);
      await write;
      expect(strategy.pendingWrites).toBe(0);
    });

  });

  it('commits immediately in a single-node cluster', async () => {
    cluster = createInMemoryCluster(['solo'], ConsistencyMode.QUORUM);
    const message = createMessage('solo', 1);

    const outcome = await strategyFor(cluster, 'solo').write(message);

    expect(outcome).toEqual({
      status: 'committed',
      message,
      acks: 1,
      required: 1,
      total: 1,
      ackedBy: ['solo']
    });
    expect(cluster.node('solo').store.listAll()).toEqual([message]);
  });

  describe('five nodes', () => {
    const ids = ['node-a', 'node-b', 'node-c', 'node-d', 'node-e'];

    beforeEach(() => {
      cluster = createInMemoryCluster(ids, ConsistencyMode.QUORUM);
    });

    it('commits with two peers down', async () => {
      cluster.network.partition(['node-a', 'node-b', 'node-c'], ['node-d', 'node-e']);

      const outcome = await strategyFor(cluster, 'node-a').write(createMessage('node-a', 1));

      expect(outcome.status).toBe('committed');
      expect(outcome.acks).toBe(3);
      expect(outcome.required).toBe(3);
    });

    it('collects acknowledgements concurrently', async () => {
      ids.forEach((id) => cluster.network.setLatency(id, 80));
      const strategy = strategyFor(cluster, 'node-a', 1000);
      const started = Date.now();

      const outcome = await strategy.write(createMessage('node-a', 1));

      expect(outcome.status).toBe('committed');
      // two sequential 80ms round trips would take at least 160ms
      expect(Date.now() - started).toBeLessThan(150);
    });

    it('leaves copies on peers that acknowledged a rejected write', async () => {
      cluster.network.partition(['node-a', 'node-b'], ['node-c', 'node-d', 'node-e']);
      const message = createMessage('node-a', 1);

      const outcome = await strategyFor(cluster, 'node-a').write(message);
      await flush();

      expect(outcome.status).toBe('rejected');
      expect(outcome.acks).toBeLessThan(3);
      expect(holders(cluster, message.id)).toEqual(['node-b']);
    });
  });
});
