import { NodeInfo } from '../../types/types';

/**
 * Cluster membership as seen by one node.
 */
export interface ClusterView {
  readonly self: NodeInfo;
  readonly size: number;
  readonly quorumSize: number;
  peers(): NodeInfo[];
  peer(id: string): NodeInfo | undefined;
  isSelf(id: string): boolean;
}

export function quorumSizeFor(clusterSize: number): number {
  return Math.floor(clusterSize / 2) + 1;
}

/**
 * Membership fixed at boot. Nodes never join or leave while running.
 */
export class StaticClusterView implements ClusterView {
  public readonly self: NodeInfo;
  private readonly peerList: ReadonlyArray<NodeInfo>;
  private readonly peerIndex: ReadonlyMap<string, NodeInfo>;

  constructor(self: NodeInfo, peers: NodeInfo[]) {
    const index = new Map<string, NodeInfo>();

    for (const peer of peers) {
      if (peer.id === self.id) {
        throw new Error(`Peer list must not contain this node (${self.id})`);
      }
      if (index.has(peer.id)) {
        throw new Error(`Duplicate peer ${peer.id}`);
      }
      index.set(peer.id, Object.freeze({ ...peer }));
    }

    this.self = Object.freeze({ ...self });
    this.peerIndex = index;
    this.peerList = Object.freeze(Array.from(index.values()));
  }

  public get size(): number {
    return this.peerList.length + 1;
  }

  public get quorumSize(): number {
    return quorumSizeFor(this.size);
  }

  public peers(): NodeInfo[] {
    return [...this.peerList];
  }

  public peer(id: string): NodeInfo | undefined {
    return this.peerIndex.get(id);
  }

  public isSelf(id: string): boolean {
    return id === this.self.id;
  }
}
