import { Digest, Message } from '../../types/types';
import { logDebug } from '../../utils/logger';

/**
 * Append-only, in-memory message log for a single node.
 *
 * Entries are keyed by message id and never replaced or removed, so merging
 * the same message twice is a no-op. Listing follows local insertion order,
 * which can differ between nodes that received messages along different paths.
 */
export class MessageStore {
  private nodeId: string;
  private byId: Map<string, Message> = new Map();
  private log: Message[] = [];
  private versionsByOrigin: Map<string, Set<number>> = new Map();

  constructor(nodeId: string) {
    this.nodeId = nodeId;
  }

  public get size(): number {
    return this.log.length;
  }

  /**
   * Returns false when a message with the same id is already stored.
   */
  public append(message: Message): boolean {
    if (this.byId.has(message.id)) {
      logDebug(`Node ${this.nodeId} ignored duplicate message ${message.id}`);
      return false;
    }

    const entry: Message = Object.freeze({ ...message });
    this.byId.set(entry.id, entry);
    this.log.push(entry);

    const versions = this.versionsByOrigin.get(entry.originNode) ?? new Set<number>();
    versions.add(entry.version);
    this.versionsByOrigin.set(entry.originNode, versions);

    return true;
  }

  public merge(messages: Message[]): number {
    let added = 0;
    for (const message of messages) {
      if (this.append(message)) {
        added++;
      }
    }
    return added;
  }

  public listAll(): Message[] {
    return [...this.log];
  }

  public contains(id: string): boolean {
    return this.byId.has(id);
  }

  public highestVersion(originNode: string): number | undefined {
    const versions = this.versionsByOrigin.get(originNode);
    return versions ? Math.max(...versions) : undefined;
  }

  public digest(): Digest {
    const digest: Digest = {};
    this.versionsByOrigin.forEach((versions, origin) => {
      digest[origin] = Array.from(versions).sort((a, b) => a - b);
    });
    return digest;
  }

  /**
   * Messages a node summarised by `digest` does not hold yet.
   *
   * The digest lists every version held, not just the highest one: a node that
   * restarts empty keeps issuing higher versions, so what it holds of an
   * origin is not always a prefix.
   */
  public missingFrom(digest: Digest): Message[] {
    const known = new Map<string, Set<number>>();
    for (const origin of Object.keys(digest)) {
      known.set(origin, new Set(digest[origin]));
    }
    return this.log.filter((message) => !known.get(message.originNode)?.has(message.version));
  }
}
