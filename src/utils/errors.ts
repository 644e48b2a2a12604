export class ReplicationError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = 'ReplicationError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Malformed input. Raised before anything is stored or sent to a peer.
 */
export class ValidationError extends ReplicationError {
  constructor(public readonly issues: ValidationIssue[]) {
    super('VALIDATION_ERROR', `Invalid payload: ${issues.map(formatIssue).join('; ')}`);
    this.name = 'ValidationError';
  }
}

export class QuorumNotReachedError extends ReplicationError {
  constructor(
    public readonly messageId: string,
    public readonly acks: number,
    public readonly required: number,
    public readonly total: number
  ) {
    super(
      'QUORUM_NOT_REACHED',
      `Only ${acks}/${total} nodes acknowledged the write, required ${required} for quorum.`
    );
    this.name = 'QuorumNotReachedError';
  }
}

export class TransportError extends ReplicationError {
  constructor(
    public readonly peerId: string,
    message: string,
    code: string = 'TRANSPORT_ERROR'
  ) {
    super(code, message);
    this.name = 'TransportError';
  }
}

export class PeerTimeoutError extends TransportError {
  constructor(peerId: string, public readonly timeoutMs: number) {
    super(peerId, `Peer ${peerId} did not respond within ${timeoutMs}ms`, 'PEER_TIMEOUT');
    this.name = 'PeerTimeoutError';
  }
}

export class PeerUnreachableError extends TransportError {
  constructor(peerId: string, reason: string) {
    super(peerId, `Peer ${peerId} is unreachable: ${reason}`, 'PEER_UNREACHABLE');
    this.name = 'PeerUnreachableError';
  }
}

/** The peer answered, but not with a usable success response. */
export class PeerResponseError extends TransportError {
  constructor(peerId: string, public readonly status: number, detail: string) {
    super(peerId, `Peer ${peerId} answered ${status}: ${detail}`, 'PEER_RESPONSE');
    this.name = 'PeerResponseError';
  }
}

export class ConfigError extends ReplicationError {
  constructor(public readonly issues: ValidationIssue[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.map(formatIssue).join('; ')}`);
    this.name = 'ConfigError';
  }
}

function formatIssue(issue: ValidationIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
