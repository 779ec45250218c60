export class BridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Gateway unreachable or returned something we could not decode. */
export class TransportError extends BridgeError {}

/** The C2 proof response cannot be turned into a StateProof for the request. */
export class ProofConstructionError extends BridgeError {}

/** A transaction or view call reverted on C1. */
export class TransactionRejectedError extends BridgeError {
  readonly functionName: string;
  readonly reason: string | null;

  constructor(
    functionName: string,
    reason: string | null,
    options?: { cause?: unknown },
  ) {
    super(
      `${functionName} reverted${reason ? `: ${reason}` : ""}`,
      options,
    );
    this.functionName = functionName;
    this.reason = reason;
  }
}

export class NotFoundError extends BridgeError {
  readonly requestId: bigint;

  constructor(requestId: bigint, options?: { cause?: unknown }) {
    super(`No request with id=${requestId}`, options);
    this.requestId = requestId;
  }
}

export class WaitTimeoutError extends BridgeError {
  readonly requestId: bigint;
  readonly timeoutMs: number;

  constructor(requestId: bigint, timeoutMs: number) {
    super(`Request ${requestId} not served within ${timeoutMs}ms`);
    this.requestId = requestId;
    this.timeoutMs = timeoutMs;
  }
}

export class RequestReleasedError extends BridgeError {
  readonly requestId: bigint;

  constructor(requestId: bigint) {
    super(`Request ${requestId} was released before it was served`);
    this.requestId = requestId;
  }
}

export class InvalidRequestError extends BridgeError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
