import { tagToString } from './codec';

/**
 * Which part of a response failed validation
 */
export type ProtocolErrorKind = 'tag-mismatch' | 'length-mismatch' | 'echo-mismatch';

/**
 * Base class for every error raised by this package
 */
export class Id100Error extends Error {
  public readonly name: string = 'Id100Error';

  constructor(message: string) {
    super(message);
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The device answered, but the answer does not match the request.
 * Raised for a foreign command tag, a payload of the wrong size, or a wrong echoed value.
 */
export class Id100ProtocolError extends Id100Error {
  public readonly name: string = 'Id100ProtocolError';

  constructor(
    public readonly kind: ProtocolErrorKind,
    public readonly command: number,
    public readonly expected: number,
    public readonly received: number,
    message: string
  ) {
    super(message);
  }

  static tagMismatch(command: number, received: number): Id100ProtocolError {
    return new Id100ProtocolError('tag-mismatch', command, command, received,
      `Invalid answer command received: '${tagToString(received)}'`);
  }

  static lengthMismatch(command: number, expected: number, received: number): Id100ProtocolError {
    return new Id100ProtocolError('length-mismatch', command, expected, received,
      `Invalid length received: ${received}`);
  }

  static echoMismatch(command: number, expected: number, received: number): Id100ProtocolError {
    return new Id100ProtocolError('echo-mismatch', command, expected, received,
      `Bad page number received: ${received}`);
  }

  /**
   * Get detailed error information for debugging
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      kind: this.kind,
      command: tagToString(this.command),
      expected: this.expected,
      received: this.received
    };
  }
}

/**
 * A second request was started while one is still waiting for its answer
 */
export class Id100BusyError extends Id100Error {
  public readonly name: string = 'Id100BusyError';

  constructor(public readonly command: number) {
    super(`Cannot send '${tagToString(command)}': another request is in flight`);
  }
}

export class Id100NotConnectedError extends Id100Error {
  public readonly name: string = 'Id100NotConnectedError';

  constructor(public readonly operation: string) {
    super(`Cannot ${operation}: not connected`);
  }
}

export class Id100TimeoutError extends Id100Error {
  public readonly name: string = 'Id100TimeoutError';

  constructor(public readonly timeoutMs: number) {
    super(`No answer received within ${timeoutMs}ms`);
  }
}
