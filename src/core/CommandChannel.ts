import { Link, Operation } from '../types';
import { dbg, dbgV } from '../utils/debug';
import { hex, tagToString } from '../utils/codec';
import { Id100BusyError, Id100ProtocolError } from '../utils/errors';

/**
 * Request/response choke point: every device operation goes through transact().
 *
 * Sends one tagged frame, waits for exactly one answer and checks that the
 * answer carries the same tag and the expected payload length. Only one
 * request may be outstanding at a time; there is no queueing.
 */
export class CommandChannel {
  private busy = false;

  constructor(private link: Link) {}

  get inFlight(): boolean { return this.busy; }

  async transact(command: number, request: Buffer, responseLength: number): Promise<Buffer> {
    if (this.busy) throw new Id100BusyError(command);
    this.busy = true;
    try {
      dbg(`-> '${tagToString(command)}' len=${request.length}`);
      if (request.length > 0) dbgV(`   ${hex(request)}`);
      await this.link.send(command, request);

      const frame = await this.link.receive();
      dbg(`<- '${tagToString(frame.command)}' len=${frame.payload.length}`);
      if (frame.payload.length > 0) dbgV(`   ${hex(frame.payload)}`);

      if (frame.command !== command) {
        throw Id100ProtocolError.tagMismatch(command, frame.command);
      }
      if (frame.payload.length !== responseLength) {
        throw Id100ProtocolError.lengthMismatch(command, responseLength, frame.payload.length);
      }
      return frame.payload;
    } finally {
      this.busy = false;
    }
  }

  /**
   * Run one catalog entry: encode, transact, then decode and check echoes
   */
  async execute<Req, Res>(op: Operation<Req, Res>, request: Req): Promise<Res> {
    const payload = op.encode(request);
    if (payload.length !== op.requestSize) {
      throw new RangeError(`${op.name}: request is ${payload.length} bytes, expected ${op.requestSize}`);
    }
    const response = await this.transact(op.command, payload, op.responseSize);
    return op.decode(response, request);
  }
}
