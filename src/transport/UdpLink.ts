import dgram from 'dgram';
import net from 'net';
import { DEFAULT_TIMEOUT_MS, DEFAULT_UDP_PORT } from '../device/Id100Constants';
import { Link, LinkFrame } from '../types';
import { dbgV } from '../utils/debug';
import { Id100NotConnectedError, Id100TimeoutError } from '../utils/errors';

/**
 * The parts of a dgram socket the link uses
 */
export interface DatagramSocket {
  on(event: 'message', listener: (msg: Buffer, rinfo: dgram.RemoteInfo) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  bind(port: number, callback: () => void): unknown;
  send(msg: Buffer, port: number, address: string, callback: (error: Error | null) => void): void;
  close(callback: () => void): unknown;
}

export interface UdpLinkOptions {
  host: string;
  port?: number;
  /** Local port to bind, 0 picks a free one */
  localPort?: number;
  /** How long receive() waits for a datagram */
  timeoutMs?: number;
  createSocket?: () => DatagramSocket;
}

interface PendingReceive {
  resolve: (frame: LinkFrame) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

// Datagram layout: [tag:1][payload]
export function encodeDatagram(command: number, payload: Buffer): Buffer {
  const b = Buffer.alloc(1 + payload.length);
  b.writeUInt8(command, 0);
  payload.copy(b, 1);
  return b;
}

export function decodeDatagram(msg: Buffer): LinkFrame | null {
  if (msg.length === 0) return null;
  return { command: msg[0], payload: Buffer.from(msg.subarray(1)) };
}

/**
 * Link over UDP: one datagram per frame in each direction
 */
export class UdpLink implements Link {
  private socket?: DatagramSocket;
  private frames: LinkFrame[] = [];
  private pending?: PendingReceive;
  private bindReject?: (err: Error) => void;
  private opening?: Promise<void>;

  private readonly host: string;
  private readonly port: number;
  private readonly localPort: number;
  private readonly timeoutMs: number;
  private readonly createSocket: () => DatagramSocket;

  constructor(options: UdpLinkOptions) {
    this.host = options.host;
    this.port = options.port ?? DEFAULT_UDP_PORT;
    this.localPort = options.localPort ?? 0;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.createSocket = options.createSocket ?? (() => dgram.createSocket('udp4'));
  }

  get isOpen(): boolean { return this.socket !== undefined; }

  async connect(): Promise<void> {
    if (this.opening) return this.opening;
    if (this.socket) {
      dbgV(`[UDP] Socket already open, skipping`);
      return;
    }
    this.opening = this.open().finally(() => {
      this.opening = undefined;
    });
    return this.opening;
  }

  private async open(): Promise<void> {
    dbgV(`[UDP] Opening socket for ${this.host}:${this.port}`);
    const sock = this.createSocket();
    this.socket = sock;
    sock.on('message', (msg, rinfo) => this.onMessage(msg, rinfo));
    sock.on('error', (err) => this.onError(err));
    try {
      await new Promise<void>((resolve, reject) => {
        this.bindReject = reject;
        sock.bind(this.localPort, () => resolve());
      });
    } catch (err) {
      this.socket = undefined;
      sock.close(() => undefined);
      throw err;
    } finally {
      this.bindReject = undefined;
    }
  }

  async disconnect(): Promise<void> {
    const sock = this.socket;
    if (!sock) return;
    this.socket = undefined;
    this.frames = [];
    this.failPending(new Id100NotConnectedError('receive'));
    await new Promise<void>((resolve) => sock.close(() => resolve()));
    dbgV('[UDP] Socket closed');
  }

  async send(command: number, payload: Buffer): Promise<void> {
    const sock = this.socket;
    if (!sock) throw new Id100NotConnectedError('send');
    // Anything still buffered belongs to an earlier exchange
    if (this.frames.length > 0) {
      dbgV(`[UDP] Dropping ${this.frames.length} stale frame(s)`);
      this.frames = [];
    }
    const datagram = encodeDatagram(command, payload);
    dbgV(`[UDP] send to ${this.host}:${this.port}, ${datagram.length} bytes`);
    await new Promise<void>((resolve, reject) => {
      sock.send(datagram, this.port, this.host, (err) => (err ? reject(err) : resolve()));
    });
  }

  receive(): Promise<LinkFrame> {
    if (!this.socket) return Promise.reject(new Id100NotConnectedError('receive'));
    const buffered = this.frames.shift();
    if (buffered) return Promise.resolve(buffered);
    if (this.pending) return Promise.reject(new Error('receive() is already waiting for a frame'));

    return new Promise<LinkFrame>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = undefined;
        reject(new Id100TimeoutError(this.timeoutMs));
      }, this.timeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }

  private fromDevice(rinfo: dgram.RemoteInfo): boolean {
    if (rinfo.port !== this.port) return false;
    // A host name cannot be compared with the sender address, only the port is checked then
    return net.isIP(this.host) === 0 || rinfo.address === this.host;
  }

  private onMessage(msg: Buffer, rinfo: dgram.RemoteInfo) {
    if (!this.fromDevice(rinfo)) {
      dbgV(`[UDP] Ignoring datagram from ${rinfo.address}:${rinfo.port}`);
      return;
    }
    const frame = decodeDatagram(msg);
    if (!frame) {
      dbgV('[UDP] Ignoring empty datagram');
      return;
    }
    const pending = this.pending;
    if (pending) {
      clearTimeout(pending.timer);
      this.pending = undefined;
      pending.resolve(frame);
    } else {
      this.frames.push(frame);
    }
  }

  private onError(err: Error) {
    dbgV(`[UDP] socket error: ${err.message}`);
    if (this.bindReject) {
      this.bindReject(err);
      return;
    }
    this.failPending(err);
  }

  private failPending(err: Error) {
    const pending = this.pending;
    if (!pending) return;
    clearTimeout(pending.timer);
    this.pending = undefined;
    pending.reject(err);
  }
}
