/**
 * IPC Client
 *
 * Connects to the daemon socket and exchanges newline-delimited JSON frames.
 * Responses are matched to requests in order.
 */

import * as net from 'net';
import {
  DaemonError,
  ProtocolError,
  TimedOutError,
  UnavailableError,
  toError,
} from '../../lib/errors/DaemonErrors.js';
import { Result, ok, err } from '../../lib/result-types.js';
import { IpcResponseSchema, type IpcResponse, type OutgoingRequest } from '../../models/ipc-message.js';
import { FrameDecoder, encodeFrame } from './frame-codec.js';
import { CLIENT_CONNECT_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS } from '../../constants/daemon-constants.js';

export interface IpcClientOptions {
  connectTimeoutMs?: number;
  requestTimeoutMs?: number;
}

interface Waiter {
  resolve: (result: Result<IpcResponse, DaemonError>) => void;
  timer: NodeJS.Timeout;
}

export class IpcClient {
  private socketPath: string;
  private connectTimeoutMs: number;
  private requestTimeoutMs: number;
  private socket: net.Socket | null = null;
  private decoder = new FrameDecoder();
  private waiters: Waiter[] = [];

  constructor(socketPath: string, options: IpcClientOptions = {}) {
    this.socketPath = socketPath;
    this.connectTimeoutMs = options.connectTimeoutMs ?? CLIENT_CONNECT_TIMEOUT_MS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /**
   * Open the connection; fails with UNAVAILABLE when no daemon answers
   */
  connect(): Promise<Result<void, DaemonError>> {
    if (this.socket) {
      return Promise.resolve(ok(undefined));
    }

    return new Promise((resolve) => {
      const socket = net.createConnection(this.socketPath);
      const timer = setTimeout(() => {
        socket.destroy();
        resolve(err(new TimedOutError('connect', this.connectTimeoutMs)));
      }, this.connectTimeoutMs);

      socket.once('error', (error) => {
        clearTimeout(timer);
        resolve(err(new UnavailableError(`daemon at ${this.socketPath} (${error.message})`)));
      });

      socket.once('connect', () => {
        clearTimeout(timer);
        this.attach(socket);
        resolve(ok(undefined));
      });
    });
  }

  /**
   * Send one request and wait for its response
   */
  async request(request: OutgoingRequest): Promise<Result<IpcResponse, DaemonError>> {
    const connected = await this.connect();
    if (connected.isErr()) {
      return err(connected.error);
    }
    const socket = this.socket;
    if (!socket) {
      return err(new UnavailableError('daemon connection'));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.failAll(new TimedOutError(request.type, this.requestTimeoutMs));
      }, this.requestTimeoutMs);
      this.waiters.push({ resolve, timer });
      socket.write(encodeFrame(request));
    });
  }

  close(): void {
    this.socket?.end();
    this.socket = null;
  }

  private attach(socket: net.Socket): void {
    this.socket = socket;
    this.decoder.reset();

    socket.on('data', (chunk: Buffer) => {
      const frames = this.decoder.push(chunk);
      if (frames.isErr()) {
        this.failAll(frames.error);
        return;
      }
      for (const frame of frames.value) {
        this.settle(frame);
      }
    });

    socket.on('error', (error) => {
      this.failAll(new UnavailableError(`daemon connection (${error.message})`));
    });

    socket.on('close', () => {
      this.socket = null;
      this.failAll(new UnavailableError('daemon connection (closed)'));
    });
  }

  private settle(frame: string): void {
    const waiter = this.waiters.shift();
    if (!waiter) {
      return;
    }
    clearTimeout(waiter.timer);
    waiter.resolve(parseResponse(frame));
  }

  private failAll(error: DaemonError): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(err(error));
    }
    if (error instanceof TimedOutError) {
      this.socket?.destroy();
      this.socket = null;
    }
  }
}

export function parseResponse(frame: string): Result<IpcResponse, ProtocolError> {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch (error) {
    return err(new ProtocolError(`Malformed response: ${toError(error).message}`));
  }
  const parsed = IpcResponseSchema.safeParse(raw);
  if (!parsed.success) {
    return err(new ProtocolError('Response is missing a valid status'));
  }
  return ok(parsed.data);
}

/**
 * One-shot request over a fresh connection
 */
export async function sendRequest(
  socketPath: string,
  request: OutgoingRequest,
  options: IpcClientOptions = {}
): Promise<Result<IpcResponse, DaemonError>> {
  const client = new IpcClient(socketPath, options);
  try {
    return await client.request(request);
  } finally {
    client.close();
  }
}
