/**
 * IPC Server
 *
 * Unix domain socket server speaking newline-delimited JSON. Each connection
 * keeps its own promise queue, so pipelined requests are answered in order
 * while separate connections proceed independently.
 */

import * as net from 'net';
import { chmodSync, existsSync, lstatSync, mkdirSync, rmSync } from 'fs';
import { dirname } from 'path';
import type { Logger } from '../../lib/logger.js';
import { createSilentLogger } from '../../lib/logger.js';
import {
  BindConflictError,
  ConfigurationError,
  ShuttingDownError,
  TimedOutError,
  toError,
} from '../../lib/errors/DaemonErrors.js';
import { errorResponse, type IpcResponse } from '../../models/ipc-message.js';
import { FrameDecoder, encodeFrame } from './frame-codec.js';
import {
  CLIENT_CONNECT_TIMEOUT_MS,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SHUTDOWN_GRACE_MS,
  MAX_FRAME_BYTES,
  RUNTIME_DIR_MODE,
  SOCKET_MODE,
} from '../../constants/daemon-constants.js';

/**
 * Answers one raw frame; must not reject
 */
export interface FrameHandler {
  handleFrame(frame: string): Promise<IpcResponse>;
}

export interface IpcServerOptions {
  socketPath: string;
  handler: FrameHandler;
  /** Read per request so configuration changes apply to new requests */
  requestTimeoutMs?: () => number;
  idleTimeoutMs?: number;
  maxFrameBytes?: number;
  logger?: Logger;
}

interface Connection {
  id: number;
  socket: net.Socket;
  queue: Promise<void>;
  closing: boolean;
}

/**
 * True when something accepts connections on `socketPath`
 */
export function isSocketLive(socketPath: string, timeoutMs: number = CLIENT_CONNECT_TIMEOUT_MS): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection(socketPath);
    const finish = (alive: boolean): void => {
      socket.destroy();
      resolve(alive);
    };
    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once('connect', () => finish(true));
    socket.once('error', () => finish(false));
  });
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export class IpcServer {
  private socketPath: string;
  private handler: FrameHandler;
  private requestTimeoutMs: () => number;
  private idleTimeoutMs: number;
  private maxFrameBytes: number;
  private logger: Logger;

  private server: net.Server | null = null;
  private draining = false;
  private connections = new Map<number, Connection>();
  private nextConnectionId = 1;

  constructor(options: IpcServerOptions) {
    this.socketPath = options.socketPath;
    this.handler = options.handler;
    this.requestTimeoutMs = options.requestTimeoutMs ?? (() => DEFAULT_REQUEST_TIMEOUT_MS);
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.maxFrameBytes = options.maxFrameBytes ?? MAX_FRAME_BYTES;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Bind the socket and start accepting connections
   *
   * @throws BindConflictError when another daemon answers on the socket
   */
  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const runtimeDir = dirname(this.socketPath);
    mkdirSync(runtimeDir, { recursive: true, mode: RUNTIME_DIR_MODE });
    chmodSync(runtimeDir, RUNTIME_DIR_MODE);

    await this.clearStaleSocket();

    const server = net.createServer((socket) => this.accept(socket));
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(errorCode(error) === 'EADDRINUSE' ? new BindConflictError(this.socketPath) : error);
      };
      server.once('error', onError);
      server.listen(this.socketPath, () => {
        server.off('error', onError);
        resolve();
      });
    });

    chmodSync(this.socketPath, SOCKET_MODE);
    server.on('error', (error) => {
      this.logger.error('IPC server error', { error: error.message });
    });
    this.server = server;
    this.logger.info('IPC server listening', { socketPath: this.socketPath });
  }

  /**
   * Stop accepting, give in-flight requests up to `graceMs` to finish, then
   * close every connection and remove the socket file
   */
  async stop(graceMs: number = DEFAULT_SHUTDOWN_GRACE_MS): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    this.draining = true;
    const closed = new Promise<void>((resolve) => server.close(() => resolve()));

    let graceTimer: NodeJS.Timeout | undefined;
    const grace = new Promise<void>((resolve) => {
      graceTimer = setTimeout(resolve, graceMs);
    });
    await Promise.race([this.drainConnections(), grace]);
    clearTimeout(graceTimer);

    for (const connection of this.connections.values()) {
      connection.closing = true;
      connection.socket.destroy();
    }
    this.connections.clear();

    await closed;
    this.draining = false;
    rmSync(this.socketPath, { force: true });
    this.logger.info('IPC server stopped');
  }

  isListening(): boolean {
    return this.server !== null;
  }

  getSocketPath(): string {
    return this.socketPath;
  }

  /**
   * Settle every connection queue, including frames queued while waiting
   */
  private async drainConnections(): Promise<void> {
    for (;;) {
      const queued = Array.from(this.connections.values(), (connection) => ({
        connection,
        queue: connection.queue,
      }));
      await Promise.all(queued.map(({ queue }) => queue));
      if (queued.every(({ connection, queue }) => connection.queue === queue)) {
        return;
      }
    }
  }

  /**
   * Remove a leftover socket file; a live one means another daemon
   */
  private async clearStaleSocket(): Promise<void> {
    if (!existsSync(this.socketPath)) {
      return;
    }
    if (!lstatSync(this.socketPath).isSocket()) {
      throw new ConfigurationError('socketPath', this.socketPath, 'exists and is not a socket');
    }
    if (await isSocketLive(this.socketPath)) {
      throw new BindConflictError(this.socketPath);
    }
    this.logger.warn('Removing stale socket', { socketPath: this.socketPath });
    rmSync(this.socketPath, { force: true });
  }

  private accept(socket: net.Socket): void {
    const connection: Connection = {
      id: this.nextConnectionId++,
      socket,
      queue: Promise.resolve(),
      closing: false,
    };
    this.connections.set(connection.id, connection);
    const decoder = new FrameDecoder(this.maxFrameBytes);

    socket.setTimeout(this.idleTimeoutMs, () => {
      this.logger.debug('Closing idle connection', { connection: connection.id });
      connection.closing = true;
      socket.destroy();
    });

    socket.on('data', (chunk: Buffer) => {
      if (connection.closing) return;

      const frames = decoder.push(chunk);
      if (frames.isErr()) {
        this.logger.warn('Dropping connection', { connection: connection.id, error: frames.error.message });
        connection.closing = true;
        this.write(socket, errorResponse(frames.error));
        socket.end();
        return;
      }

      for (const frame of frames.value) {
        connection.queue = connection.queue.then(() =>
          this.draining ? this.refuse(connection) : this.process(connection, frame)
        );
      }
    });

    socket.on('error', (error) => {
      this.logger.debug('Connection error', { connection: connection.id, error: error.message });
    });

    socket.on('close', () => {
      connection.closing = true;
      this.connections.delete(connection.id);
    });
  }

  /**
   * Answer one frame, or time it out and close the connection
   */
  private async process(connection: Connection, frame: string): Promise<void> {
    if (connection.closing) {
      return;
    }

    const timeoutMs = this.requestTimeoutMs();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeoutMs);
    });

    try {
      const response = await Promise.race([this.handler.handleFrame(frame), timedOut]);
      if (response === null) {
        this.logger.warn('Request timed out', { connection: connection.id, timeoutMs });
        connection.closing = true;
        this.write(connection.socket, errorResponse(new TimedOutError('request', timeoutMs)));
        connection.socket.end();
        return;
      }
      if (!this.write(connection.socket, response)) {
        await this.waitForDrain(connection.socket);
      }
    } catch (error) {
      this.logger.error('Request handler rejected', { connection: connection.id, error: toError(error).message });
      connection.closing = true;
      connection.socket.destroy();
    } finally {
      clearTimeout(timer);
    }
  }

  private async refuse(connection: Connection): Promise<void> {
    if (connection.closing) {
      return;
    }
    if (!this.write(connection.socket, errorResponse(new ShuttingDownError()))) {
      await this.waitForDrain(connection.socket);
    }
  }

  /**
   * @returns false when the socket buffer is full and the caller should wait
   * for it to drain
   */
  private write(socket: net.Socket, response: IpcResponse): boolean {
    if (socket.destroyed || !socket.writable) {
      return true;
    }
    return socket.write(encodeFrame(response));
  }

  /**
   * Stop reading from a client that does not read its responses until its
   * buffer empties or it goes away
   */
  private waitForDrain(socket: net.Socket): Promise<void> {
    socket.pause();
    return new Promise<void>((resolve) => {
      const done = (): void => {
        socket.off('drain', done);
        socket.off('close', done);
        resolve();
      };
      socket.on('drain', done);
      socket.on('close', done);
    }).then(() => {
      if (!socket.destroyed) {
        socket.resume();
      }
    });
  }
}
