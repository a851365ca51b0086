/**
 * Relay Chat Client
 *
 * Persistent WebSocket connection to the local chat relay with linear
 * backoff reconnects. Inbound `chat_message` frames go to the chat
 * handler; connection changes go to the connection handler.
 *
 * Handlers run inside the socket's event callbacks. A handler that blocks
 * delays every later frame and close detection, so keep them short.
 */

import WebSocket from 'ws';
import { BridgeError, toErrorMessage } from '../utils/errors.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'closing';

export type ReconnectPolicy = {
  /** Retries after the first attempt; at least 1 */
  maxAttempts: number;
  /** Delay unit; attempt n waits baseDelayMs * n */
  baseDelayMs: number;
};

export type ChatHandler = (sender: string, message: string) => void;
export type ConnectionHandler = (connected: boolean) => void;

/** The subset of a `ws` WebSocket the client relies on */
export interface RelaySocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(): void;
  on(event: 'open', listener: () => void): this;
  on(event: 'message', listener: (data: WebSocket.RawData) => void): this;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  removeAllListeners(): this;
}

export type SocketFactory = (url: string) => RelaySocket;

export type OutboundChatMessage = {
  type: 'chat_message';
  message: string;
  target?: string;
};

export type RelayChatClientOptions = {
  url: string;
  policy: ReconnectPolicy;
  /** How long connect() waits before reporting whether the socket opened */
  connectGraceMs?: number;
  socketFactory?: SocketFactory;
  log?: (msg: string) => void;
};

const OPEN = 1;

export function decodeFrame(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class RelayChatClient {
  private readonly url: string;
  private readonly policy: ReconnectPolicy;
  private readonly connectGraceMs: number;
  private readonly socketFactory: SocketFactory;
  private readonly log: (msg: string) => void;

  private state: ConnectionState = 'disconnected';
  private socket: RelaySocket | null = null;
  /** Whether the current socket ever reached 'open' */
  private socketOpened = false;
  private shouldRun = false;
  private autoReconnect = true;
  private attempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;

  private chatHandler: ChatHandler | null = null;
  private connectionHandler: ConnectionHandler | null = null;

  constructor(options: RelayChatClientOptions) {
    if (!Number.isInteger(options.policy.maxAttempts) || options.policy.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1, got ${options.policy.maxAttempts}`);
    }
    this.url = options.url;
    this.policy = options.policy;
    this.connectGraceMs = options.connectGraceMs ?? 1000;
    this.socketFactory = options.socketFactory ?? ((url) => new WebSocket(url));
    this.log = options.log ?? ((msg) => console.log(msg));
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  /**
   * Start connecting. Resolves after the grace window with whether the
   * connection is open; a failed first attempt keeps retrying in the
   * background when auto-reconnect is on.
   */
  async connect(autoReconnect = true): Promise<boolean> {
    this.autoReconnect = autoReconnect;
    this.attempts = 0;

    if (this.shouldRun && this.state !== 'disconnected' && this.state !== 'closing') {
      return this.isConnected();
    }

    this.shouldRun = true;
    this.openSocket();

    if (this.connectGraceMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.connectGraceMs));
    }
    return this.isConnected();
  }

  disconnect(): void {
    this.shouldRun = false;
    this.clearReconnectTimer();

    const socket = this.socket;
    if (!socket) {
      this.state = 'disconnected';
      return;
    }

    this.state = 'closing';
    socket.close();
  }

  /**
   * Send a chat message. Rejects with NotConnected unless the connection
   * is open; nothing is queued.
   */
  send(message: string, target?: string): Promise<void> {
    const socket = this.socket;
    if (this.state !== 'connected' || !socket || socket.readyState !== OPEN) {
      return Promise.reject(new BridgeError('NotConnected', 'Not connected to chat server'));
    }

    const payload: OutboundChatMessage = { type: 'chat_message', message };
    if (target) {
      payload.target = target;
    }

    return new Promise<void>((resolve, reject) => {
      socket.send(JSON.stringify(payload), (err) => {
        if (err) {
          reject(new BridgeError('NotConnected', `Send failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  onChatMessage(handler: ChatHandler | null): void {
    this.chatHandler = handler;
  }

  /**
   * Register the connection handler. Fires `true` immediately when the
   * client is already connected.
   */
  onConnectionChange(handler: ConnectionHandler | null): void {
    this.connectionHandler = handler;
    if (handler && this.isConnected()) {
      handler(true);
    }
  }

  private openSocket(): void {
    this.releaseSocket();
    this.state = 'connecting';

    let socket: RelaySocket;
    try {
      socket = this.socketFactory(this.url);
    } catch (err) {
      this.log(`[Relay] Failed to create socket: ${toErrorMessage(err)}`);
      this.socket = null;
      this.state = 'disconnected';
      if (this.shouldRun && this.autoReconnect) {
        this.scheduleReconnect();
      } else {
        this.shouldRun = false;
      }
      return;
    }

    this.socket = socket;
    socket.on('open', () => this.handleOpen(socket));
    socket.on('message', (data) => this.handleMessage(socket, data));
    socket.on('error', (err) => this.log(`[Relay] WebSocket error: ${err.message}`));
    socket.on('close', (code, reason) => this.handleClose(socket, code, reason));
  }

  private handleOpen(socket: RelaySocket): void {
    if (socket !== this.socket) return;

    if (!this.shouldRun) {
      socket.close();
      return;
    }

    this.state = 'connected';
    this.socketOpened = true;
    this.attempts = 0;
    this.log('[Relay] Connection established');
    this.notifyConnection(true);
  }

  private handleMessage(socket: RelaySocket, data: WebSocket.RawData): void {
    if (socket !== this.socket) return;

    let frame: unknown;
    try {
      frame = JSON.parse(decodeFrame(data));
    } catch (err) {
      this.log(`[Relay] Error processing message: ${toErrorMessage(err)}`);
      return;
    }

    if (!frame || typeof frame !== 'object' || !('type' in frame)) {
      this.log('[Relay] Dropping frame without a type');
      return;
    }

    if (frame.type === 'chat_message' && 'message' in frame && typeof frame.message === 'string') {
      const sender = 'sender' in frame && typeof frame.sender === 'string' ? frame.sender : '';
      if (this.chatHandler) {
        try {
          this.chatHandler(sender, frame.message);
        } catch (err) {
          this.log(`[Relay] Chat handler failed: ${toErrorMessage(err)}`);
        }
      }
      return;
    }

    if (frame.type === 'info' && 'message' in frame && typeof frame.message === 'string') {
      this.log(`[Relay] ${frame.message}`);
      return;
    }

    this.log(`[Relay] Dropping unrecognized frame type: ${String(frame.type)}`);
  }

  private handleClose(socket: RelaySocket, code: number, reason: Buffer): void {
    if (socket !== this.socket) return;

    const wasConnected = this.socketOpened;
    this.socket = null;
    this.socketOpened = false;
    this.state = 'disconnected';

    if (wasConnected) {
      this.notifyConnection(false);
    }

    this.log(`[Relay] Connection closed: ${code} - ${reason.toString('utf8')}`);

    if (this.shouldRun && this.autoReconnect) {
      this.scheduleReconnect();
    } else {
      this.shouldRun = false;
    }
  }

  private scheduleReconnect(): void {
    if (!this.shouldRun) return;

    if (this.attempts >= this.policy.maxAttempts) {
      this.log(`[Relay] Failed to connect after ${this.attempts} attempts, giving up`);
      this.shouldRun = false;
      this.state = 'disconnected';
      return;
    }

    this.attempts += 1;
    const delayMs = this.policy.baseDelayMs * this.attempts;
    this.state = 'connecting';
    this.log(`[Relay] Reconnecting in ${delayMs}ms (attempt ${this.attempts})`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.shouldRun) {
        this.state = 'disconnected';
        return;
      }
      this.openSocket();
    }, delayMs);
  }

  /** Detach a socket that is still closing when a new run starts */
  private releaseSocket(): void {
    const previous = this.socket;
    if (!previous) return;

    const wasConnected = this.socketOpened;
    previous.removeAllListeners();
    previous.on('error', (err) => this.log(`[Relay] Error on replaced socket: ${err.message}`));
    this.socket = null;
    this.socketOpened = false;
    if (wasConnected) {
      this.notifyConnection(false);
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private notifyConnection(connected: boolean): void {
    if (!this.connectionHandler) return;
    try {
      this.connectionHandler(connected);
    } catch (err) {
      this.log(`[Relay] Connection handler failed: ${toErrorMessage(err)}`);
    }
  }
}
