import { Relay, useWebSocketImplementation } from "nostr-tools/relay";
import { normalizeURL } from "nostr-tools/utils";
import type { RelayFactory } from "../../relay/relayFactory";

/** In-process stand-in for the websocket nostr-tools opens to a relay. */
export class FakeSocket {
  static readonly CONNECTING = 0;
  static readonly OPEN = 1;
  static readonly CLOSING = 2;
  static readonly CLOSED = 3;

  readonly sent: string[] = [];
  readyState = FakeSocket.CONNECTING;
  closed = false;

  onopen: (() => void) | null = null;
  onerror: (() => void) | null = null;
  onclose: ((event: { code: number; message?: string }) => void) | null = null;
  onmessage: ((event: { data: string }) => void) | null = null;

  constructor(readonly url: string) {}

  send(data: string): void {
    // ws drops frames sent after close instead of throwing
    if (this.readyState !== FakeSocket.OPEN) return;
    this.sent.push(data);
  }

  close(): void {
    this.readyState = FakeSocket.CLOSED;
    this.closed = true;
  }

  /** Simulate the handshake completing. */
  open(): void {
    this.readyState = FakeSocket.OPEN;
    this.onopen?.();
  }

  /** Deliver a frame from the relay. */
  receive(frame: unknown[]): void {
    this.receiveRaw(JSON.stringify(frame));
  }

  receiveRaw(data: string): void {
    this.onmessage?.({ data });
  }

  /** Simulate the relay dropping the connection. */
  drop(code = 1006): void {
    this.readyState = FakeSocket.CLOSED;
    this.onclose?.({ code });
  }

  /** Simulate the handshake failing. */
  fail(): void {
    this.onerror?.();
  }

  get frames(): unknown[] {
    return this.sent.map((data): unknown => JSON.parse(data));
  }
}

/**
 * Let nostr-tools run the sends it chains onto its connection promise.
 * REQ, CLOSE and EVENT frames go out a few microtasks after the call.
 */
export async function flushRelayTasks(): Promise<void> {
  for (let i = 0; i < 30; i++) await Promise.resolve();
}

/**
 * Records every socket the relays open. With `autoOpen` a socket reports
 * open one microtask after it is created, once nostr-tools has attached
 * its handlers.
 */
export class FakeRelayNetwork {
  readonly sockets: FakeSocket[] = [];
  private readonly socketClass: typeof FakeSocket;

  constructor(private readonly autoOpen = true) {
    const network = this;
    this.socketClass = class extends FakeSocket {
      constructor(url: string) {
        super(url);
        network.register(this);
      }
    };
  }

  readonly factory: RelayFactory = (url) => {
    useWebSocketImplementation(this.socketClass);
    return new Relay(url);
  };

  /** Most recent socket opened to `url`. */
  latest(url: string): FakeSocket {
    const target = normalizeURL(url);
    for (let i = this.sockets.length - 1; i >= 0; i--) {
      const socket = this.sockets[i];
      if (socket && socket.url === target) return socket;
    }
    throw new Error(`no socket was opened to ${url}`);
  }

  socketsFor(url: string): FakeSocket[] {
    const target = normalizeURL(url);
    return this.sockets.filter((socket) => socket.url === target);
  }

  /** Frames of a given type sent on the latest socket to `url`. */
  framesOfType(url: string, type: string): unknown[][] {
    const result: unknown[][] = [];
    for (const frame of this.latest(url).frames) {
      if (Array.isArray(frame) && frame[0] === type) result.push(frame);
    }
    return result;
  }

  private register(socket: FakeSocket): void {
    this.sockets.push(socket);
    if (!this.autoOpen) return;
    void Promise.resolve().then(() => {
      if (socket.readyState === FakeSocket.CONNECTING) socket.open();
    });
  }
}
