import { nip04, nip44, type EventTemplate, type NostrEvent } from "nostr-tools";
import { finalizeEvent, generateSecretKey, getPublicKey } from "nostr-tools/pure";
import { bytesToHex, hexToBytes, randomBytes } from "@noble/hashes/utils";
import { isHexKey } from "applesauce-core/helpers";
import {
  BehaviorSubject,
  Subject,
  type Observable,
  type Subscription as RxSubscription,
} from "rxjs";
import { z } from "zod";
import { EventKind, NIP46_ACK } from "../constants/nostr";
import type { ConnectionPool } from "../relay/ConnectionPool";
import type { EventValidator } from "../validation/EventValidator";
import { Logger } from "../utils/Logger";
import { errorMessage, nowSeconds } from "../utils/utils";
import {
  createNostrConnectUri,
  parseBunkerUri,
  parseNostrConnectUri,
} from "./bunkerUri";
import {
  AuthenticationError,
  InvalidResponseError,
  InvalidUriError,
  NotConnectedError,
  RemoteSignerRemoteError,
  TimeoutError,
} from "./errors";
import type { EventSigner } from "./LocalSigner";
import { PendingRequestTable, type RpcResponse } from "./PendingRequestTable";

export type RemoteSignerState =
  | { status: "disconnected" }
  | { status: "connecting" }
  | { status: "waitingForScan"; uri: string }
  | { status: "waitingForApproval"; remotePubkey: string }
  | { status: "connected"; userPubkey: string }
  | { status: "error"; reason: string };

export interface BunkerSession {
  /** Null until the signer answers a nostrconnect:// invitation */
  remotePubkey: string | null;
  relays: string[];
  /** Hex-encoded client key, stored so a session can be restored */
  clientSecretKey: string;
  /** Handshake secret, cleared once the signer has proven it */
  secret: string | null;
  userPubkey: string | null;
}

/** The slice of the pool the signer talks through. */
export type SignerTransport = Pick<
  ConnectionPool,
  "connect" | "addRelay" | "removeRelay" | "subscribe" | "unsubscribe" | "publish"
>;

export interface RemoteSignerClientOptions {
  rpcTimeoutMs?: number;
  handshakeTimeoutMs?: number;
  clientSecretKey?: Uint8Array | string;
  logger?: Logger;
}

export interface RequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ConnectOptions {
  /** Restore a previously used client key instead of the current one */
  clientSecretKey?: Uint8Array | string;
}

export interface NostrConnectInvite {
  relay: string | string[];
  secret?: string;
  name?: string;
  url?: string;
}

export interface WaitForSignerOptions {
  timeoutMs?: number;
}

const RpcResponseSchema = z.object({
  id: z.string(),
  result: z.string().nullish(),
  error: z.string().nullish(),
});

const AUTH_URL_RESULT = "auth_url";

interface HandshakeWaiter {
  resolve: (remotePubkey: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

function toSecretKey(key: Uint8Array | string): Uint8Array {
  return typeof key === "string" ? hexToBytes(key) : key;
}

function randomToken(): string {
  return bytesToHex(randomBytes(16));
}

/**
 * NIP-46 client. Talks to a remote signer over kind 24133 envelopes
 * encrypted with NIP-44, either by dialing a bunker:// URI or by
 * waiting for a signer to answer a nostrconnect:// invitation.
 */
export class RemoteSignerClient implements EventSigner {
  private readonly pending = new PendingRequestTable();
  private readonly stateSubject = new BehaviorSubject<RemoteSignerState>({
    status: "disconnected",
  });
  private readonly authUrlSubject = new Subject<string>();
  private readonly conversationKeys = new Map<string, Uint8Array>();
  /** Relays the current session added to the pool; removed on teardown */
  private sessionRelays: string[] = [];
  private readonly rpcTimeoutMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly logger: Logger;

  private clientSecretKey: Uint8Array;
  private clientPubkey: string;
  private session: BunkerSession | null = null;
  private subscriptionId: string | null = null;
  private messageSubscription: RxSubscription | null = null;
  private handshake: HandshakeWaiter | null = null;

  constructor(
    private readonly pool: SignerTransport,
    private readonly messages$: Observable<NostrEvent>,
    private readonly validator: EventValidator,
    options: RemoteSignerClientOptions = {},
  ) {
    this.rpcTimeoutMs = options.rpcTimeoutMs ?? 30_000;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 180_000;
    this.logger = options.logger ?? new Logger({ service: "signer" });
    this.clientSecretKey = toSecretKey(
      options.clientSecretKey ?? generateSecretKey(),
    );
    this.clientPubkey = getPublicKey(this.clientSecretKey);
  }

  get state$(): Observable<RemoteSignerState> {
    return this.stateSubject.asObservable();
  }

  get state(): RemoteSignerState {
    return this.stateSubject.value;
  }

  /** URLs a signer asks the user to open before it answers a request. */
  get authUrl$(): Observable<string> {
    return this.authUrlSubject.asObservable();
  }

  get isConnected(): boolean {
    return this.state.status === "connected";
  }

  get pendingRequestCount(): number {
    return this.pending.size;
  }

  /** Peers with a derived NIP-44 conversation key in memory. */
  get conversationKeyCount(): number {
    return this.conversationKeys.size;
  }

  getClientPubkey(): string {
    return this.clientPubkey;
  }

  getSession(): BunkerSession | null {
    return this.session ? { ...this.session, relays: [...this.session.relays] } : null;
  }

  /**
   * Direct flow: dial the signer named by a bunker:// URI.
   * @returns the user's pubkey
   */
  async connect(bunkerUri: string, options: ConnectOptions = {}): Promise<string> {
    const parsed = parseBunkerUri(bunkerUri);
    if (this.session) this.disconnect();
    if (options.clientSecretKey) this.setClientKey(options.clientSecretKey);

    const session = this.beginSession(parsed.remotePubkey, parsed.relays, parsed.secret);
    this.setState({ status: "waitingForApproval", remotePubkey: parsed.remotePubkey });
    this.logger.info(`🔐 Requesting approval from signer ${parsed.remotePubkey.slice(0, 8)}`);

    try {
      const result = await this.sendRequest(
        "connect",
        [parsed.remotePubkey, parsed.secret ?? ""],
        { timeoutMs: this.handshakeTimeoutMs },
      );
      if (!this.acceptsHandshake(result, parsed.secret)) {
        throw new AuthenticationError(
          "Remote signer answered connect with an unexpected secret",
        );
      }
      session.secret = null;
      return await this.completeHandshake(session);
    } catch (error) {
      throw this.failSession(session, error);
    }
  }

  /** Reverse flow: build the invitation a signer app scans. */
  createNostrConnectUri(invite: NostrConnectInvite): string {
    return createNostrConnectUri({
      clientPubkey: this.clientPubkey,
      relay: invite.relay,
      secret: invite.secret ?? randomToken(),
      name: invite.name,
      url: invite.url,
    });
  }

  /**
   * Reverse flow: wait for a signer to answer an invitation created by
   * createNostrConnectUri.
   * @returns the user's pubkey
   */
  async waitForSignerConnection(
    uri: string,
    options: WaitForSignerOptions = {},
  ): Promise<string> {
    const parsed = parseNostrConnectUri(uri);
    if (parsed.clientPubkey !== this.clientPubkey) {
      throw new InvalidUriError("Invitation was not created for this client key");
    }
    if (this.session) this.disconnect();

    const session = this.beginSession(null, parsed.relays, parsed.secret);
    const timeoutMs = options.timeoutMs ?? this.handshakeTimeoutMs;

    try {
      const remotePubkey = await new Promise<string>((resolve, reject) => {
        const timer = setTimeout(() => {
          this.handshake = null;
          reject(new TimeoutError("nostrconnect", timeoutMs));
        }, timeoutMs);
        this.handshake = { resolve, reject, timer };
        this.setState({ status: "waitingForScan", uri });
      });
      session.remotePubkey = remotePubkey;
      session.secret = null;
      return await this.completeHandshake(session);
    } catch (error) {
      throw this.failSession(session, error);
    }
  }

  /**
   * Send one RPC to the remote signer. Exactly one of the response, the
   * timeout or the abort signal settles the returned promise.
   */
  async sendRequest(
    method: string,
    params: string[],
    options: RequestOptions = {},
  ): Promise<string> {
    const remotePubkey = this.session?.remotePubkey;
    if (!remotePubkey || this.subscriptionId === null) {
      throw new NotConnectedError();
    }

    const id = randomToken();
    const content = nip44.encrypt(
      JSON.stringify({ id, method, params }),
      this.conversationKey(remotePubkey),
    );
    const event = finalizeEvent(
      {
        kind: EventKind.NostrConnect,
        created_at: nowSeconds(),
        tags: [["p", remotePubkey]],
        content,
      },
      this.clientSecretKey,
    );

    const response = this.pending.add(
      id,
      method,
      options.timeoutMs ?? this.rpcTimeoutMs,
      options.signal,
    );

    this.pool
      .publish(event)
      .then((acks) => {
        if (acks.length > 0 && acks.every((ack) => !ack.accepted)) {
          this.logger.warn(`⚠️ Every relay rejected the ${method} request`);
        }
      })
      .catch((error: unknown) => {
        this.logger.error(`Failed to publish ${method} request`, error);
      });

    this.logger.debug(`➡️ ${method} (${id.slice(0, 8)})`);
    return response;
  }

  async getPublicKey(): Promise<string> {
    return this.requireUser();
  }

  /** Ask the signer for the user's pubkey again instead of using the cached one. */
  async fetchPublicKey(options?: RequestOptions): Promise<string> {
    this.requireUser();
    return this.sendRequest("get_public_key", [], options);
  }

  /**
   * Have the remote signer sign a template as the user. The returned event
   * is verified and must be authored by the user.
   */
  async signEvent(template: EventTemplate, options?: RequestOptions): Promise<NostrEvent> {
    const userPubkey = this.requireUser();
    const result = await this.sendRequest(
      "sign_event",
      [JSON.stringify({ ...template, pubkey: userPubkey })],
      options,
    );

    let signed: unknown;
    try {
      signed = JSON.parse(result);
    } catch (error) {
      throw new InvalidResponseError(
        `sign_event returned invalid JSON: ${errorMessage(error)}`,
      );
    }

    const outcome = this.validator.validate(signed);
    if (!outcome.valid) {
      throw new InvalidResponseError(`sign_event returned an invalid event: ${outcome.message}`);
    }
    if (outcome.event.pubkey !== userPubkey) {
      throw new InvalidResponseError("sign_event returned an event from another author");
    }
    if (outcome.event.kind !== template.kind) {
      throw new InvalidResponseError("sign_event returned an event of another kind");
    }
    return outcome.event;
  }

  async ping(options?: RequestOptions): Promise<void> {
    this.requireUser();
    const result = await this.sendRequest("ping", [], options);
    if (result !== "pong") {
      throw new InvalidResponseError(`ping answered "${result}" instead of "pong"`);
    }
  }

  async nip04Encrypt(pubkey: string, plaintext: string, options?: RequestOptions): Promise<string> {
    this.requireUser();
    return this.sendRequest("nip04_encrypt", [pubkey, plaintext], options);
  }

  async nip04Decrypt(pubkey: string, ciphertext: string, options?: RequestOptions): Promise<string> {
    this.requireUser();
    return this.sendRequest("nip04_decrypt", [pubkey, ciphertext], options);
  }

  async nip44Encrypt(pubkey: string, plaintext: string, options?: RequestOptions): Promise<string> {
    this.requireUser();
    return this.sendRequest("nip44_encrypt", [pubkey, plaintext], options);
  }

  async nip44Decrypt(pubkey: string, ciphertext: string, options?: RequestOptions): Promise<string> {
    this.requireUser();
    return this.sendRequest("nip44_decrypt", [pubkey, ciphertext], options);
  }

  /**
   * Drop the session. Every waiter, the handshake included, rejects with
   * NotConnectedError.
   */
  disconnect(): void {
    const hadSession = this.session !== null;
    this.teardown(new NotConnectedError("Remote signer disconnected"));
    this.session = null;
    this.setState({ status: "disconnected" });
    if (hadSession) this.logger.info("🔌 Remote signer session closed");
  }

  private beginSession(
    remotePubkey: string | null,
    relays: string[],
    secret: string | null,
  ): BunkerSession {
    const session: BunkerSession = {
      remotePubkey,
      relays,
      clientSecretKey: bytesToHex(this.clientSecretKey),
      secret,
      userPubkey: null,
    };
    this.session = session;
    this.setState({ status: "connecting" });

    this.pool.connect();
    for (const relay of relays) {
      if (this.pool.addRelay(relay)) this.sessionRelays.push(relay);
    }

    this.messageSubscription = this.messages$.subscribe((event) =>
      this.handleMessage(event),
    );
    this.subscriptionId = this.pool.subscribe(
      {
        kinds: [EventKind.NostrConnect],
        "#p": [this.clientPubkey],
        since: nowSeconds(),
      },
      "signer",
    );
    return session;
  }

  private async completeHandshake(session: BunkerSession): Promise<string> {
    const userPubkey = (await this.sendRequest("get_public_key", [])).toLowerCase();
    if (!isHexKey(userPubkey)) {
      throw new InvalidResponseError("get_public_key returned a malformed pubkey");
    }
    if (this.session !== session) throw new NotConnectedError();

    session.userPubkey = userPubkey;
    this.setState({ status: "connected", userPubkey });
    this.logger.info(`✅ Remote signer connected for ${userPubkey.slice(0, 8)}`);
    return userPubkey;
  }

  private acceptsHandshake(result: string, secret: string | null): boolean {
    if (result === NIP46_ACK) return true;
    if (secret !== null) return result === secret;
    return result.length > 0;
  }

  private failSession(session: BunkerSession, error: unknown): Error {
    const failure = error instanceof Error ? error : new Error(errorMessage(error));
    // A newer session or an explicit disconnect already owns the state
    if (this.session !== session) return failure;

    this.teardown(new NotConnectedError("Remote signer handshake failed"));
    this.session = null;
    this.setState({ status: "error", reason: failure.message });
    this.logger.warn(`❌ Remote signer handshake failed: ${failure.message}`);
    return failure;
  }

  private teardown(error: Error): void {
    if (this.subscriptionId !== null) {
      this.pool.unsubscribe(this.subscriptionId);
      this.subscriptionId = null;
    }
    this.messageSubscription?.unsubscribe();
    this.messageSubscription = null;
    for (const relay of this.sessionRelays) this.pool.removeRelay(relay);
    this.sessionRelays = [];
    this.conversationKeys.clear();

    const handshake = this.handshake;
    this.handshake = null;
    if (handshake) {
      clearTimeout(handshake.timer);
      handshake.reject(error);
    }

    const rejected = this.pending.rejectAll(error);
    if (rejected > 0) this.logger.debug(`Rejected ${rejected} pending requests`);
  }

  private handleMessage(event: NostrEvent): void {
    const session = this.session;
    if (!session || event.kind !== EventKind.NostrConnect) return;
    if (!event.tags.some((tag) => tag[0] === "p" && tag[1] === this.clientPubkey)) {
      return;
    }
    if (session.remotePubkey !== null && event.pubkey !== session.remotePubkey) {
      this.logger.debug(`Ignoring signer message from ${event.pubkey.slice(0, 8)}`);
      return;
    }

    this.processMessage(event, session).catch((error: unknown) => {
      this.logger.warn(`Dropping unreadable signer message ${event.id}`, error);
    });
  }

  private async processMessage(event: NostrEvent, session: BunkerSession): Promise<void> {
    const plaintext = await this.decrypt(event.pubkey, event.content);
    const response = this.parseResponse(plaintext);
    if (!response || this.session !== session) return;

    if (session.remotePubkey === null) {
      this.answerInvitation(event.pubkey, response);
      return;
    }

    if (response.result === AUTH_URL_RESULT && response.error) {
      this.logger.warn(`🔗 Signer requests authorization at ${response.error}`);
      this.authUrlSubject.next(response.error);
      return;
    }

    if (!this.pending.resolve(response)) {
      this.logger.debug(`No pending request for response ${response.id.slice(0, 8)}`);
    }
  }

  private answerInvitation(remotePubkey: string, response: RpcResponse): void {
    const handshake = this.handshake;
    const session = this.session;
    if (!handshake || !session) return;
    this.handshake = null;
    clearTimeout(handshake.timer);

    this.setState({ status: "waitingForApproval", remotePubkey });

    if (response.error) {
      handshake.reject(new RemoteSignerRemoteError("connect", response.error));
      return;
    }
    if (!response.result || !this.acceptsHandshake(response.result, session.secret)) {
      handshake.reject(
        new AuthenticationError("Signer answered the invitation with the wrong secret"),
      );
      return;
    }
    handshake.resolve(remotePubkey);
  }

  private parseResponse(plaintext: string): RpcResponse | null {
    let json: unknown;
    try {
      json = JSON.parse(plaintext);
    } catch (error) {
      this.logger.warn(`Signer sent non-JSON content: ${errorMessage(error)}`);
      return null;
    }

    const parsed = RpcResponseSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(
        `Signer sent a malformed response: ${parsed.error.errors
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join(", ")}`,
      );
      return null;
    }
    return {
      id: parsed.data.id,
      result: parsed.data.result ?? undefined,
      error: parsed.data.error ?? undefined,
    };
  }

  private async decrypt(senderPubkey: string, content: string): Promise<string> {
    try {
      return nip44.decrypt(content, this.conversationKey(senderPubkey));
    } catch (error) {
      this.logger.debug(`NIP-44 decrypt failed, trying NIP-04: ${errorMessage(error)}`);
      return await nip04.decrypt(this.clientSecretKey, senderPubkey, content);
    }
  }

  private conversationKey(pubkey: string): Uint8Array {
    const cached = this.conversationKeys.get(pubkey);
    if (cached) return cached;
    const key = nip44.getConversationKey(this.clientSecretKey, pubkey);
    this.conversationKeys.set(pubkey, key);
    return key;
  }

  private setClientKey(key: Uint8Array | string): void {
    this.clientSecretKey = toSecretKey(key);
    this.clientPubkey = getPublicKey(this.clientSecretKey);
    this.conversationKeys.clear();
  }

  private requireUser(): string {
    const state = this.state;
    if (state.status !== "connected") throw new NotConnectedError();
    return state.userPubkey;
  }

  private setState(state: RemoteSignerState): void {
    this.stateSubject.next(state);
  }
}
