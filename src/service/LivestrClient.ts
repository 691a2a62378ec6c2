import type { Subscription as RxSubscription } from "rxjs";
import type { ActivityHandler, ActivitySubscription } from "../activity/ActivityRouter";
import { EventKind } from "../constants/nostr";
import type { RetriggerRequest } from "../relay/ConnectionPool";
import type { EventSigner } from "../signer/LocalSigner";
import type { Profile } from "../types";
import { LivestrError, ValidationError } from "../types";
import { validateAndDecodePubkey } from "../utils/utils.nostr";
import type {
  ILivestrClient,
  LivestrClientDependencies,
  LivestrStats,
} from "./ServiceInterfaces";

/**
 * Facade over the client core. Owns the lifecycle of every component the
 * factory wired together.
 */
export class LivestrClient implements ILivestrClient {
  private running = false;
  private shutDown = false;
  private usingRemoteSigner = false;
  private readonly rxSubscriptions: RxSubscription[] = [];

  constructor(private readonly deps: LivestrClientDependencies) {}

  get events() {
    return this.deps.events;
  }

  get signer() {
    return this.deps.signer;
  }

  get publisher() {
    return this.deps.publisher;
  }

  get profiles() {
    return this.deps.profiles;
  }

  get pool() {
    return this.deps.pool;
  }

  get config() {
    return this.deps.config;
  }

  start(): void {
    if (this.shutDown) throw new LivestrError("Client was shut down", "CLIENT_SHUT_DOWN");
    if (this.running) return;
    const { pool, router, activity, signer, logger } = this.deps;

    router.start();
    activity.start();
    pool.connect();

    this.rxSubscriptions.push(
      pool.retriggerRequired$.subscribe((requests) => this.retrigger(requests)),
      signer.state$.subscribe((state) => {
        if (state.status === "connected") {
          this.deps.publisher.setSigner(signer);
          this.usingRemoteSigner = true;
        } else if (this.usingRemoteSigner) {
          this.deps.publisher.setSigner(null);
          this.usingRemoteSigner = false;
        }
      }),
    );

    this.running = true;
    logger.info(`🚀 ${this.deps.config.appName} client started on ${pool.relays.length} relays`);
  }

  /** Tear everything down in reverse order of start. Final. */
  shutdown(): void {
    if (this.shutDown) return;
    const { pool, router, activity, signer, profiles, events, logger } = this.deps;

    for (const subscription of this.rxSubscriptions) subscription.unsubscribe();
    this.rxSubscriptions.length = 0;

    signer.disconnect();
    activity.dispose();
    router.stop();
    profiles.dispose();
    pool.disconnect();
    events.complete();

    this.running = false;
    this.shutDown = true;
    logger.info("✅ Client shutdown completed");
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Follow live stream announcements. The subscription survives reconnects.
   * @returns the pool subscription id
   */
  requestLiveStreams(limit = 50): string {
    this.ensureRunning();
    return this.deps.pool.subscribe(
      { kinds: [EventKind.LiveStream], limit },
      "streams",
      { resubscribe: "auto" },
    );
  }

  /**
   * Fetch profile, follow list and relay list of one user.
   * @throws ValidationError for identifiers that are neither hex, npub nor nprofile
   */
  requestUserData(pubkeyOrNpub: string): string {
    this.ensureRunning();
    const pubkey = validateAndDecodePubkey(pubkeyOrNpub);
    if (!pubkey) {
      throw new ValidationError(`Invalid pubkey or npub: ${pubkeyOrNpub}`, "pubkey");
    }

    return this.deps.pool.subscribe(
      {
        kinds: [EventKind.Metadata, EventKind.FollowList, EventKind.RelayList],
        authors: [pubkey],
      },
      "user-data",
      { closeOnEose: true, resubscribe: "manual" },
    );
  }

  /** Cached profile; a miss queues a lookup. */
  getProfile(pubkey: string): Profile | null {
    const profile = this.deps.profiles.get(pubkey);
    if (!profile && this.running) this.deps.profiles.requestLookup(pubkey);
    return profile;
  }

  watchActivity(coordinate: string, handler: ActivityHandler): ActivitySubscription {
    this.ensureRunning();
    return this.deps.activity.subscribe(coordinate, handler);
  }

  /** Sign with a local key instead of the remote signer. */
  useSigner(signer: EventSigner | null): void {
    this.deps.publisher.setSigner(signer);
    this.usingRemoteSigner = false;
  }

  getStats(): LivestrStats {
    return {
      pool: this.deps.pool.getStats(),
      router: this.deps.router.getStats(),
      profiles: this.deps.profiles.stats(),
      activity: this.deps.activity.getStats(),
      signer: this.deps.signer.state.status,
    };
  }

  // Manual subscriptions are one-shot fetches; run them again as they were
  private retrigger(requests: RetriggerRequest[]): void {
    for (const request of requests) {
      this.deps.pool.subscribe(request.filter, request.purpose, {
        closeOnEose: true,
        resubscribe: "manual",
      });
    }
    this.deps.logger.debug(`Re-triggered ${requests.length} fetches`);
  }

  private ensureRunning(): void {
    if (!this.running) {
      throw new LivestrError("Client is not running", "NOT_RUNNING");
    }
  }
}
