import type { NostrEvent } from "nostr-tools";
import { Subject } from "rxjs";
import type {
  ChatMessage,
  FollowList,
  LiveStream,
  Profile,
  RelayList,
  ZapReceipt,
} from "../types";

/**
 * Typed outputs of the default kind handlers. Consumers subscribe to the
 * streams they care about.
 */
export class ClientEvents {
  readonly profiles$ = new Subject<Profile>();
  readonly followLists$ = new Subject<FollowList>();
  readonly relayLists$ = new Subject<RelayList>();
  readonly streams$ = new Subject<LiveStream>();
  readonly chatMessages$ = new Subject<ChatMessage>();
  readonly zapReceipts$ = new Subject<ZapReceipt>();
  /** Validated NIP-46 envelopes, still encrypted */
  readonly signerMessages$ = new Subject<NostrEvent>();

  complete(): void {
    this.profiles$.complete();
    this.followLists$.complete();
    this.relayLists$.complete();
    this.streams$.complete();
    this.chatMessages$.complete();
    this.zapReceipts$.complete();
    this.signerMessages$.complete();
  }
}
