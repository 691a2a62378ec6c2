import { EventKind } from "../constants/nostr";
import type { ProfileCache } from "../profiles/ProfileCache";
import { Logger } from "../utils/Logger";
import type { ClientEvents } from "./ClientEvents";
import type { EventRouter } from "./EventRouter";
import {
  parseChatMessage,
  parseFollowList,
  parseLiveStream,
  parseProfile,
  parseRelayList,
  parseZapReceipt,
} from "./parsers";

export interface DefaultHandlerDeps {
  events: ClientEvents;
  profiles: ProfileCache;
  logger?: Logger;
}

/**
 * Install the handlers for every kind the client understands.
 */
export function registerDefaultHandlers(
  router: EventRouter,
  deps: DefaultHandlerDeps,
): void {
  const { events, profiles } = deps;
  const logger = deps.logger ?? new Logger({ service: "handlers" });

  router.register(EventKind.Metadata, (event) => {
    const profile = parseProfile(event);
    if (!profile) return;

    const cachedAt = profiles.getCreatedAt(profile.pubkey);
    if (cachedAt !== null && cachedAt > profile.createdAt) {
      logger.debug(`Ignoring older metadata for ${profile.pubkey}`);
      return;
    }
    profiles.put(profile.pubkey, profile);
    events.profiles$.next(profile);
  });

  router.register(EventKind.FollowList, (event) => {
    const followList = parseFollowList(event);
    if (followList) events.followLists$.next(followList);
  });

  router.register(EventKind.RelayList, (event) => {
    const relayList = parseRelayList(event);
    if (relayList) events.relayLists$.next(relayList);
  });

  router.register(EventKind.LiveStream, (event) => {
    const stream = parseLiveStream(event);
    if (!stream) return;
    profiles.requestLookup(stream.hostPubkey);
    events.streams$.next(stream);
  });

  router.register(EventKind.LiveChatMessage, (event) => {
    const message = parseChatMessage(event);
    if (!message) return;
    profiles.requestLookup(message.senderPubkey);
    events.chatMessages$.next(message);
  });

  router.register(EventKind.ZapReceipt, (event) => {
    const zap = parseZapReceipt(event);
    if (!zap) return;
    profiles.requestLookup(zap.senderPubkey);
    events.zapReceipts$.next(zap);
  });

  router.register(EventKind.NostrConnect, (event) => {
    events.signerMessages$.next(event);
  });

  logger.debug(
    `Registered handlers for kinds ${router.getRegisteredKinds().join(", ")}`,
  );
}
