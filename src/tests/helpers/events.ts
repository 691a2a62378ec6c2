import type { EventTemplate, NostrEvent } from "nostr-tools";
import {
  finalizeEvent,
  generateSecretKey,
  getPublicKey,
} from "nostr-tools/pure";
import { nowSeconds } from "../../utils/utils";

export interface TestKeypair {
  secretKey: Uint8Array;
  pubkey: string;
}

export function createKeypair(): TestKeypair {
  const secretKey = generateSecretKey();
  return { secretKey, pubkey: getPublicKey(secretKey) };
}

export function signTestEvent(
  keys: TestKeypair,
  template: Partial<EventTemplate> & Pick<EventTemplate, "kind">,
): NostrEvent {
  return finalizeEvent(
    {
      created_at: nowSeconds(),
      tags: [],
      content: "",
      ...template,
    },
    keys.secretKey,
  );
}

/** The event as a relay would deliver it: plain fields, no cached verification. */
export function toWire(event: NostrEvent): NostrEvent {
  return {
    id: event.id,
    pubkey: event.pubkey,
    created_at: event.created_at,
    kind: event.kind,
    tags: event.tags.map((tag) => [...tag]),
    content: event.content,
    sig: event.sig,
  };
}

export function coordinateFor(pubkey: string, identifier: string): string {
  return `30311:${pubkey}:${identifier}`;
}
