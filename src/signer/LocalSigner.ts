import type { EventTemplate, NostrEvent } from "nostr-tools";
import { finalizeEvent, generateSecretKey, getPublicKey } from "nostr-tools/pure";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

/** Anything that can sign events on behalf of the user. */
export interface EventSigner {
  getPublicKey(): Promise<string>;
  signEvent(template: EventTemplate): Promise<NostrEvent>;
}

/** Signs with a secret key held in memory. */
export class LocalSigner implements EventSigner {
  private readonly secretKey: Uint8Array;
  private readonly pubkey: string;

  constructor(secretKey: Uint8Array | string = generateSecretKey()) {
    this.secretKey =
      typeof secretKey === "string" ? hexToBytes(secretKey) : secretKey;
    this.pubkey = getPublicKey(this.secretKey);
  }

  async getPublicKey(): Promise<string> {
    return this.pubkey;
  }

  async signEvent(template: EventTemplate): Promise<NostrEvent> {
    return finalizeEvent(template, this.secretKey);
  }

  exportSecretKey(): string {
    return bytesToHex(this.secretKey);
  }
}
