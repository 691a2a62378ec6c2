import type { EventTemplate, NostrEvent } from "nostr-tools";
import { makeZapRequest } from "nostr-tools/nip57";
import { EventKind } from "../constants/nostr";
import type { ConnectionPool, PublishAck } from "../relay/ConnectionPool";
import type { EventSigner } from "../signer/LocalSigner";
import { LivestrError, ValidationError } from "../types";
import { Logger } from "../utils/Logger";
import { buildCoordinate, parseCoordinate } from "../utils/utils.nostr";
import { nowSeconds } from "../utils/utils";

export interface PublishResult {
  event: NostrEvent;
  acks: PublishAck[];
}

export interface ZapRequestParams {
  recipientPubkey: string;
  amountMsats: number;
  /** Relays the wallet should publish the receipt to */
  relays: string[];
  lnurl?: string;
  coordinate?: string;
  eventId?: string;
  comment?: string;
}

/**
 * Signs and publishes what a viewer sends into a stream: chat messages,
 * presence and zap requests.
 */
export class LiveActivityPublisher {
  private signer: EventSigner | null;
  private readonly logger: Logger;

  constructor(
    private readonly pool: Pick<ConnectionPool, "publish">,
    signer: EventSigner | null = null,
    logger?: Logger,
  ) {
    this.signer = signer;
    this.logger = logger ?? new Logger({ service: "publisher" });
  }

  /** Swap the signer, e.g. after a remote signer connects. */
  setSigner(signer: EventSigner | null): void {
    this.signer = signer;
  }

  get hasSigner(): boolean {
    return this.signer !== null;
  }

  async sendChatMessage(coordinate: string, content: string): Promise<PublishResult> {
    const target = this.requireCoordinate(coordinate);
    const text = content.trim();
    if (text.length === 0) {
      throw new ValidationError("Chat message is empty", "content");
    }

    return this.signAndPublish({
      kind: EventKind.LiveChatMessage,
      created_at: nowSeconds(),
      tags: [["a", target]],
      content: text,
    });
  }

  /**
   * Announce presence in a stream, or clear it when `coordinate` is null.
   */
  async publishPresence(coordinate: string | null): Promise<PublishResult> {
    const tags = coordinate === null ? [] : [["a", this.requireCoordinate(coordinate)]];
    return this.signAndPublish({
      kind: EventKind.RoomPresence,
      created_at: nowSeconds(),
      tags,
      content: "",
    });
  }

  /**
   * Build and sign a zap request. It is handed to the recipient's LNURL
   * endpoint, never published.
   */
  async createZapRequest(params: ZapRequestParams): Promise<NostrEvent> {
    if (!Number.isInteger(params.amountMsats) || params.amountMsats <= 0) {
      throw new ValidationError("Zap amount must be a positive number of millisats", "amountMsats");
    }
    if (params.relays.length === 0) {
      throw new ValidationError("Zap request needs at least one relay", "relays");
    }

    const request = makeZapRequest({
      pubkey: params.recipientPubkey.toLowerCase(),
      amount: params.amountMsats,
      comment: params.comment ?? "",
      relays: params.relays,
    });
    if (params.lnurl) request.tags.push(["lnurl", params.lnurl]);

    // makeZapRequest only derives a/k from a full event; streams are zapped by coordinate
    if (params.coordinate) {
      const target = parseCoordinate(params.coordinate);
      if (!target) {
        throw new ValidationError(`Malformed coordinate "${params.coordinate}"`, "coordinate");
      }
      request.tags.push(["a", buildCoordinate(target.kind, target.pubkey, target.identifier)]);
      request.tags.push(["k", String(target.kind)]);
    }
    if (params.eventId) request.tags.push(["e", params.eventId]);

    return this.requireSigner().signEvent(request);
  }

  private async signAndPublish(template: EventTemplate): Promise<PublishResult> {
    const event = await this.requireSigner().signEvent(template);
    const acks = await this.pool.publish(event);

    const accepted = acks.filter((ack) => ack.accepted).length;
    if (acks.length > 0 && accepted === 0) {
      this.logger.warn(`⚠️ No relay accepted kind ${event.kind} event ${event.id}`);
    } else {
      this.logger.debug(`📤 Kind ${event.kind} accepted by ${accepted}/${acks.length} relays`);
    }
    return { event, acks };
  }

  private requireCoordinate(coordinate: string): string {
    const target = parseCoordinate(coordinate);
    if (!target) {
      throw new ValidationError(`Malformed coordinate "${coordinate}"`, "coordinate");
    }
    return buildCoordinate(target.kind, target.pubkey, target.identifier);
  }

  private requireSigner(): EventSigner {
    if (!this.signer) {
      throw new LivestrError("No signer available", "NO_SIGNER");
    }
    return this.signer;
  }
}
