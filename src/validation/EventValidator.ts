import type { NostrEvent } from "nostr-tools";
import { getEventHash, verifyEvent } from "nostr-tools/pure";
import { z } from "zod";
import {
  ADDRESSABLE_KIND_MAX,
  ADDRESSABLE_KIND_MIN,
  EventKind,
  LIVE_STREAM_STATUSES,
} from "../constants/nostr";
import { getTagValue } from "../utils/utils.nostr";
import { nowSeconds } from "../utils/utils";

export type ValidationFailureReason =
  | "missingField"
  | "malformedField"
  | "invalidIdentifier"
  | "invalidSignature"
  | "fromFuture"
  | "missingTag"
  | "invalidTag"
  | "invalidContent";

export type ValidationOutcome =
  | { valid: true; event: NostrEvent }
  | { valid: false; reason: ValidationFailureReason; message: string };

export interface EventValidatorOptions {
  /** Seconds an event may be dated ahead of the local clock */
  futureToleranceSeconds?: number;
  /** Clock in unix seconds */
  now?: () => number;
}

const REQUIRED_FIELDS = ["id", "pubkey", "created_at", "sig"] as const;

const hex = (length: number) =>
  z.string().regex(new RegExp(`^[0-9a-f]{${length}}$`), `expected ${length} lowercase hex characters`);

const SignedEventSchema = z.object({
  id: hex(64),
  pubkey: hex(64),
  created_at: z.number().int().nonnegative(),
  kind: z.number().int().nonnegative(),
  tags: z.array(z.array(z.string())),
  content: z.string(),
  sig: hex(128),
});

const LIVE_CHAT_COORDINATE = /^\d+:[0-9a-fA-F]{64}:.+$/;

const ZapDescriptionSchema = z
  .object({ pubkey: z.string() })
  .passthrough();

function fail(
  reason: ValidationFailureReason,
  message: string,
): ValidationOutcome {
  return { valid: false, reason, message };
}

function isJsonObject(content: string): boolean {
  try {
    const parsed: unknown = JSON.parse(content);
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed);
  } catch {
    return false;
  }
}

/**
 * Stateless structural, cryptographic and per-kind checks for inbound
 * events. Checks run in a fixed order and stop at the first failure.
 */
export class EventValidator {
  private readonly futureToleranceSeconds: number;
  private readonly now: () => number;

  constructor(options: EventValidatorOptions = {}) {
    this.futureToleranceSeconds = options.futureToleranceSeconds ?? 300;
    this.now = options.now ?? nowSeconds;
  }

  validate(raw: unknown): ValidationOutcome {
    return this.run(raw, true);
  }

  /** Same checks minus signature verification, for trusted sources. */
  validateWithoutSignature(raw: unknown): ValidationOutcome {
    return this.run(raw, false);
  }

  /** Keep only the events that pass validation. */
  filterValid(
    events: readonly unknown[],
    options: { verifySignatures?: boolean } = {},
  ): NostrEvent[] {
    const verify = options.verifySignatures ?? true;
    const valid: NostrEvent[] = [];
    for (const raw of events) {
      const outcome = this.run(raw, verify);
      if (outcome.valid) valid.push(outcome.event);
    }
    return valid;
  }

  private run(raw: unknown, verifySignature: boolean): ValidationOutcome {
    if (typeof raw !== "object" || raw === null) {
      return fail("missingField", "event is not an object");
    }

    for (const field of REQUIRED_FIELDS) {
      if (!(field in raw) || Reflect.get(raw, field) === undefined) {
        return fail("missingField", `${field} is missing`);
      }
    }

    const parsed = SignedEventSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      return fail(
        "malformedField",
        issue ? `${issue.path.join(".")}: ${issue.message}` : "malformed event",
      );
    }

    // Fresh object: signature caches on the input must not carry over
    const event: NostrEvent = {
      id: parsed.data.id,
      pubkey: parsed.data.pubkey,
      created_at: parsed.data.created_at,
      kind: parsed.data.kind,
      tags: parsed.data.tags,
      content: parsed.data.content,
      sig: parsed.data.sig,
    };

    if (getEventHash(event) !== event.id) {
      return fail("invalidIdentifier", "id does not match the event hash");
    }

    if (verifySignature && !verifyEvent(event)) {
      return fail("invalidSignature", "signature does not verify");
    }

    if (event.created_at > this.now() + this.futureToleranceSeconds) {
      return fail(
        "fromFuture",
        `created_at ${event.created_at} is more than ${this.futureToleranceSeconds}s ahead`,
      );
    }

    const kindFailure = this.checkKind(event);
    if (kindFailure) return kindFailure;

    return { valid: true, event };
  }

  private checkKind(event: NostrEvent): ValidationOutcome | null {
    if (event.kind >= ADDRESSABLE_KIND_MIN && event.kind <= ADDRESSABLE_KIND_MAX) {
      const identifier = getTagValue(event.tags, "d");
      if (!identifier) {
        return fail("missingTag", `kind ${event.kind} requires a d tag`);
      }
    }

    switch (event.kind) {
      case EventKind.Metadata:
        if (event.content.trim() !== "" && !isJsonObject(event.content)) {
          return fail("invalidContent", "metadata content is not a JSON object");
        }
        return null;

      case EventKind.LiveStream: {
        const status = getTagValue(event.tags, "status");
        if (
          status !== undefined &&
          !LIVE_STREAM_STATUSES.some((allowed) => allowed === status)
        ) {
          return fail("invalidTag", `unknown stream status "${status}"`);
        }
        return null;
      }

      case EventKind.LiveChatMessage: {
        const coordinate = getTagValue(event.tags, "a");
        if (coordinate === undefined) {
          return fail("missingTag", "live chat message requires an a tag");
        }
        if (!LIVE_CHAT_COORDINATE.test(coordinate)) {
          return fail("invalidTag", `malformed a tag "${coordinate}"`);
        }
        return null;
      }

      case EventKind.ZapReceipt: {
        const bolt11 = getTagValue(event.tags, "bolt11");
        if (!bolt11) return fail("missingTag", "zap receipt requires a bolt11 tag");

        const description = getTagValue(event.tags, "description");
        if (description === undefined) {
          return fail("missingTag", "zap receipt requires a description tag");
        }
        let request: unknown;
        try {
          request = JSON.parse(description);
        } catch {
          return fail("invalidContent", "zap description is not JSON");
        }
        if (!ZapDescriptionSchema.safeParse(request).success) {
          return fail("invalidContent", "zap description has no sender pubkey");
        }
        return null;
      }

      default:
        return null;
    }
  }
}
