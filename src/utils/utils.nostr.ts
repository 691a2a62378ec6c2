import { isHexKey } from "applesauce-core/helpers";
import { decode } from "nostr-tools/nip19";
import { logger } from "./Logger";

export type Tag = string[];

/**
 * Parsed form of an addressable event coordinate `<kind>:<pubkey>:<identifier>`.
 */
export interface Coordinate {
  kind: number;
  pubkey: string;
  identifier: string;
}

/**
 * Validate and decode a pubkey from hex, npub or nprofile.
 * @param identifier - Pubkey in any supported format
 * @returns Lowercase hex pubkey, or null when the identifier is invalid
 */
export function validateAndDecodePubkey(identifier: string): string | null {
  if (!identifier) return null;
  const trimmed = identifier.trim();

  if (isHexKey(trimmed)) {
    return trimmed.toLowerCase();
  }

  try {
    const decoded = decode(trimmed);

    if (decoded.type === "npub") {
      return decoded.data;
    } else if (decoded.type === "nprofile") {
      return decoded.data.pubkey;
    }
  } catch (error) {
    logger.warn(
      `[Utils] ⚠️ Invalid nip19 identifier: ${identifier}`,
      error instanceof Error ? error.message : String(error),
    );
    return null;
  }

  return null;
}

/** First value of the first tag named `name`. */
export function getTagValue(
  tags: readonly Tag[],
  name: string,
): string | undefined {
  for (const tag of tags) {
    if (tag[0] === name && tag[1] !== undefined) return tag[1];
  }
  return undefined;
}

/** Values of every tag named `name`, in tag order. */
export function getTagValues(tags: readonly Tag[], name: string): string[] {
  const values: string[] = [];
  for (const tag of tags) {
    if (tag[0] === name && tag[1] !== undefined) values.push(tag[1]);
  }
  return values;
}

/**
 * Split a coordinate on its first two colons. The identifier keeps any
 * further colons. Returns null for fewer than three segments.
 */
function splitCoordinate(
  coordinate: string,
): [kind: string, pubkey: string, identifier: string] | null {
  const first = coordinate.indexOf(":");
  if (first < 0) return null;
  const second = coordinate.indexOf(":", first + 1);
  if (second < 0) return null;
  return [
    coordinate.slice(0, first),
    coordinate.slice(first + 1, second),
    coordinate.slice(second + 1),
  ];
}

/**
 * Canonical key for coordinate-keyed maps. Only the pubkey segment is
 * lower-cased; the identifier is case-sensitive. Inputs that are not
 * three segments are lower-cased whole. Idempotent.
 */
export function normalizeCoordinate(coordinate: string): string {
  const parts = splitCoordinate(coordinate);
  if (!parts) return coordinate.toLowerCase();
  const [kind, pubkey, identifier] = parts;
  return `${kind}:${pubkey.toLowerCase()}:${identifier}`;
}

/**
 * Parse a coordinate, requiring a numeric kind, a 64-hex pubkey and a
 * non-empty identifier.
 */
export function parseCoordinate(coordinate: string): Coordinate | null {
  const parts = splitCoordinate(coordinate);
  if (!parts) return null;
  const [kind, pubkey, identifier] = parts;
  if (!/^\d+$/.test(kind) || !isHexKey(pubkey) || identifier.length === 0) {
    return null;
  }
  return { kind: Number(kind), pubkey: pubkey.toLowerCase(), identifier };
}

export function buildCoordinate(
  kind: number,
  pubkey: string,
  identifier: string,
): string {
  return `${kind}:${pubkey.toLowerCase()}:${identifier}`;
}
