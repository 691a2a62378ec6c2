import { isHexKey } from "applesauce-core/helpers";
import { InvalidUriError } from "./errors";

const BUNKER_SCHEME = "bunker://";
const NOSTR_CONNECT_SCHEME = "nostrconnect://";
const RELAY_PATTERN = /^wss?:\/\/.+/i;

export interface BunkerUri {
  remotePubkey: string;
  relays: string[];
  secret: string | null;
}

export interface NostrConnectUri {
  clientPubkey: string;
  relays: string[];
  secret: string | null;
  name: string | null;
  url: string | null;
}

export interface NostrConnectUriParams {
  clientPubkey: string;
  relay: string | string[];
  secret?: string;
  name?: string;
  url?: string;
}

function splitUri(
  uri: string,
  scheme: string,
): { pubkey: string; params: URLSearchParams } {
  const trimmed = uri.trim();
  if (!trimmed.toLowerCase().startsWith(scheme)) {
    throw new InvalidUriError(`URI must start with ${scheme}`);
  }

  const rest = trimmed.slice(scheme.length);
  const queryIndex = rest.indexOf("?");
  if (queryIndex === -1) {
    throw new InvalidUriError("URI has no query parameters");
  }

  const pubkey = rest.slice(0, queryIndex).replace(/\/$/, "").toLowerCase();
  if (!isHexKey(pubkey)) {
    throw new InvalidUriError("URI pubkey must be 64 hex characters");
  }

  return { pubkey, params: new URLSearchParams(rest.slice(queryIndex + 1)) };
}

function readRelays(params: URLSearchParams): string[] {
  const relays = [
    ...new Set(
      params
        .getAll("relay")
        .map((relay) => relay.trim())
        .filter((relay) => RELAY_PATTERN.test(relay)),
    ),
  ];
  if (relays.length === 0) {
    throw new InvalidUriError("URI must name at least one ws:// or wss:// relay");
  }
  return relays;
}

function optionalParam(params: URLSearchParams, name: string): string | null {
  const value = params.get(name);
  return value ? value : null;
}

/**
 * Parse `bunker://<remote-pubkey>?relay=<url>&secret=<token>`.
 * @throws InvalidUriError
 */
export function parseBunkerUri(uri: string): BunkerUri {
  const { pubkey, params } = splitUri(uri, BUNKER_SCHEME);
  return {
    remotePubkey: pubkey,
    relays: readRelays(params),
    secret: optionalParam(params, "secret"),
  };
}

/**
 * Parse `nostrconnect://<client-pubkey>?relay=<url>&secret=<token>&name=<app>`.
 * @throws InvalidUriError
 */
export function parseNostrConnectUri(uri: string): NostrConnectUri {
  const { pubkey, params } = splitUri(uri, NOSTR_CONNECT_SCHEME);
  return {
    clientPubkey: pubkey,
    relays: readRelays(params),
    secret: optionalParam(params, "secret"),
    name: optionalParam(params, "name"),
    url: optionalParam(params, "url"),
  };
}

export function createNostrConnectUri(params: NostrConnectUriParams): string {
  const query = new URLSearchParams();
  const relays = Array.isArray(params.relay) ? params.relay : [params.relay];
  for (const relay of relays) query.append("relay", relay);
  if (params.secret) query.set("secret", params.secret);
  if (params.name) query.set("name", params.name);
  if (params.url) query.set("url", params.url);

  return `${NOSTR_CONNECT_SCHEME}${params.clientPubkey}?${query.toString()}`;
}
