import WebSocket from "ws";
import { Relay, useWebSocketImplementation } from "nostr-tools/relay";

// Node 20 ships no WebSocket client; nostr-tools takes the one from ws
useWebSocketImplementation(WebSocket);

/**
 * Creates the nostr-tools relay behind one pool connection. Tests inject a
 * factory backed by an in-process socket.
 */
export type RelayFactory = (url: string) => Relay;

export const defaultRelayFactory: RelayFactory = (url) => new Relay(url);
