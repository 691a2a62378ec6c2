import { describe, it, expect } from "vitest";
import { verifyEvent } from "nostr-tools/pure";
import { LocalSigner } from "../LocalSigner";
import { createKeypair } from "../../tests/helpers/events";

describe("LocalSigner", () => {
  it("should sign as the key it holds", async () => {
    const keys = createKeypair();
    const signer = new LocalSigner(keys.secretKey);

    const event = await signer.signEvent({
      kind: 1311,
      created_at: 1_700_000_000,
      tags: [],
      content: "gm",
    });

    expect(await signer.getPublicKey()).toBe(keys.pubkey);
    expect(event.pubkey).toBe(keys.pubkey);
    expect(verifyEvent(event)).toBe(true);
  });

  it("should accept and export hex keys", async () => {
    const first = new LocalSigner();
    const restored = new LocalSigner(first.exportSecretKey());

    expect(await restored.getPublicKey()).toBe(await first.getPublicKey());
  });
});
