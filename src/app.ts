import { parseArgs } from "util";
import { loadConfig } from "./config";
import { createLivestrClient } from "./service/ClientFactory";
import { errorMessage } from "./utils/utils";

const printHelp = () => {
  console.log(`
Usage: tsx src/app.ts [options]

Follows live streams on the configured relays and prints what arrives.

Options:
  -h, --help               Show this help message.
  -l, --limit <n>          How many recent streams to request (default 50).
  -u, --user <npub|hex>    Also fetch one user's profile, follows and relays.
  -w, --watch <coordinate> Print chat and zaps of one stream.
  -b, --bunker <uri>       Connect a remote signer from a bunker:// URI.
    `);
};

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    help: { type: "boolean", short: "h" },
    limit: { type: "string", short: "l" },
    user: { type: "string", short: "u" },
    watch: { type: "string", short: "w" },
    bunker: { type: "string", short: "b" },
  },
  strict: true,
  allowPositionals: false,
});

if (values.help) {
  printHelp();
  process.exit(0);
}

const config = loadConfig();
const client = createLivestrClient(config);

const main = async () => {
  client.start();

  client.events.streams$.subscribe((stream) => {
    const host = client.getProfile(stream.hostPubkey);
    console.log(
      `📺 [${stream.status ?? "unknown"}] ${stream.title} by ${host?.displayName ?? host?.name ?? stream.hostPubkey.slice(0, 8)} (${stream.viewerCount} viewers)`,
    );
  });
  client.events.profiles$.subscribe((profile) => {
    console.log(`👤 ${profile.name ?? profile.pubkey.slice(0, 8)}`);
  });

  const limit = values.limit ? parseInt(values.limit, 10) : 50;
  client.requestLiveStreams(Number.isNaN(limit) ? 50 : limit);

  if (values.user) client.requestUserData(values.user);

  if (values.watch) {
    client.watchActivity(values.watch, (item) => {
      if (item.type === "chat") {
        console.log(`💬 ${item.message.senderPubkey.slice(0, 8)}: ${item.message.content}`);
      } else {
        const sats = item.zap.amountMsats === null ? "?" : Math.floor(item.zap.amountMsats / 1000);
        console.log(`⚡ ${sats} sats from ${item.zap.senderPubkey.slice(0, 8)} ${item.zap.comment}`);
      }
    });
  }

  if (values.bunker) {
    const userPubkey = await client.signer.connect(values.bunker);
    console.log(`🔐 Signing as ${userPubkey}`);
  }
};

main().catch((error) => {
  console.error("An error occurred:", errorMessage(error));
  client.shutdown();
  process.exit(1);
});

const gracefulShutdown = (signal: string) => {
  console.log(`\nReceived ${signal}. Shutting down gracefully...`);
  client.shutdown();
  console.log("Shutdown complete.");
  process.exit(0);
};

process.on("SIGINT", () => gracefulShutdown("SIGINT"));
process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
