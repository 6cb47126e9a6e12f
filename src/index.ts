#!/usr/bin/env node
import { UsageError, USAGE, formatBanner, parseArgs, type CliOptions } from "./cli.js";
import { ConfigError, loadConfig, type Config } from "./config/index.js";
import { openBrowser } from "./net/browser.js";
import { getLocalIp, serverUrl } from "./net/local-ip.js";
import { qrTerminal } from "./net/qr.js";
import { ShareServer } from "./server/share-server.js";
import { LocalStorage } from "./storage/local.js";

async function preview(config: Config): Promise<number> {
  const storage = await LocalStorage.open(config.storage.shared_dir);
  const url = serverUrl(await getLocalIp(), config.server.port);
  console.log(formatBanner(storage.root, url, await qrTerminal(url)));
  console.log("To start sharing, run:\n    lanshare runserver [--open]");
  return 0;
}

async function runServer(config: Config, open: boolean): Promise<number> {
  const server = new ShareServer(config);
  const info = await server.start();
  console.log(formatBanner(info.root, info.url, await qrTerminal(info.url)));
  console.log("Server running... (press Ctrl+C to stop)");

  let interrupted = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (interrupted) {
      console.log("\nForced exit.");
      process.exit(130);
    }
    interrupted = true;
    console.log(`\n${signal} received, stopping server...`);
    server.stop().catch((err) => {
      console.error("ERROR: stopping server:", err);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const browserTimer = open
    ? setTimeout(() => openBrowser(info.url), config.browser.open_delay_ms)
    : null;

  await server.closed;

  if (browserTimer) clearTimeout(browserTimer);
  process.off("SIGINT", onSignal);
  process.off("SIGTERM", onSignal);
  console.log("Server stopped.");
  return 0;
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  if (options.command === "help") {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(options.configPath);
  if (options.command === "preview") {
    return preview(config);
  }
  return runServer(config, options.open);
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else {
      console.error("Fatal:", err);
    }
    process.exit(1);
  });
