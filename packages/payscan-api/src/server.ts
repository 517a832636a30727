import { consoleLogger, createReceiptScannerFromEnv } from "@payscan/engine";
import { createApp } from "./app.js";
import { readApiConfigFromEnv } from "./config/env.js";

async function main() {
  const config = readApiConfigFromEnv();
  const scanner = createReceiptScannerFromEnv(process.env, consoleLogger);
  const app = createApp({ config, scanner, logger: consoleLogger });

  app.listen(config.port, () => {
    // eslint-disable-next-line no-console
    console.log(`[payscan-api] listening on :${config.port}`);
    if (!scanner) {
      console.warn("[payscan-api] PAYSCAN_RECOGNIZER_BASE_URL is unset; image scanning is disabled");
    }
  });
}

void main();
