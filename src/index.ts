#!/usr/bin/env node

import { config } from "dotenv";
import yargs from "yargs/yargs";
import { hideBin } from "yargs/helpers";
import { ConsoleLogger } from "./common/console-logger.js";
import { loadFunHalfConfig } from "./fun-half/fun-half-config.js";
import { FileFeedStore } from "./fun-half/file-feed-store.js";
import { YtDlpVideoProvider } from "./fun-half/yt-dlp-video-provider.js";
import { runFunHalfWorker } from "./worker/fun-half-worker.js";

config({ quiet: true });

const main = async () => {
  const argv = yargs(hideBin(process.argv))
    .option("output_path", {
      type: "string",
      description: "Path of the RSS feed file to update.",
    })
    .option("time_zone", {
      type: "string",
      description: "IANA time zone used for dates, the cutoff and pubDate.",
    })
    .option("debug", {
      type: "boolean",
      description: "Enable debug logging.",
    })
    .strict()
    .parseSync();

  const funHalfConfig = loadFunHalfConfig(process.env, {
    outputPath: argv.output_path,
    timeZone: argv.time_zone,
    debug: argv.debug,
  });

  const logger = new ConsoleLogger("FunHalfWorker", funHalfConfig.debug);
  const outcome = await runFunHalfWorker({
    config: funHalfConfig,
    provider: new YtDlpVideoProvider(new ConsoleLogger("YtDlpVideoProvider", funHalfConfig.debug), funHalfConfig),
    store: new FileFeedStore(new ConsoleLogger("FileFeedStore", funHalfConfig.debug), funHalfConfig.feed, funHalfConfig.timeZone),
    logger,
  });

  logger.info(`Run finished: ${outcome.status}`);
};

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
