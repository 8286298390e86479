#!/usr/bin/env tsx
import { parseArgs } from "node:util";
import { loadSettings } from "./settings";
import { getConfigPath, getLLMApiKey, getSendGridApiKey } from "./env";
import { logger } from "./logger";
import { FileWriter } from "./storage/fileWriter";
import { ProcessedIdStore } from "./storage/processedIdStore";
import { StateStore } from "./storage/stateStore";
import { ArxivSource, resolveQuery } from "./sources/arxivSource";
import { buildLLMProvider } from "./llm/factory";
import { MarkdownDigestRenderer } from "./output/digestRenderer";
import { createSendGridClient } from "./notify/notifier";
import { EmailNotifier } from "./notify/emailNotifier";
import { runDailyDigest } from "./pipeline/dailyPipeline";

const USAGE = `Usage: arxiv-daily-digest [--config <path>]

Fetches recent arXiv papers, asks an LLM which ones match your research
interests and emails the digest. Config defaults to ./digest.config.json
(or $DIGEST_CONFIG).`;

async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: "string", short: "c" },
      help: { type: "boolean", short: "h" }
    }
  });
  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const configPath = getConfigPath(values.config);
  const settings = await loadSettings(configPath);
  logger.info(`Loaded settings from ${configPath}`);

  const writer = new FileWriter(process.cwd());
  const processedIds = new ProcessedIdStore(writer, settings.dataFolder);
  const stateStore = new StateStore(writer, settings.dataFolder);
  await stateStore.load();

  const result = await runDailyDigest(settings, {
    source: new ArxivSource({ timezone: settings.timezone }),
    llm: buildLLMProvider(settings.llm, getLLMApiKey(settings.llm.provider)),
    processedIds,
    renderer: new MarkdownDigestRenderer(writer, settings, resolveQuery(settings)),
    notifier: new EmailNotifier(createSendGridClient(getSendGridApiKey()), settings.email),
    stateStore,
    writer
  }, {
    onProgress: msg => logger.debug(msg)
  });

  if (result.status === "no-new-papers") {
    logger.info(`No new papers for ${result.date} (${result.fetched} fetched, all processed before)`);
  } else {
    logger.info(`Sent digest for ${result.date}: ${result.recommended} recommended of ${result.fresh} new papers`);
  }
  return 0;
}

main(process.argv.slice(2)).then(
  code => { process.exitCode = code; },
  (err: unknown) => {
    logger.error("Daily digest failed", err);
    process.exitCode = 1;
  }
);
