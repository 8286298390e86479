import type { DigestSettings } from "../types/config";
import type { PaperRecord, RecommendationMap, RunStage } from "../types/paper";
import type { PaperSource } from "../sources/source";
import type { LLMProvider } from "../llm/provider";
import type { ProcessedIds } from "../storage/processedIdStore";
import type { StateStore } from "../storage/stateStore";
import type { FileWriter } from "../storage/fileWriter";
import type { DigestRenderer } from "../output/digestRenderer";
import type { Notifier } from "../notify/notifier";
import { filterByWindow } from "../sources/source";
import { resolveQuery } from "../sources/arxivSource";
import { countRecommendations, recommendPapers } from "../recommend/recommender";
import { createRunLog, logger } from "../logger";
import { getISODate } from "../utils/time";

const RUN_LOG_MAX_BYTES = 512 * 1024;

export interface DigestDependencies {
  source: PaperSource;
  llm: LLMProvider;
  processedIds: ProcessedIds;
  renderer: DigestRenderer;
  notifier: Notifier;
  stateStore?: StateStore;
  /** When set, the run's log lines are appended to <logFolder>/runs.log */
  writer?: FileWriter;
}

export interface DailyDigestOptions {
  now?: Date;
  signal?: AbortSignal;
  /** Called at each major pipeline step with a human-readable status message */
  onProgress?: (msg: string) => void;
}

export type DigestRunResult =
  | { status: "no-new-papers"; date: string; fetched: number }
  | {
      status: "sent";
      date: string;
      fetched: number;
      fresh: number;
      recommended: number;
      categories: string[];
      attachments: string[];
    };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One digest run: fetch → drop processed → recommend → render → email →
 * mark processed. Ids are only marked after the email went out, so a failed
 * run leaves its papers to be reconsidered next time.
 */
export async function runDailyDigest(
  settings: DigestSettings,
  deps: DigestDependencies,
  options: DailyDigestOptions = {}
): Promise<DigestRunResult> {
  const now = options.now ?? new Date();
  const date = getISODate(now, settings.timezone);
  const log = createRunLog();
  const progress = options.onProgress ?? (() => {});

  const failAt = async (stage: RunStage, err: unknown): Promise<never> => {
    const message = errorMessage(err);
    log.error(`${stage.toUpperCase()} ERROR: ${message}`);
    await deps.stateStore?.setLastError(stage, message);
    throw err;
  };

  log.info(`=== Daily digest START date=${date} ===`);

  try {
    const query = resolveQuery(settings);

    // ── Step 1: Fetch ─────────────────────────────────────────────
    progress(`[1/5] Fetching arXiv papers...`);
    let processed: Set<string>;
    let fetched: PaperRecord[];
    try {
      processed = await deps.processedIds.load();
      log.info(`Step 1 FETCH: query="${query}" maxResults=${settings.maxResults} processed=${processed.size}`);
      fetched = await deps.source.search({
        query,
        maxResults: settings.maxResults,
        sortBy: settings.sortBy,
        sortOrder: "descending",
        signal: options.signal
      });
    } catch (err) {
      return await failAt("fetch", err);
    }
    log.info(`Step 1 FETCH: got ${fetched.length} papers`);

    if (settings.timeWindowHours > 0) {
      const windowStart = new Date(now.getTime() - settings.timeWindowHours * 3600 * 1000);
      const before = fetched.length;
      fetched = filterByWindow(fetched, windowStart, now);
      log.info(`Step 1 WINDOW: ${before} → ${fetched.length} papers within ${settings.timeWindowHours}h`);
    }

    // ── Step 2: Drop already-processed ────────────────────────────
    let papers = fetched;
    if (settings.dedup) {
      papers = fetched.filter(p => {
        if (!processed.has(p.id)) return true;
        log.info(`Skip already processed paper: ${p.id}`);
        return false;
      });
    }
    log.info(`Step 2 DEDUP: before=${fetched.length} after=${papers.length}${settings.dedup ? "" : " (dedup disabled)"}`);

    if (papers.length === 0) {
      log.info("All latest papers have been processed before. Skip and exit.");
      progress(`Done: no new papers`);
      return { status: "no-new-papers", date, fetched: fetched.length };
    }

    // ── Step 3: Recommend ─────────────────────────────────────────
    progress(`[2/5] Asking ${deps.llm.model} for recommendations (${papers.length} papers)...`);
    log.info(`Step 3 RECOMMEND: model=${deps.llm.model} papers=${papers.length} interests=${settings.researchInterests.length}`);
    let recommendations: RecommendationMap;
    try {
      const result = await recommendPapers(papers, settings.researchInterests, deps.llm, {
        systemPrompt: settings.prompts.system,
        userPromptTemplate: settings.prompts.user,
        temperature: settings.llm.temperature,
        maxTokens: settings.llm.maxTokens,
        signal: options.signal
      });
      recommendations = result.recommendations;
      log.info(`Step 3 RECOMMEND: response length=${result.raw.length} chars`);
      if (result.usage) {
        log.info(`Step 3 RECOMMEND tokens: input=${result.usage.inputTokens} output=${result.usage.outputTokens}`);
      }
    } catch (err) {
      return await failAt("recommend", err);
    }

    const recommended = countRecommendations(recommendations);
    const categories = [...recommendations.keys()];
    log.info(`Step 3 RECOMMEND: ${recommended} recommendations in ${categories.length} categories [${categories.join(", ")}]`);
    if (recommended === 0) {
      log.info("No new recommended papers (all filtered or none matched).");
    }

    // ── Step 4: Render ────────────────────────────────────────────
    progress(`[3/5] Writing digest...`);
    const attachments: string[] = [];
    try {
      const primary = await deps.renderer.renderDigest(recommendations, date);
      attachments.push(primary);
      log.info(`Step 4 RENDER: digest written to ${primary}`);
    } catch (err) {
      return await failAt("render", err);
    }

    if (settings.exportBibtex) {
      try {
        const secondary = await deps.renderer.renderSecondary(attachments[0], recommendations);
        attachments.push(secondary);
        log.info(`Step 4 RENDER: BibTeX written to ${secondary}`);
      } catch (err) {
        log.warn(`Step 4 RENDER: BibTeX export failed: ${errorMessage(err)} (continuing with digest only)`);
      }
    }

    // ── Step 5: Notify ────────────────────────────────────────────
    progress(`[4/5] Sending email...`);
    try {
      await deps.notifier.send(attachments, { date, recommendedCount: recommended });
      log.info(`Step 5 NOTIFY: sent ${attachments.length} attachment(s)`);
    } catch (err) {
      return await failAt("notify", err);
    }

    // ── Step 6: Mark processed ────────────────────────────────────
    progress(`[5/5] Updating processed ids...`);
    const added = await deps.processedIds.append(papers.map(p => p.id), date);
    log.info(`Step 6 PROCESSED: marked ${added} new IDs (${papers.length} considered)`);

    await deps.stateStore?.setLastRun(now.toISOString());

    log.info(`=== Daily digest END date=${date} recommended=${recommended} ===`);
    progress(`Done: ${recommended} recommended paper(s) sent`);

    return {
      status: "sent",
      date,
      fetched: fetched.length,
      fresh: papers.length,
      recommended,
      categories,
      attachments
    };
  } finally {
    if (deps.writer) {
      try {
        await deps.writer.appendLogWithRotation(
          `${settings.logFolder}/runs.log`,
          log.lines.join("\n") + "\n",
          RUN_LOG_MAX_BYTES
        );
      } catch (err) {
        logger.error("Failed to write run log", err);
      }
    }
  }
}
