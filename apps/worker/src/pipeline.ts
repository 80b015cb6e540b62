import type { EventRecord, PipelineResult, PipelineStatus } from '@since-sean-left/shared';
import type { NewsCollector } from './modules/ingest.js';
import type { TextGenerator } from './modules/rewrite.js';
import { buildPrompt, formatUtcDate } from './modules/prompt.js';
import { parseModelResponse } from './modules/validate.js';
import { extractExistingTitles, injectEvents } from './modules/publish.js';

export interface PipelineConfig {
  feeds: readonly string[];
  lookbackHours: number;
  stylePrompt: string;
  anchor: string;
}

export interface PipelineDeps {
  collector: NewsCollector;
  generator: TextGenerator;
}

function unchanged(status: PipelineStatus, document: string): PipelineResult {
  return { status, document, events: [] };
}

/**
 * Runs one fetch → prompt → generate → validate → inject pass over the
 * document text. Nothing is written here; the caller persists
 * `result.document` when `result.status` is `'updated'`.
 */
export async function runPipeline(
  document: string,
  deps: PipelineDeps,
  config: PipelineConfig,
  now: Date = new Date()
): Promise<PipelineResult> {
  const existingTitles = extractExistingTitles(document);
  const today = formatUtcDate(now);

  console.log('📡 Fetching RSS feeds...');
  const newsItems = await deps.collector.collectRecentItems(config.feeds, config.lookbackHours, now);
  console.log(`📈 Found ${newsItems.length} recent news items`);

  if (newsItems.length === 0) {
    console.log('No recent news items found. Skipping.');
    return unchanged('no-news', document);
  }

  const prompt = buildPrompt(config.stylePrompt, { today, existingTitles, newsItems });

  console.log(`🤖 Sending ${newsItems.length} items to the model...`);
  const raw = await deps.generator.generate(prompt);

  if (raw === null) {
    console.log('No response from the model. Skipping.');
    return unchanged('generation-failed', document);
  }

  const outcome = parseModelResponse(raw);

  if (outcome.kind === 'none') {
    console.log('Model found nothing newsworthy. Skipping.');
    return unchanged('nothing-newsworthy', document);
  }

  if (outcome.kind === 'malformed') {
    console.log('Model response could not be used. Skipping.');
    return unchanged('malformed-response', document);
  }

  const events: EventRecord[] = outcome.events;
  if (events.length === 0) {
    console.log('Model returned no valid events. Skipping.');
    return unchanged('no-valid-events', document);
  }

  if (!document.includes(config.anchor)) {
    console.warn(`⚠️ Anchor "${config.anchor}" not found in document. Skipping.`);
    return unchanged('anchor-missing', document);
  }

  console.log(`✅ Generated ${events.length} new events:`);
  for (const event of events) {
    console.log(`  - ${event.title}`);
  }

  return {
    status: 'updated',
    document: injectEvents(document, events, config.anchor),
    events
  };
}
