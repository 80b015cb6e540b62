import { readFile, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from '@since-sean-left/shared';
import { IngestModule } from './modules/ingest.js';
import { RewriteModule } from './modules/rewrite.js';
import { STYLE_PROMPT } from './modules/prompt.js';
import { EVENTS_ANCHOR } from './modules/publish.js';
import { runPipeline } from './pipeline.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const DEFAULT_DOCUMENT_PATH = resolve(__dirname, '..', '..', '..', 'index.html');

async function main() {
  console.log('🚀 Event generator starting...');

  try {
    const config = loadConfig();
    console.log('✅ Configuration loaded successfully');
    console.log(`📊 Settings: ${config.feeds.length} feeds, lookback: ${config.lookback_hours}h, model: ${config.model}`);

    const documentPath = config.document_path ? resolve(config.document_path) : DEFAULT_DOCUMENT_PATH;
    const document = await readFile(documentPath, 'utf-8');

    const result = await runPipeline(
      document,
      {
        collector: new IngestModule(),
        generator: new RewriteModule(config.gemini_api_key, {
          model: config.model,
          baseURL: config.gemini_base_url
        })
      },
      {
        feeds: config.feeds,
        lookbackHours: config.lookback_hours,
        stylePrompt: STYLE_PROMPT,
        anchor: EVENTS_ANCHOR
      }
    );

    if (result.status !== 'updated') {
      console.log(`🎉 Run finished without changes (${result.status})`);
      return;
    }

    await writeFile(documentPath, result.document, 'utf-8');
    console.log(`🎉 ${documentPath} updated with ${result.events.length} new events`);
  } catch (error) {
    console.error('💥 Event generation failed:', error);
    process.exit(1);
  }
}

main().catch(console.error);
