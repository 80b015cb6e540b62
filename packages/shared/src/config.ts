import { z } from 'zod';

export const DEFAULT_FEEDS = [
  'https://feeds.bbci.co.uk/news/politics/rss.xml',
  'https://www.theguardian.com/politics/rss',
  'https://feeds.skynews.com/feeds/rss/politics.xml'
];

const ConfigSchema = z.object({
  gemini_api_key: z.string().min(1),
  feeds: z.string().transform((str: string) => str.split(',').map((s: string) => s.trim()).filter(Boolean)),
  lookback_hours: z.coerce.number().positive().default(8),
  model: z.string().min(1).default('gemini-2.0-flash'),
  gemini_base_url: z.string().url().default('https://generativelanguage.googleapis.com/v1beta/openai/'),
  document_path: z.string().min(1).optional()
});

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const env = {
    gemini_api_key: source.GEMINI_API_KEY,
    feeds: source.FEEDS || DEFAULT_FEEDS.join(','),
    lookback_hours: source.LOOKBACK_HOURS || undefined,
    model: source.GEMINI_MODEL || undefined,
    gemini_base_url: source.GEMINI_BASE_URL || undefined,
    document_path: source.DOCUMENT_PATH || undefined
  };

  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    console.error('Configuration validation failed:', result.error);
    const fields = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid configuration (${fields}). Please check your environment variables.`);
  }

  return result.data;
}

export type AppConfig = z.infer<typeof ConfigSchema>;
