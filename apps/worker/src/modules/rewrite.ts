import OpenAI from 'openai';

export interface TextGenerator {
  generate(prompt: string): Promise<string | null>;
}

export interface RewriteOptions {
  model: string;
  baseURL: string;
}

// Talks to Gemini through its OpenAI-compatible endpoint.
export class RewriteModule implements TextGenerator {
  private openai: OpenAI;
  private readonly model: string;

  constructor(apiKey: string, options: RewriteOptions) {
    this.openai = new OpenAI({
      apiKey: apiKey,
      baseURL: options.baseURL,
      maxRetries: 0,
    });
    this.model = options.model;
  }

  async generate(prompt: string): Promise<string | null> {
    try {
      console.log(`Requesting rewrite from ${this.model} (${prompt.length} chars)`);

      const completion = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          {
            role: 'user',
            content: prompt
          }
        ],
      });

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new Error(`No content generated from ${this.model}`);
      }

      return content;
    } catch (error) {
      console.warn('⚠️ Failed to generate events:', error instanceof Error ? error.message : error);
      return null;
    }
  }
}
