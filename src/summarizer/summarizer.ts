/**
 * Story Summarizer
 *
 * Generates a short summary and topic tags for a batch of stories with one
 * OpenAI chat completion in JSON mode.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { EnrichmentCallError, errorMessage } from '../utils/errors.js';
import type { EnrichmentRequest, EnrichmentResult, EnrichmentService } from '../types/index.js';

const MAX_TAGS_PER_STORY = 8;
const MAX_TAG_LENGTH = 40;

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/**
 * Narrow seam over the OpenAI SDK; returns the raw message content
 */
export interface CompletionClient {
  complete(messages: ChatMessage[], model: string): Promise<string | null>;
}

export interface OpenAiSettings {
  apiKey: string;
  timeoutMs: number;
  maxRetries: number;
}

/**
 * Create OpenAI-backed completion client
 */
export function createOpenAiClient(settings: OpenAiSettings): CompletionClient {
  const client = new OpenAI({
    apiKey: settings.apiKey,
    timeout: settings.timeoutMs,
    maxRetries: settings.maxRetries,
  });

  return {
    async complete(messages, model) {
      const response = await client.chat.completions.create({
        model,
        messages: messages.map((message) =>
          message.role === 'system'
            ? { role: 'system' as const, content: message.content }
            : { role: 'user' as const, content: message.content }
        ),
        temperature: 0.3,
        max_tokens: 1500,
        response_format: { type: 'json_object' },
      });

      logger.debug({ model, tokensUsed: response.usage?.total_tokens ?? 0 }, 'Completion received');
      return response.choices[0]?.message?.content ?? null;
    },
  };
}

/**
 * System prompt for story enrichment
 */
const SYSTEM_PROMPT = `You summarize and tag technology news stories.

For every story you receive, produce:
1. A concise 2-3 sentence summary of what the story is about
2. Between 2 and 6 tags:
   - 1-2 broad categories (Tech, Business, Science, Society)
   - 1-3 topics (AI/ML, Web, Security, Startups, Open Source, Hardware, ...)
   - optionally 1-2 major companies or products, using broad names (OpenAI, not GPT-4)

Respond in JSON with this exact format:
{
  "stories": [
    { "id": <story id>, "summary": "...", "tags": ["...", "..."] }
  ]
}

Include every story id you were given exactly once. Write in English.`;

/**
 * User prompt listing the batch, one block per story
 */
export function buildBatchPrompt(items: EnrichmentRequest[]): string {
  const blocks = items.map(
    (item) => `id: ${item.storyId}\ntitle: ${item.title}\nurl: ${item.url ?? 'No URL provided'}`
  );
  return `Summarize and tag these ${items.length} stories:\n\n${blocks.join('\n\n')}`;
}

const responseSchema = z.object({
  stories: z.array(
    z.object({
      id: z.coerce.number().int(),
      summary: z.string().trim().min(1),
      tags: z.array(z.string()).default([]),
    })
  ),
});

/**
 * Trim, drop empty or oversized tags and collapse case-insensitive duplicates
 */
export function normalizeTags(tags: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const raw of tags) {
    const tag = raw.trim().replace(/\s+/g, ' ');
    const key = tag.toLowerCase();
    if (!tag || tag.length > MAX_TAG_LENGTH || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(tag);
    if (result.length === MAX_TAGS_PER_STORY) {
      break;
    }
  }

  return result;
}

/**
 * Validate a completion and keep only entries for requested stories
 *
 * @throws Error when the content is not JSON or does not match the schema
 */
export function parseEnrichmentResponse(content: string, requested: EnrichmentRequest[]): EnrichmentResult[] {
  const parsed = responseSchema.parse(JSON.parse(content));
  const wanted = new Set(requested.map((item) => item.storyId));
  const results = new Map<number, EnrichmentResult>();

  for (const entry of parsed.stories) {
    if (!wanted.has(entry.id) || results.has(entry.id)) {
      continue;
    }
    results.set(entry.id, { storyId: entry.id, summary: entry.summary, tags: normalizeTags(entry.tags) });
  }

  return [...results.values()];
}

export class OpenAiEnrichmentService implements EnrichmentService {
  constructor(
    private readonly client: CompletionClient,
    readonly model: string
  ) {}

  async enrichBatch(items: EnrichmentRequest[]): Promise<EnrichmentResult[]> {
    if (items.length === 0) {
      return [];
    }

    const storyIds = items.map((item) => item.storyId);
    logger.debug({ storyIds, model: this.model }, 'Requesting enrichment');

    let content: string | null;
    try {
      content = await this.client.complete(
        [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildBatchPrompt(items) },
        ],
        this.model
      );
    } catch (error) {
      throw new EnrichmentCallError(storyIds, `Enrichment call failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!content) {
      throw new EnrichmentCallError(storyIds, 'Empty response from OpenAI');
    }

    try {
      return parseEnrichmentResponse(content, items);
    } catch (error) {
      throw new EnrichmentCallError(storyIds, `Invalid enrichment response: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
