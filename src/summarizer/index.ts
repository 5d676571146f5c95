/**
 * Summarizer Module
 *
 * OpenAI-powered story summarization and tagging
 */

export {
  OpenAiEnrichmentService,
  createOpenAiClient,
  buildBatchPrompt,
  parseEnrichmentResponse,
  normalizeTags,
  type CompletionClient,
  type ChatMessage,
  type OpenAiSettings,
} from './summarizer.js';

export { EnrichmentStage, type EnrichmentReport } from './enrichment-stage.js';
