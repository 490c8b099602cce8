/**
 * Distiller Module
 *
 * Reduces research and social records to topics and talking points. The model
 * is asked for a single JSON object but replies are free text: the object may
 * be fenced, or surrounded by commentary. extractJsonObject() recovers it by
 * matching braces first and parsing second.
 */

import { z } from 'zod';
import { isJsonObject } from '../http/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import type { TextGenerator } from '../llm/index.js';
import { loadPromptTemplate, renderTemplate } from '../prompts/index.js';
import type { SqliteCacheStore } from '../storage/index.js';
import type {
  DistillationResult,
  DistilledContent,
  ProductContext,
  ProviderFailure,
  SessionId,
  SourceRecord,
} from '../types/index.js';

// ============================================================================
// Extraction
// ============================================================================

const DistilledContentSchema = z.object({
  distilled_topics: z.array(z.string()).default([]),
  talking_points: z.array(z.string()).default([]),
});

export function emptyDistillation(): DistilledContent {
  return { distilled_topics: [], talking_points: [] };
}

/**
 * Remove a leading ``` / ```json line and a trailing ``` if present
 */
export function stripCodeFence(text: string): string {
  let cleaned = text.trim();
  const opening = /^```[a-zA-Z]*[ \t]*\r?\n?/.exec(cleaned);
  if (opening) {
    cleaned = cleaned.slice(opening[0].length);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

/**
 * Find the first balanced {...} in the text and parse it.
 * Braces inside string literals do not count toward depth.
 *
 * @returns the parsed object, or null when there is no `{`, the braces never
 * balance, or the candidate is not valid JSON
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const cleaned = stripCodeFence(text);
  const start = cleaned.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  let end = -1;

  for (let i = start; i < cleaned.length; i++) {
    const char = cleaned[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        end = i;
        break;
      }
    }
  }

  if (end === -1) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned.slice(start, end + 1));
  } catch {
    return null;
  }
  return isJsonObject(parsed) ? parsed : null;
}

/**
 * Read topics and talking points from a model reply.
 * Any failure yields the empty result and logs the raw text.
 */
export function parseDistillation(text: string, logger: Logger = createLogger('distiller')): DistilledContent {
  const extracted = extractJsonObject(text);
  if (extracted === null) {
    logger.warn('No JSON object found in distillation reply', { raw: text });
    return emptyDistillation();
  }

  const validated = DistilledContentSchema.safeParse(extracted);
  if (!validated.success) {
    logger.warn('Distillation reply has unexpected shape', {
      raw: text,
      issues: validated.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    });
    return emptyDistillation();
  }
  return validated.data;
}

// ============================================================================
// Prompt
// ============================================================================

export function formatRecordsForPrompt(records: readonly SourceRecord[]): string {
  return records.map((record, i) => `Result ${i + 1}: URL: ${record.url}, Snippet: ${record.snippet}`).join('\n');
}

export async function buildDistillationPrompt(
  records: readonly SourceRecord[],
  product: ProductContext,
  templatePath?: string
): Promise<string> {
  const template = await loadPromptTemplate('distill-topics', templatePath);
  return renderTemplate(template, {
    records: formatRecordsForPrompt(records),
    product_name: product.name,
    product_description: product.description,
    product_features: product.features ? `Key product features:\n${product.features.trim()}` : '',
  });
}

// ============================================================================
// Stage
// ============================================================================

export interface DistillInput {
  sessionId: SessionId;
  records: readonly SourceRecord[];
  product: ProductContext;
  generator: TextGenerator;
  store: Pick<SqliteCacheStore, 'saveDistillation'>;
  logger?: Logger;
  templatePath?: string;
}

export interface DistillOutcome {
  content: DistilledContent;
  /** Stored row; null when no reply was obtained */
  saved: DistillationResult | null;
  failure?: ProviderFailure;
}

/**
 * Distill records for a session and persist the result.
 * Never throws: failures produce the empty distillation.
 */
export async function distillRecords(input: DistillInput): Promise<DistillOutcome> {
  const logger = input.logger ?? createLogger('distiller');

  let prompt: string;
  try {
    prompt = await buildDistillationPrompt(input.records, input.product, input.templatePath);
  } catch (error) {
    logger.error('Failed to load distillation prompt', {
      error: error instanceof Error ? error.message : String(error),
    });
    return { content: emptyDistillation(), saved: null };
  }

  logger.info('Distilling records', { sessionId: input.sessionId, records: input.records.length });
  let content: DistilledContent;
  let saved: DistillationResult;
  try {
    const result = await input.generator.generate(prompt);
    if (!result.success) {
      logger.error('Distillation call failed', { sessionId: input.sessionId, kind: result.error.kind });
      return { content: emptyDistillation(), saved: null, failure: result.error };
    }

    content = parseDistillation(result.data.text, logger);
    saved = input.store.saveDistillation(input.sessionId, content, result.data.text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Distillation failed', { sessionId: input.sessionId, error: message });
    return { content: emptyDistillation(), saved: null, failure: { kind: 'network', message } };
  }

  logger.info('Distillation complete', {
    sessionId: input.sessionId,
    topics: content.distilled_topics.length,
    talkingPoints: content.talking_points.length,
  });
  return { content, saved };
}
