/**
 * Composer Module
 *
 * Turns each distilled topic into one post. A topic whose model call fails
 * still produces a post: its body is an error sentinel, so the failure stays
 * visible in the stored session while the remaining topics are composed.
 */

import { createLogger, type Logger } from '../logging/index.js';
import type { TextGenerator } from '../llm/index.js';
import { loadPromptTemplate, renderTemplate } from '../prompts/index.js';
import type { SqliteCacheStore } from '../storage/index.js';
import type { ComposedPost, ComposedPostDraft, ProductContext, SessionId } from '../types/index.js';

export const ERROR_SENTINEL_PREFIX = '#Error:';

export function errorSentinel(message: string): string {
  return `${ERROR_SENTINEL_PREFIX} ${message}`;
}

export function isErrorSentinel(postBody: string): boolean {
  return postBody.startsWith('#Error');
}

const POST_SECTION = /\*\*LinkedIn Post:\*\*\s*([\s\S]*?)(?=\s*\*\*(?:Twitter|Facebook|LinkedIn) Post:\*\*|$)/;

/**
 * Pull the post out of a reply. Replies without the section marker are used whole.
 */
export function extractPostText(reply: string): string {
  const match = POST_SECTION.exec(reply);
  return (match?.[1] ?? reply).trim();
}

export async function buildCompositionPrompt(
  topic: string,
  talkingPoints: readonly string[],
  product: ProductContext,
  templatePath?: string
): Promise<string> {
  const template = await loadPromptTemplate('compose-post', templatePath);
  return renderTemplate(template, {
    topic,
    talking_points: talkingPoints.length > 0 ? talkingPoints.map((point) => `- ${point}`).join('\n') : '- (none)',
    product_name: product.name,
    product_description: product.description,
    product_features: product.features ? `Key product features:\n${product.features.trim()}` : '',
  });
}

export interface ComposeInput {
  topics: readonly string[];
  talkingPoints: readonly string[];
  product: ProductContext;
  generator: TextGenerator;
  logger?: Logger;
  templatePath?: string;
}

/**
 * Compose one post for a topic. Never throws.
 */
export async function composePost(
  topic: string,
  input: Omit<ComposeInput, 'topics'>
): Promise<ComposedPostDraft> {
  const logger = input.logger ?? createLogger('composer');

  try {
    const prompt = await buildCompositionPrompt(topic, input.talkingPoints, input.product, input.templatePath);
    const result = await input.generator.generate(prompt);

    if (!result.success) {
      logger.error('Composition call failed', { topic, kind: result.error.kind, error: result.error.message });
      return { topic, postBody: errorSentinel(`${result.error.kind}: ${result.error.message}`), rawResponse: null };
    }

    const postBody = extractPostText(result.data.text);
    if (postBody === '') {
      logger.warn('Composition reply contained no post text', { topic });
      return { topic, postBody: errorSentinel('Post not found in model reply'), rawResponse: result.data.text };
    }
    return { topic, postBody, rawResponse: result.data.text };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Composition failed', { topic, error: message });
    return { topic, postBody: errorSentinel(message), rawResponse: null };
  }
}

/**
 * Compose a post per topic, in order
 */
export async function composePosts(input: ComposeInput): Promise<ComposedPostDraft[]> {
  const drafts: ComposedPostDraft[] = [];
  for (const topic of input.topics) {
    drafts.push(await composePost(topic, input));
  }
  return drafts;
}

/**
 * Compose and store posts for a session. Each post is saved as soon as it is
 * composed, so earlier posts survive a later failure.
 */
export async function composeSessionPosts(
  sessionId: SessionId,
  input: ComposeInput & { store: Pick<SqliteCacheStore, 'saveComposedPosts'> }
): Promise<ComposedPost[]> {
  const logger = input.logger ?? createLogger('composer');
  const saved: ComposedPost[] = [];

  for (const [index, topic] of input.topics.entries()) {
    logger.info('Composing post', { sessionId, topic: index + 1, of: input.topics.length });
    const draft = await composePost(topic, input);
    saved.push(...input.store.saveComposedPosts(sessionId, [draft]));
  }

  const failed = saved.filter((post) => isErrorSentinel(post.postBody)).length;
  logger.info('Composition complete', { sessionId, posts: saved.length, failed });
  return saved;
}
