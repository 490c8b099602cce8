#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * Usage:
 *   content-pipeline run --topic <text> --product-name <name> --product-description <text>
 *                        [--query <text>] [--session <id>] [--new] [--refresh research,social,...]
 *                        [--skip-research] [--skip-social] [--publish] [--interval <minutes>]
 *   content-pipeline sessions
 *   content-pipeline show <session-id>
 *   content-pipeline export <session-id>|--all [--format json|csv] [--out <path>] [--no-raw]
 *   content-pipeline stats [<session-id>]
 *   content-pipeline publish <session-id> [--interval <minutes>]
 *   content-pipeline drafts [--filter threads|tweets]
 *   content-pipeline delete <session-id>
 *   content-pipeline db info|vacuum|analyze
 */

import { config as loadDotenv } from 'dotenv';
import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ZodError } from 'zod';
import { isErrorSentinel } from './composer/index.js';
import { ConfigurationError, loadConfig, type AppConfig } from './config/index.js';
import { createTextGenerator } from './llm/index.js';
import { createLogger, type Logger, type LogLevel } from './logging/index.js';
import { SessionNotFoundError, runPipeline, type PipelineInput } from './pipeline/index.js';
import {
  createPublishingClient,
  getDraftStats,
  publishComposedPosts,
  type ContentFilter,
  type PublishReport,
  type PublishingClient,
} from './publishing/index.js';
import {
  analyzeEngagement,
  analyzePostLengths,
  exportAllSessions,
  exportSession,
  exportSessionCsv,
  renderAnalytics,
  renderOverview,
  renderSessionList,
  renderSessionMarkdown,
  summarizeAllSessions,
  summarizeSession,
} from './renderers/index.js';
import { createResearchClient } from './research/index.js';
import { createSocialSearchClient } from './social/index.js';
import { createCacheStore, type SqliteCacheStore } from './storage/index.js';
import type { PipelineStage } from './types/index.js';

// ============================================================================
// Argument parsing
// ============================================================================

const BOOLEAN_FLAGS = new Set(['new', 'publish', 'no-raw', 'all', 'skip-research', 'skip-social', 'help']);
const STAGE_NAMES: readonly PipelineStage[] = ['research', 'social', 'distillation', 'composition'];

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Map<string, string | true>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq !== -1) {
      flags.set(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }
    const next = argv[i + 1];
    if (!BOOLEAN_FLAGS.has(body) && next !== undefined && !next.startsWith('--')) {
      flags.set(body, next);
      i++;
    } else {
      flags.set(body, true);
    }
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

function flagString(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function flagNumber(args: ParsedArgs, name: string): number | undefined {
  const value = flagString(args, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new UsageError(`--${name} expects a non-negative integer, received "${value}"`);
  }
  return parsed;
}

export function parseRefresh(value: string | undefined): PipelineStage[] {
  if (!value) return [];
  const stages: PipelineStage[] = [];
  for (const name of value.split(',').map((part) => part.trim()).filter((part) => part !== '')) {
    const stage = STAGE_NAMES.find((candidate) => candidate === name);
    if (!stage) {
      throw new UsageError(`Unknown stage "${name}" (expected one of ${STAGE_NAMES.join(', ')})`);
    }
    stages.push(stage);
  }
  return stages;
}

function sessionIdArg(args: ParsedArgs): number {
  const raw = args.positionals[0];
  const id = raw === undefined ? NaN : Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new UsageError('A numeric session id is required');
  }
  return id;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const USAGE = `Usage:
  content-pipeline run --topic <text> --product-name <name> --product-description <text>
                       [--query <text>] [--session <id>] [--new] [--refresh <stages>]
                       [--skip-research] [--skip-social] [--publish] [--interval <minutes>]
  content-pipeline sessions
  content-pipeline show <session-id>
  content-pipeline export <session-id>|--all [--format json|csv] [--out <path>] [--no-raw]
  content-pipeline stats [<session-id>]
  content-pipeline publish <session-id> [--interval <minutes>]
  content-pipeline drafts [--filter threads|tweets]
  content-pipeline delete <session-id>
  content-pipeline db info|vacuum|analyze
`;

// ============================================================================
// Commands
// ============================================================================

/**
 * Publishing client as the CLI uses it: drafts plus a credential check
 */
export type CliPublisher = PublishingClient & { checkHealth(): Promise<boolean> };

export interface CliDependencies {
  createPublisher?: (config: AppConfig, logger: Logger) => CliPublisher;
}

interface CommandContext {
  args: ParsedArgs;
  config: AppConfig;
  store: SqliteCacheStore;
  logger: Logger;
  logLevel: LogLevel;
  out: (text: string) => void;
  createPublisher: (config: AppConfig, logger: Logger) => CliPublisher;
}

const defaultPublisher = (config: AppConfig, logger: Logger): CliPublisher => createPublishingClient(config, { logger });

function loadProductFeatures(config: AppConfig, logger: Logger): string | undefined {
  if (!config.productFeaturesPath) return undefined;
  try {
    return readFileSync(config.productFeaturesPath, 'utf-8');
  } catch (error) {
    logger.warn('Product features file could not be read', {
      path: config.productFeaturesPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

function formatReports(reports: readonly PublishReport[]): string {
  return reports
    .map((report) => {
      const detail =
        report.status === 'created'
          ? `draft ${report.draft?.id ?? '?'}${report.scheduledFor ? ` scheduled ${report.scheduledFor}` : ''}${report.draft?.shareUrl ? ` ${report.draft.shareUrl}` : ''}`
          : report.failure
            ? `${report.failure.kind}: ${report.failure.message}`
            : report.reason ?? '';
      return `[${report.status}] ${report.topic}: ${detail}`;
    })
    .join('\n');
}

async function runCommand(ctx: CommandContext): Promise<number> {
  const { args, config, store, logLevel, out } = ctx;
  const topic = flagString(args, 'topic');
  const productName = flagString(args, 'product-name');
  const productDescription = flagString(args, 'product-description');
  if (!topic || !productName || !productDescription) {
    throw new UsageError('run requires --topic, --product-name and --product-description');
  }

  const runResearch = config.flags.runResearch && !args.flags.has('skip-research');
  const runSocialSearch = config.flags.runSocialSearch && !args.flags.has('skip-social');
  const publish = args.flags.has('publish');
  const sessionId = flagNumber(args, 'session');
  const socialQuery = flagString(args, 'query');
  const features = loadProductFeatures(config, ctx.logger);
  const scheduleIntervalMinutes = flagNumber(args, 'interval');

  const input: PipelineInput = {
    topic,
    product: { name: productName, description: productDescription, ...(features ? { features } : {}) },
    ...(socialQuery ? { socialQuery } : {}),
    ...(sessionId !== undefined ? { sessionId } : {}),
    forceNewSession: config.flags.forceNewSession || args.flags.has('new'),
    reuseLatestSession: config.flags.reuseLatestSession,
    runResearch,
    runSocialSearch,
    refresh: parseRefresh(flagString(args, 'refresh')),
    publish,
  };

  const outcome = await runPipeline(input, {
    store,
    generator: createTextGenerator(config, { logger: createLogger('llm', logLevel) }),
    researchClient: runResearch ? createResearchClient(config, { logger: createLogger('research', logLevel) }) : undefined,
    socialClient: runSocialSearch
      ? createSocialSearchClient(config, { logger: createLogger('social', logLevel) })
      : undefined,
    publishingClient: publish
      ? createPublishingClient(config, { logger: createLogger('publishing', logLevel) })
      : undefined,
    publishOptions: scheduleIntervalMinutes !== undefined ? { scheduleIntervalMinutes } : {},
    logger: createLogger('pipeline', logLevel),
  });

  out(`Session ${outcome.session.id} (${outcome.reusedSession ? 'reused' : 'new'}): ${outcome.status}\n`);
  for (const stage of outcome.stages) {
    const source = stage.skipped ? 'skipped' : stage.fromCache ? 'cached' : 'fetched';
    out(`  ${stage.stage}: ${stage.count} (${source})\n`);
  }
  outcome.posts.forEach((post, i) => {
    const marker = isErrorSentinel(post.postBody) ? ' [failed]' : '';
    out(`\n--- Post ${i + 1}${marker}: ${post.topic}\n${post.postBody}\n`);
  });
  if (outcome.publishReports.length > 0) {
    out(`\n${formatReports(outcome.publishReports)}\n`);
  }
  return outcome.status === 'completed' ? 0 : 2;
}

async function publishCommand(ctx: CommandContext): Promise<number> {
  const sessionId = sessionIdArg(ctx.args);
  if (!ctx.store.getSession(sessionId)) throw new SessionNotFoundError(sessionId);

  const posts = ctx.store.getComposedPosts(sessionId);
  if (posts.length === 0) {
    ctx.out(`Session ${sessionId} has no composed posts.\n`);
    return 2;
  }

  const client = ctx.createPublisher(ctx.config, createLogger('publishing', ctx.logLevel));
  if (!(await client.checkHealth())) {
    ctx.out('Publishing API check failed; verify TYPEFULLY_API_KEY.\n');
    return 2;
  }
  const interval = flagNumber(ctx.args, 'interval');
  const reports = await publishComposedPosts(posts, client, {
    ...(interval !== undefined ? { scheduleIntervalMinutes: interval } : {}),
    logger: ctx.logger,
  });
  ctx.out(`${formatReports(reports)}\n`);
  return reports.some((report) => report.status === 'failed' || report.status === 'deferred') ? 2 : 0;
}

async function draftsCommand(ctx: CommandContext): Promise<number> {
  const filterValue = flagString(ctx.args, 'filter');
  let filter: ContentFilter | undefined;
  if (filterValue === 'threads' || filterValue === 'tweets') {
    filter = filterValue;
  } else if (filterValue !== undefined) {
    throw new UsageError('--filter expects "threads" or "tweets"');
  }

  const client = ctx.createPublisher(ctx.config, createLogger('publishing', ctx.logLevel));
  const stats = await getDraftStats(client, filter);
  if (!stats.success) {
    ctx.out(`Draft listing failed: ${stats.error.kind}: ${stats.error.message}\n`);
    return 2;
  }

  for (const [label, drafts] of [
    ['Recently scheduled', stats.data.scheduled],
    ['Recently published', stats.data.published],
  ] as const) {
    ctx.out(`${label} (${drafts.length}):\n`);
    for (const draft of drafts) {
      const when = draft.scheduledDate ?? draft.publishedOn ?? '';
      ctx.out(`  ${draft.id}\t${when}\t${(draft.text ?? '').slice(0, 80)}\n`);
    }
  }
  ctx.out(`Total recent drafts: ${stats.data.totalRecent}\n`);
  return 0;
}

function writeOrPrint(ctx: CommandContext, target: string | undefined, content: string, label: string): void {
  if (target) {
    writeFileSync(target, content, 'utf-8');
    ctx.out(`Exported ${label} to ${target}\n`);
  } else {
    ctx.out(content);
  }
}

function exportCommand(ctx: CommandContext): number {
  const format = flagString(ctx.args, 'format') ?? 'json';
  if (format !== 'json' && format !== 'csv') {
    throw new UsageError('--format expects "json" or "csv"');
  }
  const includeRawResponses = !ctx.args.flags.has('no-raw');
  const target = flagString(ctx.args, 'out');

  if (ctx.args.flags.has('all')) {
    if (format === 'csv') throw new UsageError('CSV export takes a single session id');
    const data = exportAllSessions(ctx.store, { includeRawResponses });
    writeOrPrint(ctx, target, JSON.stringify(data, null, 2) + '\n', `${data.sessions.length} sessions`);
    return 0;
  }

  const sessionId = sessionIdArg(ctx.args);
  if (format === 'json') {
    const data = exportSession(ctx.store, sessionId, { includeRawResponses });
    if (!data) throw new SessionNotFoundError(sessionId);
    writeOrPrint(ctx, target, JSON.stringify(data, null, 2) + '\n', `session ${sessionId}`);
    return 0;
  }

  const documents = exportSessionCsv(ctx.store, sessionId, { includeRawResponses });
  if (!documents) throw new SessionNotFoundError(sessionId);
  if (target) mkdirSync(target, { recursive: true });
  for (const [collection, csv] of Object.entries(documents)) {
    if (csv === undefined) continue;
    const name = `${collection}_session_${sessionId}.csv`;
    if (target) {
      writeOrPrint(ctx, join(target, name), csv, collection);
    } else {
      ctx.out(`# ${name}\n${csv}`);
    }
  }
  return 0;
}

function statsCommand(ctx: CommandContext): number {
  if (ctx.args.positionals.length === 0) {
    ctx.out(renderOverview(summarizeAllSessions(ctx.store)));
    return 0;
  }
  const sessionId = sessionIdArg(ctx.args);
  const engagement = analyzeEngagement(ctx.store, sessionId);
  const lengths = analyzePostLengths(ctx.store, sessionId);
  if (!engagement || !lengths) throw new SessionNotFoundError(sessionId);
  ctx.out(renderAnalytics(engagement, lengths));
  return 0;
}

function dbCommand(ctx: CommandContext): number {
  switch (ctx.args.positionals[0]) {
    case 'info': {
      const info = ctx.store.getDatabaseInfo();
      ctx.out(`Path: ${info.path}\nSize: ${(info.sizeBytes / (1024 * 1024)).toFixed(2)} MB\nSessions: ${info.sessions}\n`);
      return 0;
    }
    case 'vacuum':
      ctx.store.vacuum();
      ctx.out('Database vacuumed\n');
      return 0;
    case 'analyze':
      ctx.store.analyze();
      ctx.out('Database analyzed\n');
      return 0;
    default:
      throw new UsageError('db expects one of: info, vacuum, analyze');
  }
}

async function dispatch(ctx: CommandContext): Promise<number> {
  switch (ctx.args.command) {
    case 'run':
      return runCommand(ctx);
    case 'sessions':
      ctx.out(renderSessionList(ctx.store.getSessions()));
      return 0;
    case 'show': {
      const sessionId = sessionIdArg(ctx.args);
      const summary = summarizeSession(ctx.store, sessionId);
      if (!summary) throw new SessionNotFoundError(sessionId);
      ctx.out(renderSessionMarkdown(summary));
      return 0;
    }
    case 'export':
      return exportCommand(ctx);
    case 'stats':
      return statsCommand(ctx);
    case 'db':
      return dbCommand(ctx);
    case 'publish':
      return publishCommand(ctx);
    case 'drafts':
      return draftsCommand(ctx);
    case 'delete': {
      const sessionId = sessionIdArg(ctx.args);
      if (!ctx.store.deleteSession(sessionId)) throw new SessionNotFoundError(sessionId);
      ctx.out(`Deleted session ${sessionId}\n`);
      return 0;
    }
    default:
      ctx.out(USAGE);
      return ctx.args.command === undefined || ctx.args.command === 'help' ? 0 : 1;
  }
}

/**
 * Run the CLI and return the process exit code
 */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  out: (text: string) => void = (text) => process.stdout.write(text),
  deps: CliDependencies = {}
): Promise<number> {
  const args = parseArgs(argv);
  if (args.flags.has('help')) {
    out(USAGE);
    return 0;
  }

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      out(`Configuration error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const logger = createLogger('cli', config.logLevel);
  const store = createCacheStore(config.databasePath, createLogger('storage', config.logLevel));

  try {
    return await dispatch({
      args,
      config,
      store,
      logger,
      logLevel: config.logLevel,
      out,
      createPublisher: deps.createPublisher ?? defaultPublisher,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      out(`Configuration error: ${error.message}\n`);
      return 1;
    }
    if (error instanceof UsageError || error instanceof SessionNotFoundError) {
      out(`${error.message}\n`);
      return 1;
    }
    if (error instanceof ZodError) {
      out(`Invalid input: ${error.errors.map((e) => e.message).join('; ')}\n`);
      return 1;
    }
    throw error;
  } finally {
    store.close();
  }
}

if (require.main === module) {
  loadDotenv();
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      createLogger('cli').error('Unexpected failure', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      process.exitCode = 1;
    });
}
