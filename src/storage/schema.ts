import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

const now = (): string => new Date().toISOString();

export const sessions = sqliteTable('sessions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionName: text('session_name').notNull(),
  createdAt: text('created_at').notNull().$defaultFn(now),
  topic: text('topic').notNull(),
  productName: text('product_name').notNull(),
  productDescription: text('product_description').notNull(),
});

export const researchResults = sqliteTable('research_results', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionId: integer('session_id')
    .notNull()
    .references(() => sessions.id, { onDelete: 'cascade' }),
  url: text('url').notNull(),
  snippet: text('snippet').notNull(),
  createdAt: text('created_at').notNull().$defaultFn(now),
  rawResponse: text('raw_response'),
});

export const socialResults = sqliteTable('social_results', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionId: integer('session_id')
    .notNull()
    .references(() => sessions.id, { onDelete: 'cascade' }),
  url: text('url').notNull(),
  snippet: text('snippet').notNull(),
  screenName: text('screen_name').notNull(),
  followersCount: integer('followers_count').notNull().default(0),
  favoriteCount: integer('favorite_count').notNull().default(0),
  retweetCount: integer('retweet_count').notNull().default(0),
  replyCount: integer('reply_count').notNull().default(0),
  quoteCount: integer('quote_count').notNull().default(0),
  // Provider's own format, stored as received
  postedAt: text('posted_at'),
  createdAt: text('created_at').notNull().$defaultFn(now),
  rawResponse: text('raw_response'),
});

export const distillationResults = sqliteTable('distillation_results', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionId: integer('session_id')
    .notNull()
    .references(() => sessions.id, { onDelete: 'cascade' }),
  distilledTopics: text('distilled_topics', { mode: 'json' }).$type<string[]>().notNull(),
  talkingPoints: text('talking_points', { mode: 'json' }).$type<string[]>().notNull(),
  rawResponse: text('raw_response'),
  createdAt: text('created_at').notNull().$defaultFn(now),
});

export const composedPosts = sqliteTable('composed_posts', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionId: integer('session_id')
    .notNull()
    .references(() => sessions.id, { onDelete: 'cascade' }),
  topic: text('topic').notNull(),
  postBody: text('post_body').notNull(),
  rawResponse: text('raw_response'),
  createdAt: text('created_at').notNull().$defaultFn(now),
});
