import {
  pgTable,
  text,
  boolean,
  timestamp,
  uuid,
  integer,
  real,
  serial,
  jsonb,
  index,
  uniqueIndex,
  vector,
} from 'drizzle-orm/pg-core';
import type { NegativePreferenceLevel, StyleVariant } from '@tonecraft/shared';

// Column width of document_chunks.embedding; the embeddings client requests the same
export const EMBEDDING_DIMENSIONS = 1536;

// ── user_profiles ─────────────────────────────────────────
export const userProfiles = pgTable('user_profiles', {
  id: serial('id').primaryKey(),
  userId: text('user_id').notNull().unique(),
  baseFormalityLevel: integer('base_formality_level').default(5).notNull(),
  baseFriendlinessLevel: integer('base_friendliness_level').default(5).notNull(),
  baseEmotionLevel: integer('base_emotion_level').default(5).notNull(),
  baseDirectnessLevel: integer('base_directness_level').default(5).notNull(),
  sessionFormalityLevel: real('session_formality_level'),
  sessionFriendlinessLevel: real('session_friendliness_level'),
  sessionEmotionLevel: real('session_emotion_level'),
  sessionDirectnessLevel: real('session_directness_level'),
  formalDocumentMode: boolean('formal_document_mode').default(false).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

// ── negative_preferences ──────────────────────────────────
export const negativePreferences = pgTable('negative_preferences', {
  id: serial('id').primaryKey(),
  userId: text('user_id').notNull().unique(),
  avoidFloweryLanguage: text('avoid_flowery_language').$type<NegativePreferenceLevel>().default('moderate').notNull(),
  avoidRepetitiveWords: text('avoid_repetitive_words').$type<NegativePreferenceLevel>().default('moderate').notNull(),
  commaUsageStyle: text('comma_usage_style').$type<NegativePreferenceLevel>().default('moderate').notNull(),
  contentOverFormat: text('content_over_format').$type<NegativePreferenceLevel>().default('moderate').notNull(),
  bulletPointUsage: text('bullet_point_usage').$type<NegativePreferenceLevel>().default('moderate').notNull(),
  emoticonUsage: text('emoticon_usage').$type<NegativePreferenceLevel>().default('strict').notNull(),
  customNegativePrompts: text('custom_negative_prompts').array().default([]).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

// ── conversion_history ────────────────────────────────────
export const conversionHistory = pgTable('conversion_history', {
  id: serial('id').primaryKey(),
  userId: text('user_id').notNull(),
  originalText: text('original_text').notNull(),
  convertedTexts: jsonb('converted_texts').$type<Partial<Record<StyleVariant, string>>>().notNull(),
  context: text('context').default('personal').notNull(),
  modelUsed: text('model_used'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('conversion_history_user_id_idx').on(table.userId),
]);

// ── style_feedback ────────────────────────────────────────
export const styleFeedback = pgTable('style_feedback', {
  id: serial('id').primaryKey(),
  userId: text('user_id').notNull(),
  feedbackText: text('feedback_text').default('').notNull(),
  selectedVariant: text('selected_variant').$type<StyleVariant>().notNull(),
  rating: integer('rating').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('style_feedback_user_id_idx').on(table.userId, table.createdAt),
]);

// ── document_chunks ───────────────────────────────────────
export const documentChunks = pgTable('document_chunks', {
  id: uuid('id').primaryKey().defaultRandom(),
  source: text('source').notNull(),
  chunkIndex: integer('chunk_index').notNull(),
  content: text('content').notNull(),
  embedding: vector('embedding', { dimensions: EMBEDDING_DIMENSIONS }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('document_chunks_embedding_idx').using('hnsw', table.embedding.op('vector_cosine_ops')),
  uniqueIndex('document_chunks_source_chunk_idx').on(table.source, table.chunkIndex),
]);

export type UserProfileRow = typeof userProfiles.$inferSelect;
export type NegativePreferencesRow = typeof negativePreferences.$inferSelect;
