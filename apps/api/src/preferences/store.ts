import { desc, eq } from 'drizzle-orm';
import type {
  FeedbackStats,
  NegativePreferences,
  StyleLevels,
  StyleProfile,
  StyleVariant,
} from '@tonecraft/shared';
import type { Database } from '../db/index.js';
import {
  conversionHistory,
  negativePreferences,
  styleFeedback,
  userProfiles,
  type NegativePreferencesRow,
  type UserProfileRow,
} from '../db/schema.js';
import { errorMessage } from '../lib/errors.js';
import { adaptSessionLevels } from './adaptation.js';
import { summarizeFeedback } from './stats.js';

const HISTORY_WINDOW = 20;

export interface ConversionRecord {
  userId: string;
  originalText: string;
  convertedTexts: Partial<Record<StyleVariant, string>>;
  context: string;
  modelUsed: string;
}

/** Persistent per-user tone preferences and feedback. */
export interface PreferenceStore {
  /** Records the feedback and re-derives session levels. `false` when nothing was learned. */
  adaptStyle(userId: string, feedbackText: string, rating: number, selectedVariant: StyleVariant): Promise<boolean>;
  loadProfile(userId: string): Promise<StyleProfile | null>;
  saveProfile(userId: string, profile: StyleProfile): Promise<StyleProfile>;
  loadNegativePreferences(userId: string): Promise<NegativePreferences | null>;
  saveNegativePreferences(userId: string, preferences: NegativePreferences): Promise<NegativePreferences>;
  recordConversion(record: ConversionRecord): Promise<void>;
  getFeedbackStats(userId: string): Promise<FeedbackStats | null>;
}

const baseLevels = (row: UserProfileRow): StyleLevels => ({
  formality: row.baseFormalityLevel,
  friendliness: row.baseFriendlinessLevel,
  emotion: row.baseEmotionLevel,
  directness: row.baseDirectnessLevel,
});

const sessionLevels = (row: UserProfileRow): Partial<StyleLevels> | undefined => {
  const session: Partial<StyleLevels> = {};
  if (row.sessionFormalityLevel !== null) session.formality = row.sessionFormalityLevel;
  if (row.sessionFriendlinessLevel !== null) session.friendliness = row.sessionFriendlinessLevel;
  if (row.sessionEmotionLevel !== null) session.emotion = row.sessionEmotionLevel;
  if (row.sessionDirectnessLevel !== null) session.directness = row.sessionDirectnessLevel;
  return Object.keys(session).length > 0 ? session : undefined;
};

const toNegativePreferences = (row: NegativePreferencesRow): NegativePreferences => ({
  avoidFloweryLanguage: row.avoidFloweryLanguage,
  avoidRepetitiveWords: row.avoidRepetitiveWords,
  commaUsageStyle: row.commaUsageStyle,
  contentOverFormat: row.contentOverFormat,
  bulletPointUsage: row.bulletPointUsage,
  emoticonUsage: row.emoticonUsage,
  customNegativePrompts: row.customNegativePrompts,
});

const toProfile = (row: UserProfileRow, negatives: NegativePreferences | null): StyleProfile => {
  const profile: StyleProfile = {
    userId: row.userId,
    base: baseLevels(row),
    formalDocumentMode: row.formalDocumentMode,
  };
  const session = sessionLevels(row);
  if (session) profile.session = session;
  if (negatives) profile.negativePreferences = negatives;
  return profile;
};

export class DrizzlePreferenceStore implements PreferenceStore {
  constructor(private readonly db: Database) {}

  async adaptStyle(userId: string, feedbackText: string, rating: number, selectedVariant: StyleVariant): Promise<boolean> {
    try {
      await this.db.insert(styleFeedback).values({ userId, feedbackText, rating, selectedVariant });

      const [row] = await this.db.select().from(userProfiles).where(eq(userProfiles.userId, userId)).limit(1);
      if (!row) {
        console.warn(`[Preferences] No stored profile for ${userId}, feedback kept without adaptation`);
        return false;
      }

      const history = await this.db
        .select({ selectedVariant: styleFeedback.selectedVariant, rating: styleFeedback.rating })
        .from(styleFeedback)
        .where(eq(styleFeedback.userId, userId))
        .orderBy(desc(styleFeedback.createdAt), desc(styleFeedback.id))
        .limit(HISTORY_WINDOW);

      const adapted = adaptSessionLevels(baseLevels(row), history);
      if (adapted.directness === undefined && adapted.friendliness === undefined) return false;

      await this.db
        .update(userProfiles)
        .set({
          sessionDirectnessLevel: adapted.directness ?? row.sessionDirectnessLevel,
          sessionFriendlinessLevel: adapted.friendliness ?? row.sessionFriendlinessLevel,
          updatedAt: new Date(),
        })
        .where(eq(userProfiles.userId, userId));

      console.log(`[Preferences] Adapted ${userId}: ${JSON.stringify(adapted)}`);
      return true;
    } catch (err) {
      console.error(`[Preferences] adaptStyle failed for ${userId}:`, errorMessage(err));
      return false;
    }
  }

  async loadProfile(userId: string): Promise<StyleProfile | null> {
    const [row] = await this.db.select().from(userProfiles).where(eq(userProfiles.userId, userId)).limit(1);
    if (!row) return null;
    return toProfile(row, await this.loadNegativePreferences(userId));
  }

  async saveProfile(userId: string, profile: StyleProfile): Promise<StyleProfile> {
    const values = {
      baseFormalityLevel: profile.base?.formality ?? 5,
      baseFriendlinessLevel: profile.base?.friendliness ?? 5,
      baseEmotionLevel: profile.base?.emotion ?? 5,
      baseDirectnessLevel: profile.base?.directness ?? 5,
      sessionFormalityLevel: profile.session?.formality ?? null,
      sessionFriendlinessLevel: profile.session?.friendliness ?? null,
      sessionEmotionLevel: profile.session?.emotion ?? null,
      sessionDirectnessLevel: profile.session?.directness ?? null,
      formalDocumentMode: profile.formalDocumentMode ?? false,
    };

    const [row] = await this.db
      .insert(userProfiles)
      .values({ userId, ...values })
      .onConflictDoUpdate({ target: userProfiles.userId, set: { ...values, updatedAt: new Date() } })
      .returning();

    const negatives = profile.negativePreferences
      ? await this.saveNegativePreferences(userId, profile.negativePreferences)
      : await this.loadNegativePreferences(userId);

    console.log(`[Preferences] Saved profile for ${userId}`);
    return toProfile(row, negatives);
  }

  async loadNegativePreferences(userId: string): Promise<NegativePreferences | null> {
    const [row] = await this.db
      .select()
      .from(negativePreferences)
      .where(eq(negativePreferences.userId, userId))
      .limit(1);
    return row ? toNegativePreferences(row) : null;
  }

  async saveNegativePreferences(userId: string, preferences: NegativePreferences): Promise<NegativePreferences> {
    const { customNegativePrompts, ...levels } = preferences;
    const values = {
      ...levels,
      ...(customNegativePrompts !== undefined && { customNegativePrompts }),
    };

    const [row] = await this.db
      .insert(negativePreferences)
      .values({ userId, ...values })
      .onConflictDoUpdate({ target: negativePreferences.userId, set: { ...values, updatedAt: new Date() } })
      .returning();

    return toNegativePreferences(row);
  }

  async recordConversion(record: ConversionRecord): Promise<void> {
    await this.db.insert(conversionHistory).values(record);
  }

  async getFeedbackStats(userId: string): Promise<FeedbackStats | null> {
    const rows = await this.db
      .select({
        selectedVariant: styleFeedback.selectedVariant,
        rating: styleFeedback.rating,
        createdAt: styleFeedback.createdAt,
      })
      .from(styleFeedback)
      .where(eq(styleFeedback.userId, userId));

    if (rows.length === 0) return null;
    return summarizeFeedback(userId, rows);
  }
}
