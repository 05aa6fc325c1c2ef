import { z } from 'zod';

const baseLevel = z.number().int().min(1).max(10);
const sessionLevel = z.number().min(1).max(10);
const negativeLevel = z.enum(['strict', 'moderate', 'lenient']);

export const StyleVariantSchema = z.enum(['direct', 'gentle', 'neutral']);

export const NegativePreferencesSchema = z.object({
  avoidFloweryLanguage: negativeLevel.optional(),
  avoidRepetitiveWords: negativeLevel.optional(),
  commaUsageStyle: negativeLevel.optional(),
  contentOverFormat: negativeLevel.optional(),
  bulletPointUsage: negativeLevel.optional(),
  emoticonUsage: negativeLevel.optional(),
  customNegativePrompts: z.array(z.string()).optional(),
});

export const UserProfileSchema = z.object({
  userId: z.string().min(1).optional(),
  baseFormalityLevel: baseLevel.optional(),
  baseFriendlinessLevel: baseLevel.optional(),
  baseEmotionLevel: baseLevel.optional(),
  baseDirectnessLevel: baseLevel.optional(),
  sessionFormalityLevel: sessionLevel.optional(),
  sessionFriendlinessLevel: sessionLevel.optional(),
  sessionEmotionLevel: sessionLevel.optional(),
  sessionDirectnessLevel: sessionLevel.optional(),
  negativePreferences: NegativePreferencesSchema.optional(),
  formalDocumentMode: z.boolean().optional(),
});

const text = z.string().trim().min(1, 'text is required');

export const ConvertRequestSchema = z.object({
  text,
  userProfile: UserProfileSchema.default({}),
  context: z.string().min(1).default('personal'),
  negativePreferences: NegativePreferencesSchema.optional(),
});

export const FormalConvertRequestSchema = z.object({
  text,
  userProfile: UserProfileSchema.default({}),
  context: z.string().min(1).default('business'),
  forceConvert: z.boolean().default(false),
});

export const ForcedConvertRequestSchema = z.object({
  text,
  userProfile: UserProfileSchema.default({}),
});

export const RagAskRequestSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  context: z.string().optional(),
  useStyles: z.boolean().default(false),
  userProfile: UserProfileSchema.optional(),
});

export const IngestRequestSchema = z.object({
  folderPath: z.string().trim().min(1, 'folderPath is required'),
});

export const TextRequestSchema = z.object({ text });

export const SuggestExpressionsRequestSchema = z.object({
  text,
  contextType: z.string().min(1).default('business'),
});

export const FeedbackRequestSchema = z.object({
  userId: z.string().min(1).optional(),
  feedbackText: z.string().default(''),
  rating: z.number().int().min(1).max(5).optional(),
  selectedVariant: StyleVariantSchema.default('neutral'),
  userProfile: UserProfileSchema.optional(),
});

export const SaveProfileRequestSchema = UserProfileSchema.extend({
  userId: z.string().min(1),
});
