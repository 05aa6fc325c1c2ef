import type {
  NegativePreferences,
  StyleLevels,
  StyleProfile,
  StyleTrait,
  StyleVariant,
  UserProfilePayload,
} from '@tonecraft/shared';

export const STYLE_TRAITS: readonly StyleTrait[] = ['formality', 'friendliness', 'emotion', 'directness'];

export const MIN_LEVEL = 1;
export const MAX_LEVEL = 10;

// Documented default for questionnaire and stored profiles
export const DEFAULT_LEVEL = 5;

// Routing and refinement read a missing level as 3 so an empty profile never auto-escalates
export const CONSERVATIVE_LEVEL = 3;

export const clampLevel = (level: number): number =>
  Math.min(MAX_LEVEL, Math.max(MIN_LEVEL, level));

/** Effective level for a trait: session override, then base, then `fallback`. */
export const resolveLevel = (
  profile: StyleProfile,
  trait: StyleTrait,
  fallback: number = DEFAULT_LEVEL,
): number => profile.session?.[trait] ?? profile.base?.[trait] ?? fallback;

export const resolveLevels = (profile: StyleProfile, fallback: number = DEFAULT_LEVEL): StyleLevels => ({
  formality: resolveLevel(profile, 'formality', fallback),
  friendliness: resolveLevel(profile, 'friendliness', fallback),
  emotion: resolveLevel(profile, 'emotion', fallback),
  directness: resolveLevel(profile, 'directness', fallback),
});

export const styleForDirectness = (directness: number): StyleVariant => {
  if (directness >= 4) return 'direct';
  if (directness <= 2) return 'gentle';
  return 'neutral';
};

/** Request-level overrides win over the profile's stored switches. */
export const mergeNegativePreferences = (
  fromProfile: NegativePreferences | undefined,
  overrides: NegativePreferences | undefined,
): NegativePreferences => {
  const merged: NegativePreferences = { ...fromProfile, ...overrides };
  const custom = [
    ...(fromProfile?.customNegativePrompts ?? []),
    ...(overrides?.customNegativePrompts ?? []),
  ];
  if (custom.length > 0) merged.customNegativePrompts = [...new Set(custom)];
  return merged;
};

const pick = (
  values: Record<StyleTrait, number | undefined>,
): Partial<StyleLevels> | undefined => {
  const result: Partial<StyleLevels> = {};
  for (const trait of STYLE_TRAITS) {
    const value = values[trait];
    if (value !== undefined) result[trait] = value;
  }
  return Object.keys(result).length > 0 ? result : undefined;
};

export const profileFromPayload = (payload: UserProfilePayload): StyleProfile => {
  const profile: StyleProfile = {};
  if (payload.userId !== undefined) profile.userId = payload.userId;

  const base = pick({
    formality: payload.baseFormalityLevel,
    friendliness: payload.baseFriendlinessLevel,
    emotion: payload.baseEmotionLevel,
    directness: payload.baseDirectnessLevel,
  });
  if (base) profile.base = base;

  const session = pick({
    formality: payload.sessionFormalityLevel,
    friendliness: payload.sessionFriendlinessLevel,
    emotion: payload.sessionEmotionLevel,
    directness: payload.sessionDirectnessLevel,
  });
  if (session) profile.session = session;

  if (payload.negativePreferences) profile.negativePreferences = payload.negativePreferences;
  if (payload.formalDocumentMode !== undefined) profile.formalDocumentMode = payload.formalDocumentMode;
  return profile;
};

export const profileToPayload = (profile: StyleProfile): UserProfilePayload => ({
  userId: profile.userId,
  baseFormalityLevel: profile.base?.formality,
  baseFriendlinessLevel: profile.base?.friendliness,
  baseEmotionLevel: profile.base?.emotion,
  baseDirectnessLevel: profile.base?.directness,
  sessionFormalityLevel: profile.session?.formality,
  sessionFriendlinessLevel: profile.session?.friendliness,
  sessionEmotionLevel: profile.session?.emotion,
  sessionDirectnessLevel: profile.session?.directness,
  negativePreferences: profile.negativePreferences,
  formalDocumentMode: profile.formalDocumentMode,
});
