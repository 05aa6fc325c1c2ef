import type { StyleProfile, StyleTrait, StyleVariant } from '@tonecraft/shared';
import { clampLevel, DEFAULT_LEVEL, resolveLevel } from '../profile/levels.js';

export type StyleAdjustments = Partial<Record<StyleTrait, number>>;

interface KeywordRule {
  phrases: readonly string[];
  trait: StyleTrait;
  delta: number;
}

const KEYWORD_RULES: readonly KeywordRule[] = [
  { phrases: ['more formal', 'too casual', 'more polite', 'more professional'], trait: 'formality', delta: 1 },
  { phrases: ['less formal', 'too formal', 'too stiff', 'more casual'], trait: 'formality', delta: -1 },
  { phrases: ['friendlier', 'more friendly', 'warmer', 'too cold'], trait: 'friendliness', delta: 1 },
  { phrases: ['too friendly', 'too familiar', 'less friendly'], trait: 'friendliness', delta: -1 },
  { phrases: ['more emotion', 'more expressive', 'too dry', 'too flat'], trait: 'emotion', delta: 1 },
  { phrases: ['too emotional', 'less emotion', 'too dramatic'], trait: 'emotion', delta: -1 },
  { phrases: ['more direct', 'too vague', 'get to the point', 'too indirect'], trait: 'directness', delta: 1 },
  { phrases: ['too blunt', 'too harsh', 'too direct', 'softer', 'gentler'], trait: 'directness', delta: -1 },
];

const keywordAdjustments = (feedbackText: string): Array<[StyleTrait, number]> => {
  const text = feedbackText.toLowerCase();
  return KEYWORD_RULES
    .filter((rule) => rule.phrases.some((phrase) => text.includes(phrase)))
    .map((rule) => [rule.trait, rule.delta]);
};

const variantAdjustments = (variant: StyleVariant | undefined, rating: number | undefined): Array<[StyleTrait, number]> => {
  if (variant === undefined || rating === undefined) return [];
  if (rating >= 4) {
    if (variant === 'direct') return [['directness', 1]];
    if (variant === 'gentle') return [['friendliness', 1]];
  }
  if (rating <= 2) {
    if (variant === 'direct') return [['directness', -1]];
    if (variant === 'gentle') return [['friendliness', -1]];
  }
  return [];
};

/** Sums keyword and variant/rating deltas per trait. Zero totals are dropped. */
export const feedbackAdjustments = (
  feedbackText: string,
  selectedVariant?: StyleVariant,
  rating?: number,
): StyleAdjustments => {
  const totals: StyleAdjustments = {};
  for (const [trait, delta] of [...keywordAdjustments(feedbackText), ...variantAdjustments(selectedVariant, rating)]) {
    totals[trait] = (totals[trait] ?? 0) + delta;
  }
  for (const [trait, total] of Object.entries(totals)) {
    if (total === 0 && isTrait(trait)) delete totals[trait];
  }
  return totals;
};

const isTrait = (value: string): value is StyleTrait =>
  value === 'formality' || value === 'friendliness' || value === 'emotion' || value === 'directness';

/** Applies deltas onto the session levels, starting from the effective level. */
export const applyAdjustments = (profile: StyleProfile, adjustments: StyleAdjustments): StyleProfile => {
  const session = { ...profile.session };
  for (const [trait, delta] of Object.entries(adjustments)) {
    if (!isTrait(trait) || delta === undefined) continue;
    session[trait] = clampLevel(resolveLevel(profile, trait, DEFAULT_LEVEL) + delta);
  }
  return { ...profile, session };
};
