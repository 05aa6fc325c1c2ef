import type {
  NegativePreferenceKey,
  NegativePreferenceLevel,
  NegativePreferences,
  StyleProfile,
  StyleTrait,
  StyleVariant,
} from '@tonecraft/shared';
import { DEFAULT_LEVEL, resolveLevels, STYLE_TRAITS } from '../profile/levels.js';

/** Builds style instruction strings from a profile. */
export interface PromptTemplateService {
  buildConversionPrompts(
    profile: StyleProfile,
    context: string,
    negatives?: NegativePreferences,
  ): Record<StyleVariant, string>;
}

const CONTEXT_DESCRIPTIONS: Record<string, string> = {
  business: 'a business communication with colleagues or clients',
  report: 'a formal report or official document',
  personal: 'a personal message to someone the writer knows',
  casual: 'a casual chat between friends',
  email: 'an email',
  academic: 'an academic or scholarly text',
};

const DEFAULT_CONTEXT_DESCRIPTION = 'everyday written communication';

const TRAIT_LABELS: Record<StyleTrait, string> = {
  formality: 'Formality',
  friendliness: 'Friendliness',
  emotion: 'Emotional expressiveness',
  directness: 'Directness',
};

type Band = 'low' | 'moderate' | 'high';

const TRAIT_BANDS: Record<StyleTrait, Record<Band, string>> = {
  formality: {
    low: 'casual, conversational wording',
    moderate: 'polite but relaxed wording',
    high: 'formal, professional wording',
  },
  friendliness: {
    low: 'reserved and matter-of-fact',
    moderate: 'approachable',
    high: 'warm and friendly',
  },
  emotion: {
    low: 'emotionally neutral',
    moderate: 'lightly expressive',
    high: 'emotionally expressive',
  },
  directness: {
    low: 'indirect, with softened requests',
    moderate: 'balanced between tact and clarity',
    high: 'direct and to the point',
  },
};

const VARIANT_INSTRUCTIONS: Record<StyleVariant, string> = {
  direct: 'Write a DIRECT version: lead with the main point, use short declarative sentences, and leave out hedging.',
  gentle: 'Write a GENTLE version: soften requests, acknowledge the reader, and use considerate, cushioning phrases.',
  neutral: 'Write a NEUTRAL version: keep an even, balanced tone that is neither blunt nor overly soft.',
};

// lenient switches add no constraint
const NEGATIVE_CLAUSES: Record<NegativePreferenceKey, Partial<Record<NegativePreferenceLevel, string>>> = {
  avoidFloweryLanguage: {
    strict: 'Never use flowery or ornamental language.',
    moderate: 'Keep decorative language to a minimum.',
  },
  avoidRepetitiveWords: {
    strict: 'Do not repeat the same word or phrase.',
    moderate: 'Avoid noticeable repetition of words.',
  },
  commaUsageStyle: {
    strict: 'Use as few commas as possible.',
    moderate: 'Do not overuse commas.',
  },
  contentOverFormat: {
    strict: 'Focus entirely on content and add no formatting.',
    moderate: 'Prefer substance over formatting.',
  },
  bulletPointUsage: {
    strict: 'Do not use bullet points.',
    moderate: 'Use bullet points only when listing three or more items.',
  },
  emoticonUsage: {
    strict: 'Do not use emoticons or emoji.',
    moderate: 'Use emoticons sparingly, at most one.',
  },
};

const NEGATIVE_KEYS: readonly NegativePreferenceKey[] = [
  'avoidFloweryLanguage',
  'avoidRepetitiveWords',
  'commaUsageStyle',
  'contentOverFormat',
  'bulletPointUsage',
  'emoticonUsage',
];

const band = (level: number): Band => {
  if (level <= 3) return 'low';
  if (level <= 6) return 'moderate';
  return 'high';
};

export const describeContext = (context: string): string =>
  CONTEXT_DESCRIPTIONS[context] ?? DEFAULT_CONTEXT_DESCRIPTION;

export const negativeConstraints = (negatives: NegativePreferences): string[] => {
  const clauses: string[] = [];
  for (const key of NEGATIVE_KEYS) {
    const level = negatives[key];
    const clause = level ? NEGATIVE_CLAUSES[key][level] : undefined;
    if (clause) clauses.push(clause);
  }
  for (const custom of negatives.customNegativePrompts ?? []) {
    const trimmed = custom.trim();
    if (trimmed) clauses.push(trimmed);
  }
  return clauses;
};

export const createPromptTemplateService = (): PromptTemplateService => ({
  buildConversionPrompts: (profile, context, negatives) => {
    const levels = resolveLevels(profile, DEFAULT_LEVEL);
    const toneLines = STYLE_TRAITS.map(
      (trait) => `- ${TRAIT_LABELS[trait]}: ${levels[trait]}/10 (${TRAIT_BANDS[trait][band(levels[trait])]})`,
    );
    const constraints = [
      ...negativeConstraints(negatives ?? profile.negativePreferences ?? {}),
      'Keep the original meaning and language of the text.',
    ].map((clause) => `- ${clause}`);

    const build = (variant: StyleVariant): string => [
      `You are rewriting a message for ${describeContext(context)}.`,
      '',
      'Target tone:',
      ...toneLines,
      '',
      VARIANT_INSTRUCTIONS[variant],
      '',
      'Constraints:',
      ...constraints,
      '',
      'Return only the rewritten text.',
    ].join('\n');

    return {
      direct: build('direct'),
      gentle: build('gentle'),
      neutral: build('neutral'),
    };
  },
});
