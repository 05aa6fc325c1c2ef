import type { StyleLevels, StyleVariant } from '@tonecraft/shared';
import { clampLevel, DEFAULT_LEVEL } from '../profile/levels.js';

export interface RatedSelection {
  selectedVariant: StyleVariant;
  rating: number;
}

type AdaptedTrait = 'directness' | 'friendliness';

const ADAPTED_TRAITS: readonly AdaptedTrait[] = ['directness', 'friendliness'];

// Where each variant pulls the adapted traits
const VARIANT_TARGETS: Record<StyleVariant, Record<AdaptedTrait, number>> = {
  direct: { directness: 8, friendliness: 4 },
  neutral: { directness: 5, friendliness: 5 },
  gentle: { directness: 2, friendliness: 8 },
};

const DECAY = 0.8;
const LEARNING_RATE = 0.5;

/**
 * New session levels for directness and friendliness from recent feedback.
 * `history` is newest first; a rating of 3 carries no weight, below 3 pushes away
 * from the chosen variant's target.
 */
export const adaptSessionLevels = (
  base: Partial<StyleLevels>,
  history: readonly RatedSelection[],
): Partial<Pick<StyleLevels, AdaptedTrait>> => {
  const adapted: Partial<Pick<StyleLevels, AdaptedTrait>> = {};

  for (const trait of ADAPTED_TRAITS) {
    const start = base[trait] ?? DEFAULT_LEVEL;
    let pull = 0;
    let totalWeight = 0;

    history.forEach((entry, i) => {
      const weight = (entry.rating - 3) * DECAY ** i;
      pull += weight * (VARIANT_TARGETS[entry.selectedVariant][trait] - start);
      totalWeight += Math.abs(weight);
    });

    if (totalWeight === 0) continue;
    const shifted = start + (LEARNING_RATE * pull) / totalWeight;
    adapted[trait] = clampLevel(Math.round(shifted * 10) / 10);
  }

  return adapted;
};
