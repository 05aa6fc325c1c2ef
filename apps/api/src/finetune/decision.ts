import type { RoutingDecision, StyleProfile } from '@tonecraft/shared';
import { CONSERVATIVE_LEVEL, resolveLevel } from '../profile/levels.js';

const FORMAL_CONTEXTS: ReadonlySet<string> = new Set(['business', 'report']);

/**
 * Decide whether a request goes through the fine-tuned formal pipeline.
 * Rules are checked in order; the first match wins.
 */
export const decide = (
  profile: StyleProfile,
  context: string,
  forceConvert: boolean,
): RoutingDecision => {
  if (forceConvert) return { escalate: true, reason: 'user_explicit_request' };

  if (profile.formalDocumentMode) return { escalate: true, reason: 'auto_condition' };

  const formality = resolveLevel(profile, 'formality', CONSERVATIVE_LEVEL);

  if (formality >= 5) return { escalate: true, reason: 'auto_condition' };

  if (formality >= 4 && FORMAL_CONTEXTS.has(context)) {
    return { escalate: true, reason: 'auto_condition' };
  }

  return { escalate: false, reason: 'condition_not_met' };
};
