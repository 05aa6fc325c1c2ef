import { Hono } from 'hono';
import type { StyleProfile } from '@tonecraft/shared';
import type { ServiceRegistry } from '../registry.js';
import { createNotFoundError, createServiceUnavailableError, errorMessage } from '../lib/errors.js';
import { profileFromPayload, profileToPayload } from '../profile/levels.js';
import { toSnakeKeys } from '../utils/serialize.js';
import { parseBody } from '../utils/validate.js';
import { FeedbackRequestSchema } from './schemas.js';

export const createFeedbackRoutes = ({ feedback, preferences }: ServiceRegistry) => {
  const routes = new Hono();

  // Body profile first, then the stored one, then empty
  const resolveProfile = async (userId: string | undefined, fromBody: StyleProfile | undefined): Promise<StyleProfile> => {
    if (fromBody) return fromBody;
    if (!userId || !preferences.available) return {};
    try {
      return (await preferences.handle.loadProfile(userId)) ?? {};
    } catch (err) {
      console.warn(`[Feedback] Could not load profile for ${userId}: ${errorMessage(err)}`);
      return {};
    }
  };

  routes.post('/', async (c) => {
    const body = await parseBody(c, FeedbackRequestSchema);
    const fromBody = body.userProfile ? profileFromPayload(body.userProfile) : undefined;
    const profile = await resolveProfile(body.userId, fromBody);
    const userId = body.userId ?? profile.userId;

    const outcome = await feedback.processFeedback(
      body.feedbackText,
      userId ? { ...profile, userId } : profile,
      body.rating,
      body.selectedVariant,
    );

    return c.json(toSnakeKeys({ ...outcome, updatedProfile: profileToPayload(outcome.updatedProfile) }));
  });

  routes.get('/stats/:userId', async (c) => {
    if (!preferences.available) throw createServiceUnavailableError('Preference store', preferences.reason);
    const userId = c.req.param('userId');
    const stats = await preferences.handle.getFeedbackStats(userId);
    if (!stats) throw createNotFoundError(`Statistics for user '${userId}'`);
    return c.json(toSnakeKeys(stats));
  });

  return routes;
};
