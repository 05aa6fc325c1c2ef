import { Hono } from 'hono';
import type { ServiceRegistry } from '../registry.js';
import { createNotFoundError, createServiceUnavailableError } from '../lib/errors.js';
import { profileFromPayload, profileToPayload } from '../profile/levels.js';
import { parseBody } from '../utils/validate.js';
import { NegativePreferencesSchema, SaveProfileRequestSchema } from './schemas.js';

// Profiles go out in the same flat camelCase shape they come in
export const createProfileRoutes = ({ preferences }: ServiceRegistry) => {
  const routes = new Hono();

  const requireStore = () => {
    if (!preferences.available) throw createServiceUnavailableError('Preference store', preferences.reason);
    return preferences.handle;
  };

  routes.get('/:userId', async (c) => {
    const store = requireStore();
    const userId = c.req.param('userId');
    const profile = await store.loadProfile(userId);
    if (!profile) throw createNotFoundError(`Profile for user '${userId}'`);
    return c.json(profileToPayload(profile));
  });

  routes.post('/', async (c) => {
    const store = requireStore();
    const body = await parseBody(c, SaveProfileRequestSchema);
    const saved = await store.saveProfile(body.userId, profileFromPayload(body));
    return c.json(profileToPayload(saved), 201);
  });

  routes.get('/:userId/negative-preferences', async (c) => {
    const store = requireStore();
    const userId = c.req.param('userId');
    const preferences = await store.loadNegativePreferences(userId);
    if (!preferences) throw createNotFoundError(`Negative preferences for user '${userId}'`);
    return c.json(preferences);
  });

  routes.put('/:userId/negative-preferences', async (c) => {
    const store = requireStore();
    const body = await parseBody(c, NegativePreferencesSchema);
    const saved = await store.saveNegativePreferences(c.req.param('userId'), body);
    return c.json(saved);
  });

  return routes;
};
