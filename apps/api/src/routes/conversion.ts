import { Hono } from 'hono';
import type { ServiceRegistry } from '../registry.js';
import { createServiceUnavailableError, errorMessage } from '../lib/errors.js';
import { profileFromPayload } from '../profile/levels.js';
import { toSnakeKeys } from '../utils/serialize.js';
import { parseBody } from '../utils/validate.js';
import { ConvertRequestSchema } from './schemas.js';

export const createConversionRoutes = ({ engine, preferences }: ServiceRegistry) => {
  const routes = new Hono();

  routes.post('/convert', async (c) => {
    if (!engine.available) throw createServiceUnavailableError('Style conversion', engine.reason);

    const body = await parseBody(c, ConvertRequestSchema);
    const profile = profileFromPayload(body.userProfile);

    const result = await engine.handle.convertText(
      body.text,
      profile,
      body.context,
      body.negativePreferences,
      { signal: c.req.raw.signal },
    );

    const userId = profile.userId;
    if (result.success && userId && preferences.available) {
      try {
        await preferences.handle.recordConversion({
          userId,
          originalText: body.text,
          convertedTexts: result.convertedTexts,
          context: body.context,
          modelUsed: result.metadata.modelUsed,
        });
      } catch (err) {
        console.warn(`[Conversion] Could not record history for ${userId}: ${errorMessage(err)}`);
      }
    }

    return c.json(toSnakeKeys({ ...result, originalText: body.text }));
  });

  return routes;
};
