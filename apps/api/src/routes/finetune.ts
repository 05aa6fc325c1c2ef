import { Hono } from 'hono';
import type { ServiceRegistry } from '../registry.js';
import { createServiceUnavailableError } from '../lib/errors.js';
import { profileFromPayload } from '../profile/levels.js';
import { toSnakeKeys } from '../utils/serialize.js';
import { parseBody } from '../utils/validate.js';
import { ForcedConvertRequestSchema, FormalConvertRequestSchema } from './schemas.js';

export const createFinetuneRoutes = ({ pipeline }: ServiceRegistry) => {
  const routes = new Hono();

  const requirePipeline = () => {
    if (!pipeline.available) throw createServiceUnavailableError('Formal conversion', pipeline.reason);
    return pipeline.handle;
  };

  routes.post('/convert', async (c) => {
    const formal = requirePipeline();
    const body = await parseBody(c, FormalConvertRequestSchema);
    const result = await formal.convert(
      body.text,
      profileFromPayload(body.userProfile),
      body.context,
      body.forceConvert,
      { signal: c.req.raw.signal },
    );
    return c.json(toSnakeKeys(result));
  });

  routes.post('/convert/business', async (c) => {
    const formal = requirePipeline();
    const body = await parseBody(c, ForcedConvertRequestSchema);
    const result = await formal.convertToBusiness(body.text, profileFromPayload(body.userProfile), {
      signal: c.req.raw.signal,
    });
    return c.json(toSnakeKeys(result));
  });

  routes.post('/convert/report', async (c) => {
    const formal = requirePipeline();
    const body = await parseBody(c, ForcedConvertRequestSchema);
    const result = await formal.convertToReport(body.text, profileFromPayload(body.userProfile), {
      signal: c.req.raw.signal,
    });
    return c.json(toSnakeKeys(result));
  });

  routes.get('/status', (c) => {
    if (!pipeline.available) {
      return c.json({ available: false, reason: pipeline.reason });
    }
    return c.json(toSnakeKeys({ available: true, ...pipeline.handle.getStatus() }));
  });

  return routes;
};
