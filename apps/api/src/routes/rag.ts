import { resolve } from 'node:path';
import { Hono } from 'hono';
import type { DocumentIngestResponse, RagStatusResponse } from '@tonecraft/shared';
import type { ServiceRegistry } from '../registry.js';
import { createNotFoundError, createServiceUnavailableError, errorMessage } from '../lib/errors.js';
import { folderExists } from '../ingestion/documents.js';
import { profileFromPayload } from '../profile/levels.js';
import { toSnakeKeys } from '../utils/serialize.js';
import { parseBody } from '../utils/validate.js';
import {
  IngestRequestSchema,
  RagAskRequestSchema,
  SuggestExpressionsRequestSchema,
  TextRequestSchema,
} from './schemas.js';

export const createRagRoutes = ({ rag, ingestion, documentIndex }: ServiceRegistry) => {
  const routes = new Hono();

  const requireRag = () => {
    if (!rag.available) throw createServiceUnavailableError('Document Q&A', rag.reason);
    return rag.handle;
  };

  routes.post('/ask', async (c) => {
    const generator = requireRag();
    const body = await parseBody(c, RagAskRequestSchema);
    const signal = c.req.raw.signal;

    // Variants need a profile to style against; without one, answer plainly
    const result = body.useStyles && body.userProfile
      ? await generator.askWithStyles(
          body.query,
          profileFromPayload(body.userProfile),
          body.context || 'personal',
          { signal },
        )
      : await generator.ask(body.query, body.context, { signal });

    return c.json(toSnakeKeys(result));
  });

  routes.post('/ingest', async (c) => {
    if (!ingestion.available) throw createServiceUnavailableError('Document ingestion', ingestion.reason);
    const body = await parseBody(c, IngestRequestSchema);
    const folder = resolve(body.folderPath);
    if (!(await folderExists(folder))) throw createNotFoundError(`Document folder '${body.folderPath}'`);

    try {
      const summary = await ingestion.handle.ingestFolder(folder);
      if (summary.documentsProcessed === 0) {
        const response: DocumentIngestResponse = {
          success: false,
          documents_processed: 0,
          chunks_stored: 0,
          message: 'Document indexing failed.',
          error: 'No .txt or .md documents with content were found.',
        };
        return c.json(response);
      }

      if (documentIndex.available) documentIndex.handle.reload();
      const response: DocumentIngestResponse = {
        success: true,
        documents_processed: summary.documentsProcessed,
        chunks_stored: summary.chunksStored,
        message: 'Document indexing completed.',
      };
      return c.json(response);
    } catch (err) {
      console.error('[RAG] Ingestion failed:', errorMessage(err));
      const response: DocumentIngestResponse = {
        success: false,
        documents_processed: 0,
        chunks_stored: 0,
        message: 'Document indexing failed.',
        error: `Error occurred during document indexing: ${errorMessage(err)}`,
      };
      return c.json(response, 500);
    }
  });

  routes.get('/status', async (c) => {
    if (!rag.available) {
      const response: RagStatusResponse = { rag_status: 'not_ready', doc_count: 0, services_available: false };
      return c.json(response);
    }
    const status = await rag.handle.getStatus();
    const response: RagStatusResponse = {
      rag_status: status.ragStatus,
      doc_count: status.docCount,
      services_available: status.servicesAvailable,
    };
    return c.json(response);
  });

  routes.post('/analyze-grammar', async (c) => {
    const generator = requireRag();
    const body = await parseBody(c, TextRequestSchema);
    const result = await generator.analyzeGrammar(body.text, { signal: c.req.raw.signal });
    return c.json(toSnakeKeys(result));
  });

  routes.post('/suggest-expressions', async (c) => {
    const generator = requireRag();
    const body = await parseBody(c, SuggestExpressionsRequestSchema);
    const result = await generator.suggestExpressions(body.text, body.contextType, { signal: c.req.raw.signal });
    return c.json(toSnakeKeys(result));
  });

  return routes;
};
