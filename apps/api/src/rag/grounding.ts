import type { RetrievedPassage, SourceCitation } from '@tonecraft/shared';

const PREVIEW_LENGTH = 100;
const RAG_CONTEXT_LENGTH = 300;

const truncate = (text: string, length: number): string =>
  text.length > length ? `${text.slice(0, length)}...` : text;

export const buildGroundingBlock = (passages: readonly RetrievedPassage[]): string =>
  passages
    .map((passage, i) => `[Reference Document ${i + 1}] (${passage.source}):\n${passage.content}`)
    .join('\n\n');

export const toCitations = (passages: readonly RetrievedPassage[]): SourceCitation[] =>
  passages.map((passage) => ({
    rank: passage.rank,
    source: passage.source,
    content: truncate(passage.content, PREVIEW_LENGTH),
  }));

export const ragContextPreview = (block: string): string => truncate(block, RAG_CONTEXT_LENGTH);

export const buildStyledQuestion = (query: string, block: string): string =>
  `Question: ${query}\n\nReference Documents:\n${block}`;

export const withContext = (query: string, context?: string): string =>
  context && context.trim() ? `Context: ${context}\n\nQuestion: ${query}` : query;
