import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';

export interface TextChunk {
  text: string;
  index: number;
}

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export const chunkText = async (text: string, { chunkSize, chunkOverlap }: ChunkOptions): Promise<TextChunk[]> => {
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize,
    chunkOverlap,
    separators: ['\n\n', '\n', '. ', ' ', ''],
  });

  const docs = await splitter.createDocuments([text]);

  return docs
    .map((doc) => doc.pageContent.trim())
    .filter((content) => content.length > 0)
    .map((content, index) => ({ text: content, index }));
};
