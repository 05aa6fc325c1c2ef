import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';

export interface SourceDocument {
  source: string;
  text: string;
}

const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set(['.txt', '.md']);

export const isSupportedDocument = (fileName: string): boolean =>
  SUPPORTED_EXTENSIONS.has(extname(fileName).toLowerCase());

export const folderExists = async (folder: string): Promise<boolean> => {
  try {
    return (await stat(folder)).isDirectory();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
    throw err;
  }
};

/** Reads every .txt/.md file under `folder`, recursively. `source` is the path relative to it. */
export const readDocuments = async (folder: string): Promise<SourceDocument[]> => {
  const names = (await readdir(folder, { recursive: true })).filter(isSupportedDocument).sort();

  const documents: SourceDocument[] = [];
  for (const name of names) {
    const file = join(folder, name);
    if (!(await stat(file)).isFile()) continue;
    const text = await readFile(file, 'utf8');
    if (text.trim()) documents.push({ source: name, text });
  }
  return documents;
};
