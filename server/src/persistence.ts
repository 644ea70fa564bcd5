import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { parseSnapshot, type CardStore } from '@vocab-drill/engine';

export const STORE_FILE = 'store.json';

export function storePath(dataDir: string): string {
  return join(dataDir, STORE_FILE);
}

/**
 * Restore the store from its file. Returns false when there is nothing to load.
 */
export async function loadStore(store: CardStore, path: string): Promise<boolean> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }

  const raw: unknown = JSON.parse(contents);
  await store.replaceAll(parseSnapshot(raw));
  console.log('[persistence] restored store from', path);
  return true;
}

// Replaces the file atomically through a temporary sibling of its own
export async function saveStore(store: CardStore, path: string): Promise<void> {
  const snapshot = await store.exportSnapshot();
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${crypto.randomUUID()}.tmp`;
  await writeFile(tmp, JSON.stringify(snapshot), 'utf8');
  await rename(tmp, path);
}

/**
 * Returns a save function that runs one save at a time, in call order. Each
 * caller still gets its own save's outcome.
 */
export function createStoreSaver(store: CardStore, path: string): () => Promise<void> {
  let pending: Promise<void> = Promise.resolve();
  return () => {
    const save = pending.then(() => saveStore(store, path));
    pending = save.catch((error: unknown) => {
      console.error('[persistence] save failed:', error);
    });
    return save;
  };
}
