import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

export function createClientId(): string {
  return `client_${Date.now()}_${crypto.randomBytes(6).toString('hex')}`;
}

/** Keeps the identity stable across restarts of the watcher process. */
export async function getOrCreateClientId(storePath: string): Promise<string> {
  try {
    const txt = await fs.readFile(storePath, 'utf8');
    const parsed: unknown = JSON.parse(txt);
    if (typeof parsed === 'object' && parsed !== null && 'clientId' in parsed && typeof parsed.clientId === 'string' && parsed.clientId) {
      return parsed.clientId;
    }
  } catch (error) {
    if (!(error instanceof SyntaxError) && !(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
  }
  const clientId = createClientId();
  await fs.mkdir(path.dirname(storePath), { recursive: true });
  await fs.writeFile(storePath, JSON.stringify({ clientId }, null, 2));
  return clientId;
}
