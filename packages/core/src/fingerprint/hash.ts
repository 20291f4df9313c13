import { createHash } from 'node:crypto';
import { readFile, stat } from 'node:fs/promises';

export function hashBytes(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * SHA-256 of a file's bytes, or null when the path is not a readable regular
 * file.
 */
export async function hashFile(absPath: string): Promise<string | null> {
  try {
    const info = await stat(absPath);
    if (!info.isFile()) {
      return null;
    }
    return hashBytes(await readFile(absPath));
  } catch {
    return null;
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Decode strict UTF-8; null when the bytes are not valid UTF-8. */
export function decodeUtf8(data: Uint8Array): string | null {
  try {
    return utf8.decode(data);
  } catch {
    return null;
  }
}

/** Read a source file as UTF-8 text; null when unreadable or undecodable. */
export async function readSourceText(absPath: string): Promise<string | null> {
  try {
    return decodeUtf8(await readFile(absPath));
  } catch {
    return null;
  }
}
