import { promises as fs } from 'fs';

const SCHEME_RE = /^https?:\/\//;

/** Prefix `http://` onto entries that carry no http(s) scheme. */
export function normalizeUrl(entry: string): string {
  return SCHEME_RE.test(entry) ? entry : `http://${entry}`;
}

// fs errors may come from another realm, so no `instanceof Error` here.
function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read one domain or URL per line. Blank lines are skipped, order and duplicates
 * are kept. A missing file reads as an empty list.
 */
export async function readUrls(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw err;
  }
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .map(normalizeUrl);
}

export default readUrls;
