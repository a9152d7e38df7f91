import { CONFIG, Config, requireApiKey } from './config';
import { errorMessage } from './errors';
import defaultLogger, { Logger } from './logger';
import { fetchWithRetry } from './net/fetchWithRetry';
import { THREAT_TYPES, ThreatCheckResult, ThreatMatch } from './types';

export interface ThreatRequest {
  client: { clientId: string; clientVersion: string };
  threatInfo: {
    threatTypes: string[];
    platformTypes: string[];
    threatEntryTypes: string[];
    threatEntries: Array<{ url: string }>;
  };
}

export interface FindThreatsOptions {
  config?: Config;
  logger?: Logger;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function buildThreatRequest(urls: readonly string[], config: Config = CONFIG): ThreatRequest {
  return {
    client: { clientId: config.SAFE_BROWSING.CLIENT_ID, clientVersion: config.SAFE_BROWSING.CLIENT_VERSION },
    threatInfo: {
      threatTypes: [...THREAT_TYPES],
      platformTypes: ['ANY_PLATFORM'],
      threatEntryTypes: ['URL'],
      threatEntries: urls.map((url) => ({ url })),
    },
  };
}

/**
 * Extract `{ threat: { url }, threatType }` entries from a `threatMatches:find`
 * response. A body without `matches` means nothing matched; a body that is not a
 * JSON object returns `null`.
 */
export function parseMatches(data: unknown): ThreatMatch[] | null {
  if (!isRecord(data)) return null;
  const raw = data.matches;
  if (!Array.isArray(raw)) return [];
  return raw.map((m: unknown) => {
    const rec: Record<string, unknown> = isRecord(m) ? m : {};
    const threat: Record<string, unknown> = isRecord(rec.threat) ? rec.threat : {};
    const match: ThreatMatch = {
      url: typeof threat.url === 'string' ? threat.url : 'unknown',
      threatType: typeof rec.threatType === 'string' ? rec.threatType : 'UNKNOWN',
    };
    if (typeof rec.platformType === 'string') match.platformType = rec.platformType;
    return match;
  });
}

/**
 * Check one batch against the Safe Browsing v4 API.
 *
 * Transient failures are retried by `fetchWithRetry`. Everything else degrades to
 * an empty, `complete: false` result so a failed batch never aborts the run.
 */
export async function findThreats(urls: readonly string[], opts?: FindThreatsOptions): Promise<ThreatCheckResult> {
  const config = opts?.config ?? CONFIG;
  const logger = opts?.logger ?? defaultLogger;
  const sb = config.SAFE_BROWSING;
  const endpoint = `${sb.API_URL}?key=${encodeURIComponent(requireApiKey(config))}`;

  const outcome = await fetchWithRetry(
    endpoint,
    {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(buildThreatRequest(urls, config)),
    },
    { attempts: sb.MAX_ATTEMPTS, backoffMs: sb.BACKOFF_MS, timeoutMs: sb.TIMEOUT_MS, logger, label: 'Safe Browsing request' },
  );
  if (!outcome.ok) return { matches: [], complete: false, reason: 'exhausted' };

  if (outcome.status !== 200) {
    logger.error({ status: outcome.status }, `Unexpected ${outcome.status}: ${outcome.body.slice(0, 300)}`);
    return { matches: [], complete: false, reason: 'http_status' };
  }

  let data: unknown;
  try {
    data = JSON.parse(outcome.body);
  } catch (err) {
    logger.error({ err: errorMessage(err) }, 'Invalid JSON');
    return { matches: [], complete: false, reason: 'invalid_body' };
  }
  const matches = parseMatches(data);
  if (!matches) {
    logger.error({ body: typeof data }, 'Invalid JSON');
    return { matches: [], complete: false, reason: 'invalid_body' };
  }

  logger.info({ urls: urls.length, matches: matches.length, attempts: outcome.attempts }, 'Safe Browsing check ok');
  const raw = isRecord(data) && Array.isArray(data.matches) ? data.matches : [];
  return { matches, complete: true, raw };
}

export default findThreats;
