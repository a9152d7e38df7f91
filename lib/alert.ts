import { ThreatMatch } from './types';

export const ALERT_TITLE = '<b>Safe Browsing ALERT</b>';
export const ALERT_ACTION = 'Action: clean site and request review in Search Console.';
export const TRUNCATION_MARKER = '… (more)';

export interface AlertOptions {
  maxUrls?: number;
}

// Telegram HTML parse mode only needs these three escaped.
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Group matches by URL in first-seen order, with the union of each URL's threat
 * types. Map iteration order is insertion order.
 */
export function groupByUrl(matches: readonly ThreatMatch[]): Map<string, Set<string>> {
  const byUrl = new Map<string, Set<string>>();
  for (const m of matches) {
    let types = byUrl.get(m.url);
    if (!types) {
      types = new Set<string>();
      byUrl.set(m.url, types);
    }
    types.add(m.threatType);
  }
  return byUrl;
}

export function buildAlertMessage(matches: readonly ThreatMatch[], checked: number, opts?: AlertOptions): string {
  const maxUrls = opts?.maxUrls ?? 20;
  const lines = [ALERT_TITLE, `Matches: ${matches.length} (checked ${checked})`];

  let shown = 0;
  for (const [url, types] of groupByUrl(matches)) {
    if (shown >= maxUrls) {
      lines.push(TRUNCATION_MARKER);
      break;
    }
    const sorted = Array.from(types).sort().map(escapeHtml);
    lines.push(`• <code>${escapeHtml(url)}</code> → ${sorted.join(', ')}`);
    shown++;
  }

  lines.push(ALERT_ACTION);
  return lines.join('\n');
}

export default buildAlertMessage;
