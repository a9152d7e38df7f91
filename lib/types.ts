export const THREAT_TYPES = ['MALWARE', 'SOCIAL_ENGINEERING', 'UNWANTED_SOFTWARE'] as const;

export type KnownThreatType = (typeof THREAT_TYPES)[number];
// The API may report types outside the requested set; they are kept verbatim.
export type ThreatType = KnownThreatType | (string & {});

export interface ThreatMatch {
  url: string;
  threatType: ThreatType;
  platformType?: string;
}

export type IncompleteReason = 'http_status' | 'invalid_body' | 'exhausted';

export interface ThreatCheckResult {
  matches: ThreatMatch[];
  // false when the batch could not be checked; matches is then empty
  complete: boolean;
  reason?: IncompleteReason;
  // `matches` entries exactly as the API returned them, for logging
  raw?: unknown[];
}

export interface RunSummary {
  totalChecked: number;
  batches: number;
  batchesWithMatches: number;
  incompleteBatches: number;
  totalMatches: number;
  notificationsSent: number;
}
