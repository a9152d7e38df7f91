import { ALERT_ACTION, ALERT_TITLE, buildAlertMessage, escapeHtml, groupByUrl, TRUNCATION_MARKER } from '../lib/alert';
import { ThreatMatch } from '../lib/types';

describe('buildAlertMessage', () => {
  test('groups types per URL, sorted, with the raw match count', () => {
    const matches: ThreatMatch[] = [
      { url: 'a.com', threatType: 'SOCIAL_ENGINEERING' },
      { url: 'a.com', threatType: 'MALWARE' },
      { url: 'b.com', threatType: 'MALWARE' },
    ];
    expect(buildAlertMessage(matches, 3).split('\n')).toEqual([
      ALERT_TITLE,
      'Matches: 3 (checked 3)',
      '• <code>a.com</code> → MALWARE, SOCIAL_ENGINEERING',
      '• <code>b.com</code> → MALWARE',
      ALERT_ACTION,
    ]);
  });

  test('deduplicates repeated types for a URL', () => {
    const matches: ThreatMatch[] = [
      { url: 'a.com', threatType: 'MALWARE' },
      { url: 'a.com', threatType: 'MALWARE' },
    ];
    const lines = buildAlertMessage(matches, 10).split('\n');
    expect(lines[1]).toBe('Matches: 2 (checked 10)');
    expect(lines[2]).toBe('• <code>a.com</code> → MALWARE');
  });

  test('keeps first-seen URL order', () => {
    const matches: ThreatMatch[] = [
      { url: 'z.com', threatType: 'MALWARE' },
      { url: 'a.com', threatType: 'MALWARE' },
      { url: 'z.com', threatType: 'UNWANTED_SOFTWARE' },
    ];
    expect(Array.from(groupByUrl(matches).keys())).toEqual(['z.com', 'a.com']);
  });

  test('caps at 20 URL lines followed by a truncation marker', () => {
    const matches: ThreatMatch[] = Array.from({ length: 25 }, (_, i) => ({ url: `site${i}.test`, threatType: 'MALWARE' }));
    const lines = buildAlertMessage(matches, 25).split('\n');

    expect(lines.filter((l) => l.startsWith('• '))).toHaveLength(20);
    expect(lines[21]).toBe('• <code>site19.test</code> → MALWARE');
    expect(lines[22]).toBe(TRUNCATION_MARKER);
    expect(lines[23]).toBe(ALERT_ACTION);
    expect(lines).toHaveLength(24);
  });

  test('does not add a marker when exactly at the cap', () => {
    const matches: ThreatMatch[] = Array.from({ length: 20 }, (_, i) => ({ url: `site${i}.test`, threatType: 'MALWARE' }));
    expect(buildAlertMessage(matches, 20)).not.toContain(TRUNCATION_MARKER);
  });

  test('respects a custom cap', () => {
    const matches: ThreatMatch[] = Array.from({ length: 3 }, (_, i) => ({ url: `site${i}.test`, threatType: 'MALWARE' }));
    const lines = buildAlertMessage(matches, 3, { maxUrls: 1 }).split('\n');
    expect(lines).toEqual([ALERT_TITLE, 'Matches: 3 (checked 3)', '• <code>site0.test</code> → MALWARE', TRUNCATION_MARKER, ALERT_ACTION]);
  });

  test('escapes HTML in URLs', () => {
    const lines = buildAlertMessage([{ url: 'http://x.test/?a=1&b=<2>', threatType: 'MALWARE' }], 1).split('\n');
    expect(lines[2]).toBe('• <code>http://x.test/?a=1&amp;b=&lt;2&gt;</code> → MALWARE');
  });
});

describe('escapeHtml', () => {
  test('escapes ampersands before angle brackets', () => {
    expect(escapeHtml('&lt;')).toBe('&amp;lt;');
    expect(escapeHtml('a<b>c')).toBe('a&lt;b&gt;c');
  });
});
