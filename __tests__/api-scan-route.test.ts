jest.mock('next/server', () => ({
  NextResponse: {
    json: (body: unknown, init?: { status?: number }) => ({ body, status: init?.status || 200 }),
  },
}));

jest.mock('../lib/redisAdapter', () => ({
  getRedisClient: jest.fn().mockResolvedValue(null),
}));

jest.mock('../lib/scan', () => ({
  ...jest.requireActual<typeof import('../lib/scan')>('../lib/scan'),
  runScan: jest.fn(),
}));

import type { NextRequest } from 'next/server';
import { GET } from '../app/api/scan/route';
import { CONFIG } from '../lib/config';
import { acquireRunLock } from '../lib/runLock';
import { emptySummary, runScan } from '../lib/scan';

const mockRunScan = runScan as jest.MockedFunction<typeof runScan>;

// Only `headers` is read by the handler.
function makeRequest(authorization?: string): NextRequest {
  return { headers: new Headers(authorization ? { authorization } : {}) } as unknown as NextRequest;
}

describe('app/api/scan/route', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    CONFIG.SAFE_BROWSING.API_KEY = 'test-key';
    CONFIG.CRON_SECRET = 'test-secret';
    mockRunScan.mockResolvedValue({ ...emptySummary(), totalChecked: 3, batches: 1 });
  });

  test('returns 401 without the cron secret', async () => {
    const res = await GET(makeRequest('Bearer wrong'));
    expect(res.status).toBe(401);
    expect(mockRunScan).not.toHaveBeenCalled();
  });

  test('runs a scan and returns its summary', async () => {
    const res = await GET(makeRequest('Bearer test-secret'));
    expect(res.status).toBe(200);
    expect(res.body).toEqual(expect.objectContaining({
      summary: expect.objectContaining({ totalChecked: 3, batches: 1 }),
    }));
    expect(mockRunScan).toHaveBeenCalledTimes(1);
  });

  test('returns 409 while another run holds the lock', async () => {
    const lock = await acquireRunLock(1000);
    const res = await GET(makeRequest('Bearer test-secret'));
    await lock?.release();

    expect(res.status).toBe(409);
    expect(mockRunScan).not.toHaveBeenCalled();
  });

  test('returns 500 when the API key is missing', async () => {
    CONFIG.SAFE_BROWSING.API_KEY = undefined;
    const res = await GET(makeRequest('Bearer test-secret'));
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'Set GSB_API_KEY environment variable and re-run.' });
    expect(mockRunScan).not.toHaveBeenCalled();
  });

  test('reports a crashed run as 500', async () => {
    mockRunScan.mockRejectedValueOnce(new Error('EACCES'));
    const res = await GET(makeRequest('Bearer test-secret'));
    expect(res.status).toBe(500);
  });
});
