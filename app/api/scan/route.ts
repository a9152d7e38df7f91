import { NextRequest, NextResponse } from 'next/server';
import { randomUUID } from 'crypto';
import { CONFIG, requireApiKey } from '../../../lib/config';
import { ConfigError, errorMessage } from '../../../lib/errors';
import logger from '../../../lib/logger';
import { withRunLock } from '../../../lib/runLock';
import { runScan } from '../../../lib/scan';

export const dynamic = 'force-dynamic';

function isAuthorized(request: NextRequest): boolean {
  if (!CONFIG.CRON_SECRET) return true;
  return request.headers.get('authorization') === `Bearer ${CONFIG.CRON_SECRET}`;
}

/**
 * Trigger one scan run (platform cron). Responds with the run summary.
 */
export async function GET(request: NextRequest) {
  const requestId = randomUUID();

  if (!isAuthorized(request)) {
    return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
  }

  try {
    requireApiKey(CONFIG);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error({ requestId, setting: err.setting }, err.message);
      return NextResponse.json({ error: err.message }, { status: 500 });
    }
    throw err;
  }

  try {
    logger.info({ requestId }, 'scan requested');
    const run = await withRunLock(CONFIG.RUN_LOCK_TTL_MS, () => runScan({ config: CONFIG, logger: logger.child({ requestId }) }));
    if (!run.acquired) {
      return NextResponse.json({ error: 'Scan already in progress' }, { status: 409 });
    }
    return NextResponse.json({ requestId, summary: run.value });
  } catch (error) {
    logger.error({ requestId, err: errorMessage(error) }, 'scan failed');
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}
