import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getCronSecret, getEnvConfig } from '../lib/config.js';
import { NotifierError, errorMessage } from '../lib/errors.js';
import { runUnfulfilledOrdersReport } from '../lib/unfulfilledOrdersReport.js';

export const config = {
  runtime: 'nodejs',
};

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET' && req.method !== 'POST') {
    res.setHeader('Allow', 'GET, POST');
    return res.status(405).json({ error: 'Method Not Allowed' });
  }

  // Vercel cron sends the project's CRON_SECRET as a bearer token
  const cronSecret = getCronSecret();
  if (cronSecret && req.headers.authorization !== `Bearer ${cronSecret}`) {
    return res.status(401).json({ ok: false, error: 'Unauthorized' });
  }

  try {
    const env = getEnvConfig();
    const dryRunParam = typeof req.query.dryRun === 'string' ? req.query.dryRun : undefined;
    const result = await runUnfulfilledOrdersReport(env, { dryRun: dryRunParam === 'true' });

    const ok = result.failedMessages === 0;
    return res.status(ok ? 200 : 502).json({
      ok,
      timestamp: new Date().toISOString(),
      ...result,
    });
  } catch (error) {
    console.error('Unfulfilled orders report failed', error);
    return res.status(500).json({
      ok: false,
      code: error instanceof NotifierError ? error.code : undefined,
      error: errorMessage(error),
    });
  }
}
