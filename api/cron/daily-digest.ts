import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../../src/config';
import { parseQueryFlags, QueryParams } from '../../src/config/run-options';
import { createDigestRunner, deliveryFailedEverywhere } from '../../src/services/digest-runner';
import { logger } from '../../src/utils/logger';

export interface DigestRequest {
  authorization?: string;
  query: QueryParams;
}

export interface DigestResponse {
  status: number;
  body: Record<string, unknown>;
}

/**
 * Checks the cron secret, runs the digest once and shapes the JSON reply
 */
export async function handleDigestRequest(
  request: DigestRequest,
  cronSecret: string | undefined = process.env.CRON_SECRET
): Promise<DigestResponse> {
  if (cronSecret && request.authorization !== `Bearer ${cronSecret}`) {
    logger.warn('Unauthorized cron request', {
      authHeader: request.authorization ? 'present' : 'missing',
    });
    return { status: 401, body: { error: 'Unauthorized' } };
  }

  const startTime = Date.now();

  try {
    const options = parseQueryFlags(request.query);
    const config = loadConfig({ dryRun: options.dryRun });
    const summary = await createDigestRunner(config).run({ ...options, dryRun: config.dryRun });
    const failed = deliveryFailedEverywhere(summary);

    return {
      status: failed ? 502 : 200,
      body: {
        success: !failed,
        stats: {
          fetched: summary.fetched,
          matched: summary.matched,
          unique: summary.unique,
          new: summary.newPostings.length,
          duration: `${Date.now() - startTime}ms`,
        },
        subject: summary.digest.subject,
        failedCompanies: summary.failedCompanies,
        warnings: summary.warnings,
        delivery: summary.delivery,
        deliverySkippedReason: summary.deliverySkippedReason ?? null,
      },
    };
  } catch (error) {
    logger.error('Daily digest cron failed', error, { duration: `${Date.now() - startTime}ms` });

    return {
      status: 500,
      body: {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      },
    };
  }
}

/**
 * Daily digest cron endpoint
 * Runs once per trigger via Vercel Cron; needs HISTORY_BACKEND=postgres
 * since the serverless filesystem does not survive between invocations
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  const { status, body } = await handleDigestRequest({
    authorization: req.headers.authorization,
    query: req.query,
  });
  res.status(status).json(body);
}
