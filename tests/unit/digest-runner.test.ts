import { describe, it, expect, vi } from 'vitest';
import { DigestRunner, DigestRunnerDeps, deliveryFailedEverywhere } from '../../src/services/digest-runner';
import { JobFetcherService } from '../../src/services/job-fetcher';
import { HistoryStore } from '../../src/services/history-store';
import { DigestDocument } from '../../src/services/digest-formatter';
import { DeliveryReport } from '../../src/services/notification-dispatcher';
import { JobSourceRegistry } from '../../src/sources';
import { serializeHistory } from '../../src/storage';
import { CompanyTarget, JobPosting } from '../../src/types/job';
import { SourceFetchError } from '../../src/utils/errors';
import { makePosting, SCENARIO_RULES } from '../helpers/postings';
import { MemoryHistoryBackend } from '../helpers/memory-history-backend';

const NOW = new Date('2026-10-07T15:00:00.000Z');

const ACME: CompanyTarget = { source: 'greenhouse', slug: 'acme', name: 'Acme Co' };
const GLOBEX: CompanyTarget = { source: 'ashby', slug: 'globex', name: 'Globex' };
const INITECH: CompanyTarget = { source: 'lever', slug: 'initech', name: 'Initech' };

const seniorAccountant = makePosting();
const accountingManager = makePosting({ sourceId: '43', title: 'Accounting Manager' });
const remoteAccountant = makePosting({
  sourceId: 'l-1',
  company: 'Initech',
  title: 'Staff Accountant',
  location: 'Remote',
  url: 'https://jobs.lever.co/initech/l-1',
  source: 'lever',
  companySlug: 'initech',
});

function createSources(acme: JobPosting[] = [seniorAccountant, accountingManager]): JobSourceRegistry {
  return {
    greenhouse: { kind: 'greenhouse', fetchJobs: async () => acme },
    ashby: {
      kind: 'ashby',
      fetchJobs: async () => {
        throw new SourceFetchError('ashby', 'globex', { cause: new Error('HTTP 500 Internal Server Error') });
      },
    },
    lever: { kind: 'lever', fetchJobs: async () => [remoteAccountant] },
  };
}

function createDeliver() {
  return vi.fn(
    async (_document: DigestDocument, recipients: string[]): Promise<DeliveryReport> => ({
      delivered: recipients,
      failed: [],
    })
  );
}

function createRunner(overrides: Partial<DigestRunnerDeps> = {}, backend = new MemoryHistoryBackend()) {
  const deliver = createDeliver();
  const runner = new DigestRunner({
    companies: [ACME, GLOBEX, INITECH],
    filters: SCENARIO_RULES,
    fetcher: new JobFetcherService(createSources()),
    history: new HistoryStore(backend, () => NOW),
    delivery: { deliver },
    recipients: ['111'],
    sendEmptyDigest: false,
    ...overrides,
  });
  return { runner, deliver, backend };
}

const DEFAULT_OPTIONS = { dryRun: false, noFilter: false, resetHistory: false, now: NOW };

describe('DigestRunner', () => {
  it('delivers new matching postings when one company fails', async () => {
    const { runner, deliver } = createRunner();

    const summary = await runner.run(DEFAULT_OPTIONS);

    expect(summary.fetched).toBe(3);
    expect(summary.matched).toBe(2);
    expect(summary.unique).toBe(2);
    expect(summary.newPostings).toEqual([seniorAccountant, remoteAccountant]);
    expect(summary.failedCompanies).toEqual(['ashby:globex']);
    expect(summary.sourceStats['ashby:globex']).toEqual({ source: 'ashby', fetched: 0, failed: true });
    expect(summary.digest.subject).toBe('Job Digest: 2 new (Oct 07)');
    expect(summary.delivery).toEqual({ delivered: ['111'], failed: [] });
    expect(summary.deliverySkippedReason).toBeUndefined();
    expect(deliver).toHaveBeenCalledWith(summary.digest, ['111']);
  });

  it('skips delivery of an empty digest on the next run', async () => {
    const backend = new MemoryHistoryBackend();
    await createRunner({}, backend).runner.run(DEFAULT_OPTIONS);
    const { runner, deliver } = createRunner({}, backend);

    const summary = await runner.run(DEFAULT_OPTIONS);

    expect(summary.newPostings).toEqual([]);
    expect(summary.digest.isEmpty).toBe(true);
    expect(summary.delivery).toBeNull();
    expect(summary.deliverySkippedReason).toBe('empty_digest');
    expect(deliver).not.toHaveBeenCalled();
  });

  it('sends an empty digest when configured to', async () => {
    const backend = new MemoryHistoryBackend(
      serializeHistory(['Acme Co::42', 'Initech::l-1'])
    );
    const { runner, deliver } = createRunner({ sendEmptyDigest: true }, backend);

    const summary = await runner.run(DEFAULT_OPTIONS);

    expect(summary.digest.subject).toBe('Job Digest: no new postings (Oct 07)');
    expect(deliver).toHaveBeenCalledTimes(1);
  });

  it('records history but does not deliver on a dry run', async () => {
    const { runner, deliver, backend } = createRunner();

    const summary = await runner.run({ ...DEFAULT_OPTIONS, dryRun: true });

    expect(summary.newPostings).toHaveLength(2);
    expect(summary.deliverySkippedReason).toBe('dry_run');
    expect(deliver).not.toHaveBeenCalled();
    expect(backend.writes).toBe(1);
  });

  it('still delivers when history cannot be saved', async () => {
    const backend = new MemoryHistoryBackend();
    backend.failWrites = true;
    const { runner, deliver } = createRunner({}, backend);

    const summary = await runner.run(DEFAULT_OPTIONS);

    expect(summary.newPostings).toEqual([seniorAccountant, remoteAccountant]);
    expect(summary.warnings).toEqual([
      'Could not save job history to memory; these postings will be reported again next run',
    ]);
    expect(deliver).toHaveBeenCalledTimes(1);
  });

  it('reports seen postings again after a history reset', async () => {
    const backend = new MemoryHistoryBackend(serializeHistory(['Acme Co::42', 'Initech::l-1']));
    const { runner } = createRunner({}, backend);

    const summary = await runner.run({ ...DEFAULT_OPTIONS, resetHistory: true });

    expect(summary.newPostings).toEqual([seniorAccountant, remoteAccountant]);
  });

  it('passes every posting through when filtering is off', async () => {
    const { runner } = createRunner();

    const summary = await runner.run({ ...DEFAULT_OPTIONS, noFilter: true });

    expect(summary.matched).toBe(3);
    expect(summary.newPostings).toEqual([seniorAccountant, accountingManager, remoteAccountant]);
  });

  it('collapses repeats of the same posting within a run', async () => {
    const { runner } = createRunner({
      fetcher: new JobFetcherService(createSources([seniorAccountant, { ...seniorAccountant }])),
    });

    const summary = await runner.run(DEFAULT_OPTIONS);

    expect(summary.matched).toBe(3);
    expect(summary.unique).toBe(2);
  });

  it('skips delivery without recipients', async () => {
    const { runner } = createRunner({ delivery: null, recipients: [] });

    const summary = await runner.run(DEFAULT_OPTIONS);

    expect(summary.delivery).toBeNull();
    expect(summary.deliverySkippedReason).toBe('no_recipients');
  });
});

describe('deliveryFailedEverywhere', () => {
  it('is true only when delivery was attempted and nobody received it', async () => {
    const failing = vi.fn(
      async (_document: DigestDocument, recipients: string[]): Promise<DeliveryReport> => ({
        delivered: [],
        failed: recipients.map(recipient => ({ recipient, error: 'chat not found' })),
      })
    );
    const failed = await createRunner({ delivery: { deliver: failing } }).runner.run(DEFAULT_OPTIONS);
    const skipped = await createRunner().runner.run({ ...DEFAULT_OPTIONS, dryRun: true });
    const sent = await createRunner().runner.run(DEFAULT_OPTIONS);

    expect(deliveryFailedEverywhere(failed)).toBe(true);
    expect(deliveryFailedEverywhere(skipped)).toBe(false);
    expect(deliveryFailedEverywhere(sent)).toBe(false);
  });
});
