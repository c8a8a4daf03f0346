import { describe, it, expect, vi, beforeEach } from 'vitest';

const { query } = vi.hoisted(() => ({ query: vi.fn() }));

vi.mock('../../src/db/client', () => ({
  getPool: vi.fn(() => ({ query })),
}));

import { handleMigrationRequest } from '../../api/migrate';
import { HISTORY_SCHEMA_SQL } from '../../src/db/schema';

describe('handleMigrationRequest', () => {
  beforeEach(() => {
    query.mockReset();
  });

  it('rejects a missing or wrong bearer token', async () => {
    expect(await handleMigrationRequest(undefined, 'test-secret')).toEqual({
      status: 401,
      body: { error: 'Unauthorized' },
    });
    expect(await handleMigrationRequest('Bearer wrong', 'test-secret')).toEqual({
      status: 401,
      body: { error: 'Unauthorized' },
    });
    expect(query).not.toHaveBeenCalled();
  });

  it('runs the history schema when authorized', async () => {
    query.mockResolvedValue({ rows: [] });

    const response = await handleMigrationRequest('Bearer test-secret', 'test-secret');

    expect(response).toEqual({
      status: 200,
      body: { success: true, message: 'job_history table is ready' },
    });
    expect(query).toHaveBeenCalledWith(HISTORY_SCHEMA_SQL);
  });

  it('answers 500 when the query fails', async () => {
    query.mockRejectedValue(new Error('permission denied for schema public'));

    const response = await handleMigrationRequest('Bearer test-secret', 'test-secret');

    expect(response).toEqual({
      status: 500,
      body: { success: false, error: 'permission denied for schema public' },
    });
  });
});
