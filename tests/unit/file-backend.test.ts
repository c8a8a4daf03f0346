import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileHistoryBackend } from '../../src/storage';

describe('FileHistoryBackend', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'job-history-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads null when the file does not exist', async () => {
    const backend = new FileHistoryBackend(join(dir, 'job_history.json'));

    expect(await backend.read()).toBeNull();
  });

  it('creates missing directories on write', async () => {
    const path = join(dir, 'nested', 'state', 'job_history.json');
    const backend = new FileHistoryBackend(path);

    await backend.write('{"keys":[]}');

    expect(await readFile(path, 'utf-8')).toBe('{"keys":[]}');
    expect(await backend.read()).toBe('{"keys":[]}');
  });

  it('replaces the previous record', async () => {
    const path = join(dir, 'job_history.json');
    await writeFile(path, '{"keys":["Acme Co::1"]}', 'utf-8');
    const backend = new FileHistoryBackend(path);

    await backend.write('{"keys":["Acme Co::2"]}');

    expect(await backend.read()).toBe('{"keys":["Acme Co::2"]}');
  });

  it('clears the record and tolerates clearing twice', async () => {
    const backend = new FileHistoryBackend(join(dir, 'job_history.json'));
    await backend.write('{"keys":[]}');

    await backend.clear();
    await backend.clear();

    expect(await backend.read()).toBeNull();
  });

  it('propagates errors other than a missing file', async () => {
    const backend = new FileHistoryBackend(dir);

    await expect(backend.read()).rejects.toThrow();
  });

  it('describes itself by path', () => {
    expect(new FileHistoryBackend('/var/lib/digest/history.json').description).toBe(
      'file /var/lib/digest/history.json'
    );
  });
});
