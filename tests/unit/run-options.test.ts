import { describe, it, expect } from 'vitest';
import { parseCliArgs, parseQueryFlags } from '../../src/config/run-options';

describe('parseCliArgs', () => {
  it('defaults every flag to false', () => {
    expect(parseCliArgs([])).toEqual({ dryRun: false, noFilter: false, resetHistory: false });
  });

  it('reads each flag', () => {
    expect(parseCliArgs(['--no-filter', '--dry-run', '--reset-history'])).toEqual({
      dryRun: true,
      noFilter: true,
      resetHistory: true,
    });
  });

  it('ignores unrelated arguments', () => {
    expect(parseCliArgs(['--verbose', 'dry-run'])).toEqual({
      dryRun: false,
      noFilter: false,
      resetHistory: false,
    });
  });
});

describe('parseQueryFlags', () => {
  it('accepts "true" and "1" in any case', () => {
    expect(parseQueryFlags({ dryRun: 'TRUE', noFilter: '1', resetHistory: 'false' })).toEqual({
      dryRun: true,
      noFilter: true,
      resetHistory: false,
    });
  });

  it('uses the first value of a repeated parameter', () => {
    expect(parseQueryFlags({ dryRun: ['1', '0'], noFilter: ['no', 'true'] })).toEqual({
      dryRun: true,
      noFilter: false,
      resetHistory: false,
    });
  });
});
