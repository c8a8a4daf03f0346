import { JobSource, JsonGetter } from './base';
import { GreenhouseSource } from './greenhouse';
import { AshbySource } from './ashby';
import { LeverSource } from './lever';
import { fetchJson } from './http';
import { SourceKind } from '../types/job';
import { Config } from '../config';

export type JobSourceRegistry = Record<SourceKind, JobSource>;

/**
 * Builds one adapter per vendor; companies pick theirs by source tag
 */
export function createJobSources(
  config: Pick<Config, 'httpTimeoutMs'>,
  getJson: JsonGetter = url => fetchJson(url, { timeoutMs: config.httpTimeoutMs })
): JobSourceRegistry {
  return {
    greenhouse: new GreenhouseSource(getJson),
    ashby: new AshbySource(getJson),
    lever: new LeverSource(getJson),
  };
}
