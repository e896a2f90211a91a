import { Config } from '../config';
import { logger } from '../utils/logger';
import { JobSource } from './base';
import { RemoteOKSource } from './remoteok';
import { WeWorkRemotelySource } from './weworkremotely';

export type SourceConfig = Pick<Config, 'enableRemoteOK' | 'enableWWR' | 'sourceFetchTimeoutMs'>;

/**
 * Boards the ingestor polls, in fetch order. Disabled boards are left out.
 */
export function createJobSources(config: SourceConfig): JobSource[] {
  const timeoutMs = config.sourceFetchTimeoutMs;
  const registry: Array<[enabled: boolean, create: () => JobSource]> = [
    [config.enableRemoteOK, () => new RemoteOKSource(undefined, timeoutMs)],
    [config.enableWWR, () => new WeWorkRemotelySource(undefined, timeoutMs)],
  ];

  const sources = registry.filter(([enabled]) => enabled).map(([, create]) => create());
  if (sources.length === 0) {
    logger.warn('No job sources enabled, runs will only match postings already stored');
  }
  return sources;
}
