/**
 * Command-line overrides applied on top of a loaded config.
 */

import type { SimulationConfig } from './schema.js';
import { ConfigError } from '../errors.js';
import { parseContentStrategy, parseFollowStrategy } from '../recsys/strategies.js';

export interface CliOverrides {
  seed?: string;
  days?: string;
  sequential?: boolean;
  contentRecsys?: string;
  followRecsys?: string;
}

function parseInteger(value: string, flag: string, min: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError([`${flag} must be an integer >= ${min}, got "${value}"`]);
  }
  return n;
}

/** Apply command-line overrides on top of the config file. */
export function applyOverrides(config: SimulationConfig, opts: CliOverrides): SimulationConfig {
  const issues: string[] = [];
  let content = config.recsys.content;
  let follow = config.recsys.follow;

  if (opts.contentRecsys !== undefined) {
    const parsed = parseContentStrategy(opts.contentRecsys);
    if (parsed) content = parsed;
    else issues.push(`--content-recsys: unknown strategy "${opts.contentRecsys}"`);
  }
  if (opts.followRecsys !== undefined) {
    const parsed = parseFollowStrategy(opts.followRecsys);
    if (parsed) follow = parsed;
    else issues.push(`--follow-recsys: unknown strategy "${opts.followRecsys}"`);
  }
  if (issues.length > 0) throw new ConfigError(issues);

  return {
    ...config,
    seed: opts.seed !== undefined ? parseInteger(opts.seed, '--seed', Number.MIN_SAFE_INTEGER) : config.seed,
    days: opts.days !== undefined ? parseInteger(opts.days, '--days', 0) : config.days,
    resources: opts.sequential ? { ...config.resources, parallel: false } : config.resources,
    recsys: { ...config.recsys, content, follow },
  };
}
