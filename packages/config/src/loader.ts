import fs from 'node:fs';
import path from 'node:path';

import { type LogConfig, defaultLogConfig, freezeLogConfig } from '@execmon/logevt';
import { load as loadYaml } from 'js-yaml';

import { ConfigLoadError } from './errors.js';
import { parseLogConfig } from './validator.js';

export interface ConfigLoadOptions {
  /** Recorded as `path` in the snapshot. */
  sourcePath?: string;
  onWarning?: (message: string) => void;
}

export function loadLogConfigFromFile(filePath: string, options: ConfigLoadOptions = {}): Readonly<LogConfig> {
  const absPath = path.resolve(filePath);
  let yaml: string;
  try {
    yaml = fs.readFileSync(absPath, 'utf8');
  } catch (err) {
    throw new ConfigLoadError(`cannot read configuration ${absPath}: ${errorMessage(err)}`, { cause: err });
  }
  return loadLogConfigFromString(yaml, { ...options, sourcePath: absPath });
}

/** An empty document yields the defaults. */
export function loadLogConfigFromString(yaml: string, options: ConfigLoadOptions = {}): Readonly<LogConfig> {
  let parsed: unknown;
  try {
    parsed = loadYaml(yaml);
  } catch (err) {
    throw new ConfigLoadError(`invalid YAML: ${errorMessage(err)}`, { cause: err });
  }

  const { lint, values } = parseLogConfig(parsed ?? {});
  for (const w of lint.warnings) {
    if (options.onWarning) {
      options.onWarning(w);
    } else {
      console.warn(w);
    }
  }
  if (!lint.valid) {
    const msg = lint.errors.join('; ') || 'configuration validation failed';
    throw new ConfigLoadError(msg, { errors: lint.errors });
  }

  const defaults = defaultLogConfig();
  return freezeLogConfig({
    ...defaults,
    ...values,
    path: options.sourcePath ?? defaults.path,
  });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
