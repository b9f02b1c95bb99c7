/**
 * @fileoverview Settings and client lifetime for one CLI command
 */

import * as path from 'node:path';
import { openLocalPagecite, type LocalPagecite } from '../api/pagecite.js';
import { loadSettings, type Settings } from '../config/settings.js';

export interface CommandContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export function loadCommandSettings(context: CommandContext, configPath: string | undefined): Settings {
  const settings = loadSettings({ cwd: context.cwd, env: context.env, configPath });
  if (settings.storePath === ':memory:') return settings;
  return { ...settings, storePath: path.resolve(context.cwd, settings.storePath) };
}

/**
 * Open the local store for the duration of `run`, closing it afterwards
 * whether or not `run` succeeds.
 */
export async function withLocalPagecite<T>(
  context: CommandContext,
  configPath: string | undefined,
  run: (local: LocalPagecite) => Promise<T>,
): Promise<T> {
  const local = openLocalPagecite(loadCommandSettings(context, configPath));
  try {
    return await run(local);
  } finally {
    local.store.close();
  }
}
