import { StoreConfigError } from '../storage/storage.errors';

export type StorageBackend = 'local' | 'remote';

/**
 * Reads one raw setting: `ConfigService.get` in the app, a plain record
 * in tests.
 */
export type EnvReader = (key: string) => string | undefined;

export interface SupabaseConfig {
  url: string;
  key: string;
}

export const DEFAULT_DB_PATH = 'store/messages.db';

export function resolveStorageBackend(
  value: string | undefined,
): StorageBackend {
  const backend = (value ?? '').trim().toLowerCase();
  if (!backend || backend === 'remote' || backend === 'supabase') {
    return 'remote';
  }
  if (backend === 'local' || backend === 'sqlite') return 'local';
  throw new StoreConfigError(
    `STORAGE_BACKEND must be "remote" or "local", got "${value}"`,
  );
}

/**
 * Loads the remote store settings. Both are required and checked here,
 * before any client exists.
 */
export function loadSupabaseConfig(read: EnvReader): SupabaseConfig {
  const url = read('SUPABASE_URL')?.trim();
  const key = read('SUPABASE_KEY')?.trim();

  if (!url || !key) {
    throw new StoreConfigError(
      'SUPABASE_URL and SUPABASE_KEY environment variables are required',
    );
  }

  try {
    new URL(url);
  } catch {
    throw new StoreConfigError(`SUPABASE_URL is not a valid URL: ${url}`);
  }

  return { url: url.replace(/\/+$/, ''), key };
}

export function isEnabled(value: string | undefined): boolean {
  if (value === undefined) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}
