import { SupabaseClient } from '@supabase/supabase-js';
import { ConfigurationError } from '../estimator/errors';
import { safeInt } from '../estimator/location';
import { resolveTimeParams, TimeParams } from '../estimator/params';
import { settingSchema } from '../types/database.types';

export const TIME_PARAMS_KEY = 'oi_time_params_v1';
export const TIME_PARAMS_REVISION_KEY = 'oi_time_params_v1_revision';
export const SUMMER_MODE_KEY = 'summer_mode';

const TRUTHY_SETTING_VALUES = new Set(['1', 'true', 'yes', 'y', 'on']);

/**
 * Reads one value from the key/value settings table.
 *
 * @returns The stored string, or null when the key has no row.
 * @throws Error if the query fails.
 */
export async function getSettingValue(client: SupabaseClient, key: string): Promise<string | null> {
  const { data, error } = await client
    .from('settings')
    .select('key, value')
    .eq('key', key)
    .maybeSingle();

  if (error) {
    console.error(`Error fetching setting ${key}:`, error);
    throw new Error(`Failed to fetch setting ${key}: ${error.message}`);
  }

  if (!data) {
    return null;
  }

  const parsed = settingSchema.safeParse(data);
  if (!parsed.success) {
    console.warn(`Setting ${key} has an unexpected shape. Treating it as absent.`);
    return null;
  }
  return parsed.data.value;
}

/**
 * Inserts or replaces one settings row.
 *
 * @throws Error if the write fails.
 */
export async function setSettingValue(client: SupabaseClient, key: string, value: string): Promise<void> {
  const { error } = await client.from('settings').upsert({ key, value }, { onConflict: 'key' });

  if (error) {
    console.error(`Error saving setting ${key}:`, error);
    throw new Error(`Failed to save setting ${key}: ${error.message}`);
  }
}

/**
 * Loads the estimator parameter set. There is no silent default: estimating
 * without a configured cost model would produce numbers nobody chose.
 *
 * @throws {ConfigurationError} when the setting is missing or is not valid JSON.
 */
export async function getTimeParams(client: SupabaseClient): Promise<TimeParams> {
  const raw = await getSettingValue(client, TIME_PARAMS_KEY);
  if (raw === null || raw.trim() === '') {
    throw new ConfigurationError(`Missing setting ${TIME_PARAMS_KEY}. Save a parameter set before estimating.`, TIME_PARAMS_KEY);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Setting ${TIME_PARAMS_KEY} is not valid JSON: ${reason}`, TIME_PARAMS_KEY);
  }

  return resolveTimeParams(payload);
}

export async function getSummerMode(client: SupabaseClient): Promise<boolean> {
  const raw = await getSettingValue(client, SUMMER_MODE_KEY);
  return TRUTHY_SETTING_VALUES.has((raw ?? 'false').trim().toLowerCase());
}

export async function setSummerMode(client: SupabaseClient, enabled: boolean): Promise<void> {
  await setSettingValue(client, SUMMER_MODE_KEY, enabled ? 'true' : 'false');
  console.log(`Summer mode set to ${enabled ? 'ON' : 'OFF'}.`);
}

/**
 * Revision counter of the parameter set, bumped on every save so estimate
 * runs can record which parameters produced them. Defaults to 1.
 */
export async function getParamsRevision(client: SupabaseClient): Promise<number> {
  const raw = await getSettingValue(client, TIME_PARAMS_REVISION_KEY);
  return safeInt(raw, 1);
}

/**
 * Validates and stores a new parameter set, then bumps the revision.
 * The bump is a read followed by a write, so two saves racing each other can
 * record the same revision number.
 *
 * @param payload - Parameter set as edited by an administrator (parsed JSON).
 * @returns The new revision number.
 * @throws {ConfigurationError} when the payload is not a usable parameter set.
 */
export async function saveTimeParams(client: SupabaseClient, payload: unknown): Promise<number> {
  resolveTimeParams(payload);

  await setSettingValue(client, TIME_PARAMS_KEY, JSON.stringify(payload));
  const revision = (await getParamsRevision(client)) + 1;
  await setSettingValue(client, TIME_PARAMS_REVISION_KEY, String(revision));

  console.log(`Saved time parameters as revision ${revision}.`);
  return revision;
}
