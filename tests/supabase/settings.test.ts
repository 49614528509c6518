import { ConfigurationError } from '../../src/estimator/errors';
import { DEFAULT_TIME_PARAMS } from '../../src/estimator/params';
import {
  getParamsRevision,
  getSettingValue,
  getSummerMode,
  getTimeParams,
  saveTimeParams,
  setSummerMode,
  SUMMER_MODE_KEY,
  TIME_PARAMS_KEY,
  TIME_PARAMS_REVISION_KEY,
} from '../../src/supabase/settings';
import { mockClient, mockQuery, QueryResult, silenceConsole } from '../helpers/supabaseMock';

function settingsClient(result: QueryResult) {
  const query = mockQuery(result);
  const { client, from } = mockClient({ settings: query });
  return { client, from, query };
}

const row = (key: string, value: string): QueryResult => ({ data: { key, value }, error: null });

describe('settings store', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('getSettingValue', () => {
    it('queries the settings table by key', async () => {
      const { client, from, query } = settingsClient(row(SUMMER_MODE_KEY, 'true'));

      await expect(getSettingValue(client, SUMMER_MODE_KEY)).resolves.toBe('true');
      expect(from).toHaveBeenCalledWith('settings');
      expect(query.select).toHaveBeenCalledWith('key, value');
      expect(query.eq).toHaveBeenCalledWith('key', SUMMER_MODE_KEY);
    });

    it('returns null when the key has no row or an unexpected shape', async () => {
      await expect(getSettingValue(settingsClient({ data: null, error: null }).client, 'x')).resolves.toBeNull();
      await expect(getSettingValue(settingsClient({ data: { key: 'x', value: 5 }, error: null }).client, 'x')).resolves.toBeNull();
    });

    it('throws when the query fails', async () => {
      const { client } = settingsClient({ data: null, error: { message: 'connection reset' } });
      await expect(getSettingValue(client, SUMMER_MODE_KEY)).rejects.toThrow(
        'Failed to fetch setting summer_mode: connection reset',
      );
    });
  });

  describe('getTimeParams', () => {
    it('reads the oi_time_params_v1 key', async () => {
      const { client, query } = settingsClient(row(TIME_PARAMS_KEY, JSON.stringify({ version: 'v1' })));
      await getTimeParams(client);
      expect(TIME_PARAMS_KEY).toBe('oi_time_params_v1');
      expect(query.eq).toHaveBeenCalledWith('key', 'oi_time_params_v1');
    });

    it('resolves the stored parameter set', async () => {
      const { client } = settingsClient(row(TIME_PARAMS_KEY, JSON.stringify({ travel: { sec_per_bay_step: 3 } })));
      const params = await getTimeParams(client);
      expect(params.travel.sec_per_bay_step).toBe(3);
      expect(params.pack).toEqual(DEFAULT_TIME_PARAMS.pack);
    });

    it('has no silent default when the setting is missing', async () => {
      const { client } = settingsClient({ data: null, error: null });
      await expect(getTimeParams(client)).rejects.toThrow(ConfigurationError);
      await expect(getTimeParams(client)).rejects.toThrow('Missing setting oi_time_params_v1');
    });

    it('rejects a value that is not JSON', async () => {
      const { client } = settingsClient(row(TIME_PARAMS_KEY, '{oops'));
      await expect(getTimeParams(client)).rejects.toThrow(/^Setting oi_time_params_v1 is not valid JSON/);
    });

    it('rejects an empty parameter object', async () => {
      const { client } = settingsClient(row(TIME_PARAMS_KEY, '{}'));
      await expect(getTimeParams(client)).rejects.toThrow(ConfigurationError);
    });
  });

  describe('summer mode', () => {
    it.each<[string, boolean]>([
      ['ON', true],
      ['1', true],
      ['yes', true],
      ['false', false],
      ['', false],
    ])('reads %p as %p', async (value, expected) => {
      const { client } = settingsClient(row(SUMMER_MODE_KEY, value));
      await expect(getSummerMode(client)).resolves.toBe(expected);
    });

    it('is off when never set', async () => {
      await expect(getSummerMode(settingsClient({ data: null, error: null }).client)).resolves.toBe(false);
    });

    it('stores the toggle as text', async () => {
      const { client, query } = settingsClient({ data: null, error: null });
      await setSummerMode(client, true);
      expect(query.upsert).toHaveBeenCalledWith({ key: SUMMER_MODE_KEY, value: 'true' }, { onConflict: 'key' });
    });
  });

  describe('saveTimeParams', () => {
    it('stores the payload and bumps the revision', async () => {
      const { client, query } = settingsClient({ data: null, error: null });
      query.maybeSingle.mockResolvedValueOnce(row(TIME_PARAMS_REVISION_KEY, '4'));
      const payload = { version: 'v2', pack: { base_seconds: 50 } };

      await expect(saveTimeParams(client, payload)).resolves.toBe(5);

      expect(query.upsert).toHaveBeenNthCalledWith(
        1,
        { key: TIME_PARAMS_KEY, value: JSON.stringify(payload) },
        { onConflict: 'key' },
      );
      expect(query.upsert).toHaveBeenNthCalledWith(2, { key: TIME_PARAMS_REVISION_KEY, value: '5' }, { onConflict: 'key' });
    });

    it('reads the current revision between the payload write and the revision write', async () => {
      const { client, query } = settingsClient({ data: null, error: null });
      query.maybeSingle.mockResolvedValueOnce(row(TIME_PARAMS_REVISION_KEY, '7'));

      await expect(saveTimeParams(client, { version: 'v2' })).resolves.toBe(8);

      const [payloadWrite, revisionWrite] = query.upsert.mock.invocationCallOrder;
      const [revisionRead] = query.maybeSingle.mock.invocationCallOrder;
      expect(payloadWrite).toBeLessThan(revisionRead);
      expect(revisionRead).toBeLessThan(revisionWrite);
      expect(query.maybeSingle).toHaveBeenCalledTimes(1);
    });

    it('starts counting from revision 1', async () => {
      const { client, query } = settingsClient({ data: null, error: null });
      await expect(getParamsRevision(client)).resolves.toBe(1);
      expect(query.eq).toHaveBeenCalledWith('key', 'oi_time_params_v1_revision');
      await expect(saveTimeParams(client, { version: 'v2' })).resolves.toBe(2);
    });

    it('refuses an unusable payload without writing', async () => {
      const { client, query } = settingsClient({ data: null, error: null });
      await expect(saveTimeParams(client, {})).rejects.toThrow(ConfigurationError);
      expect(query.upsert).not.toHaveBeenCalled();
    });

    it('throws when the write fails', async () => {
      const { client, query } = settingsClient({ data: null, error: null });
      query.upsert.mockResolvedValueOnce({ data: null, error: { message: 'permission denied' } });
      await expect(saveTimeParams(client, { version: 'v2' })).rejects.toThrow(
        'Failed to save setting oi_time_params_v1: permission denied',
      );
    });
  });
});
