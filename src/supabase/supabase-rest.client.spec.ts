import axios from 'axios';
import {
  StoreApiError,
  StoreConfigError,
  StoreParseError,
  StoreSerializationError,
  StoreTransportError,
} from '../storage/storage.errors';
import {
  SupabaseRestClient,
  eqQuery,
  parseRows,
  rowId,
} from './supabase-rest.client';
import { FakePostgrest, TEST_SUPABASE } from './testing/fake-postgrest';

describe('SupabaseRestClient', () => {
  let fake: FakePostgrest;
  let client: SupabaseRestClient;

  beforeEach(() => {
    fake = new FakePostgrest();
    client = new SupabaseRestClient(TEST_SUPABASE, fake.http());
  });

  it('sends key, bearer auth, JSON content type and return=representation', async () => {
    await client.execute('GET', 'conversations?select=id');

    const [request] = fake.requests;
    expect(request.url).toBe('https://db.test/rest/v1/conversations?select=id');
    expect(request.headers).toMatchObject({
      apikey: 'test-key',
      authorization: 'Bearer test-key',
      'content-type': 'application/json',
      prefer: 'return=representation',
    });
  });

  it('returns the raw response body', async () => {
    const bytes = await client.execute('POST', 'conversations', {
      channel: 'whatsapp',
      contact_identifier: '123@x',
      status: 'active',
    });

    expect(Buffer.isBuffer(bytes)).toBe(true);
    const rows = parseRows(bytes, 'conversation');
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      id: 'conv-1',
      contact_identifier: '123@x',
    });
  });

  it('wraps status >= 400 with the code and the verbatim body', async () => {
    fake.failNext({ status: 409, body: '{"code":"23505"}' });

    const attempt = client.execute('POST', 'messages', { body: 'hi' });

    await expect(attempt).rejects.toBeInstanceOf(StoreApiError);
    await expect(attempt).rejects.toMatchObject({
      status: 409,
      body: '{"code":"23505"}',
      message: 'API error (status 409): {"code":"23505"}',
    });
  });

  it('reports network failures as transport errors', async () => {
    fake.failNext({ networkError: 'ECONNREFUSED' });

    const attempt = client.execute('GET', 'conversations');

    await expect(attempt).rejects.toBeInstanceOf(StoreTransportError);
    await expect(attempt).rejects.toMatchObject({
      code: 'TRANSPORT',
      transportCode: 'ECONNREFUSED',
    });
  });

  it('fails serialization before sending anything', async () => {
    await expect(
      client.execute('POST', 'messages', { n: BigInt(1) }),
    ).rejects.toBeInstanceOf(StoreSerializationError);
    expect(fake.requests).toHaveLength(0);
  });

  it('does not retry a failed request', async () => {
    fake.failNext({ status: 503, body: 'unavailable' });

    await expect(
      client.execute('GET', 'conversations'),
    ).rejects.toBeInstanceOf(StoreApiError);
    expect(fake.requests).toHaveLength(1);
  });

  describe('fromEnv', () => {
    it.each([
      [{ SUPABASE_URL: 'https://db.test' }],
      [{ SUPABASE_KEY: 'test-key' }],
      [{}],
    ])(
      'refuses to build without both settings (%j) and sends nothing',
      (env: Record<string, string>) => {
        const adapter = jest.fn();
        const http = axios.create({ adapter });

        expect(() =>
          SupabaseRestClient.fromEnv((key) => env[key], http),
        ).toThrow(StoreConfigError);
        expect(adapter).not.toHaveBeenCalled();
      },
    );

    it('tolerates a trailing slash on the base URL', async () => {
      const env: Record<string, string> = {
        SUPABASE_URL: 'https://db.test/',
        SUPABASE_KEY: 'test-key',
      };
      const built = SupabaseRestClient.fromEnv((key) => env[key], fake.http());

      await built.execute('GET', 'messages');

      expect(fake.requests[0].url).toBe('https://db.test/rest/v1/messages');
    });
  });
});

describe('eqQuery', () => {
  it('builds encoded equality filters followed by select', () => {
    const filters = { contact_identifier: '123@x', channel: 'whatsapp' };

    expect(eqQuery(filters, ['id'])).toBe(
      'contact_identifier=eq.123%40x&channel=eq.whatsapp&select=id',
    );
  });

  it('omits select when no columns are given', () => {
    expect(eqQuery({ id: 'conv-1' })).toBe('id=eq.conv-1');
  });
});

describe('parseRows', () => {
  it('rejects a body that is not JSON', () => {
    expect(() => parseRows(Buffer.from('<html>'), 'conversation')).toThrow(
      StoreParseError,
    );
  });

  it('rejects a JSON object where rows are expected', () => {
    expect(() => parseRows(Buffer.from('{"id":"x"}'), 'conversation')).toThrow(
      'failed to parse conversation response: expected an array of rows',
    );
  });
});

describe('rowId', () => {
  it('reads string and numeric ids', () => {
    expect(rowId({ id: 'abc' })).toBe('abc');
    expect(rowId({ id: 42 })).toBe('42');
    expect(rowId({})).toBeNull();
  });
});
