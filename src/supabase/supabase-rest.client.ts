import { Logger } from '@nestjs/common';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import {
  EnvReader,
  SupabaseConfig,
  loadSupabaseConfig,
} from '../config/configuration';
import {
  StoreApiError,
  StoreParseError,
  StoreSerializationError,
  StoreTransportError,
  describeError,
} from '../storage/storage.errors';

export type RestMethod = 'GET' | 'POST' | 'PATCH';

export const REQUEST_TIMEOUT_MS = 30_000;

/**
 * Authenticated request executor for the Supabase REST (PostgREST) API.
 *
 * One attempt per call: no retry, no backoff. Callers get the raw body
 * and parse it themselves.
 */
export class SupabaseRestClient {
  private readonly log = new Logger(SupabaseRestClient.name);
  private readonly restUrl: string;

  constructor(
    private readonly config: SupabaseConfig,
    private readonly http: AxiosInstance = axios.create(),
  ) {
    this.restUrl = `${config.url}/rest/v1`;
  }

  /** Validates settings first; a misconfigured process sends nothing. */
  static fromEnv(read: EnvReader, http?: AxiosInstance): SupabaseRestClient {
    return new SupabaseRestClient(loadSupabaseConfig(read), http);
  }

  async execute(
    method: RestMethod,
    endpoint: string,
    body?: unknown,
  ): Promise<Buffer> {
    const payload = body === undefined ? undefined : this.serialize(body);
    const url = `${this.restUrl}/${endpoint}`;

    this.log.debug(`[execute] ${method} ${endpoint}`);

    let response: AxiosResponse<ArrayBuffer | Buffer>;
    try {
      response = await this.http.request<ArrayBuffer | Buffer>({
        method,
        url,
        data: payload,
        headers: {
          apikey: this.config.key,
          Authorization: `Bearer ${this.config.key}`,
          'Content-Type': 'application/json',
          Prefer: 'return=representation',
        },
        timeout: REQUEST_TIMEOUT_MS,
        responseType: 'arraybuffer',
        validateStatus: () => true,
      });
    } catch (err) {
      const code = axios.isAxiosError(err) ? (err.code ?? null) : null;
      throw new StoreTransportError(
        `request failed: ${describeError(err)}`,
        code,
        err,
      );
    }

    const raw = response.data;
    const bytes = Buffer.isBuffer(raw) ? raw : Buffer.from(raw);

    if (response.status >= 400) {
      throw new StoreApiError(response.status, bytes.toString('utf8'));
    }

    return bytes;
  }

  private serialize(body: unknown): string {
    let json: string | undefined;
    try {
      json = JSON.stringify(body);
    } catch (err) {
      throw new StoreSerializationError(
        `failed to marshal body: ${describeError(err)}`,
        err,
      );
    }
    if (json === undefined) {
      throw new StoreSerializationError(
        `failed to marshal body: ${typeof body} is not serializable`,
      );
    }
    return json;
  }
}

/**
 * Builds a PostgREST equality query: `col=eq.value&...&select=cols`.
 */
export function eqQuery(
  filters: Record<string, string>,
  select?: string[],
): string {
  const params = new URLSearchParams();
  for (const [column, value] of Object.entries(filters)) {
    params.append(column, `eq.${value}`);
  }
  if (select?.length) {
    params.append('select', select.join(','));
  }
  return params.toString();
}

/**
 * Decodes a PostgREST row array. Anything other than a JSON array of
 * objects is a parse failure.
 */
export function parseRows(
  bytes: Buffer,
  what: string,
): Array<Record<string, unknown>> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(bytes.toString('utf8'));
  } catch (err) {
    throw new StoreParseError(
      `failed to parse ${what} response: ${describeError(err)}`,
      err,
    );
  }

  if (!Array.isArray(decoded)) {
    throw new StoreParseError(
      `failed to parse ${what} response: expected an array of rows`,
    );
  }

  const rows: Array<Record<string, unknown>> = [];
  for (const row of decoded) {
    if (!isRecord(row)) {
      throw new StoreParseError(
        `failed to parse ${what} response: row is not an object`,
      );
    }
    rows.push(row);
  }
  return rows;
}

/** Reads the `id` column of a row as a string. */
export function rowId(row: Record<string, unknown>): string | null {
  const id = row['id'];
  if (typeof id === 'string' && id) return id;
  if (typeof id === 'number') return String(id);
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
