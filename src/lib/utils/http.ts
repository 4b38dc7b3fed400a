import https from 'https';
import axios, { AxiosHeaders, type AxiosInstance, type AxiosResponse } from 'axios';

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const MAX_REDIRECTS = 5;

/**
 * Probes test liveness, not certificate hygiene
 */
export const insecureHttpsAgent = new https.Agent({ rejectUnauthorized: false });

export function createHttpClient(): AxiosInstance {
  return axios.create({
    headers: {
      'User-Agent': USER_AGENT,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
    },
    maxRedirects: MAX_REDIRECTS,
    httpsAgent: insecureHttpsAgent,
  });
}

/**
 * Read a response header case-insensitively
 */
export function readHeader(headers: AxiosResponse['headers'], name: string): string | null {
  let value: unknown;
  if (headers instanceof AxiosHeaders) {
    value = headers.get(name);
  } else {
    const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
    value = key === undefined ? undefined : headers[key];
  }

  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return value.map(String).join(', ');
  return null;
}

export function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  return '';
}
