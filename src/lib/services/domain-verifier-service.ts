import { promises as dnsPromises } from 'dns';
import type { AxiosInstance } from 'axios';
import { withRetry, isTimeoutError, isConnectionError } from '../utils/retry';
import { getErrorMessage } from '../utils/errors';
import { extractDomain } from '../utils/domain';
import { createHttpClient, insecureHttpsAgent, readHeader, MAX_REDIRECTS } from '../utils/http';
import { VerificationCache } from './verification-cache';
import type {
  DnsCheckResult,
  HttpProbeResult,
  VerificationResult,
  VerifyOptions,
} from '../types/verification';

export type DnsLookup = (hostname: string) => Promise<{ address: string; family: number }>;

export interface DomainVerifierOptions {
  timeout?: number;
  retries?: number;
  retryDelayMs?: number;
  http?: AxiosInstance;
  lookup?: DnsLookup;
  cache?: VerificationCache<Promise<HttpProbeResult>>;
}

const DNS_FAILURE_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'ENODATA', 'EAI_NONAME']);

/**
 * Verifies that a domain resolves and answers HTTP before anything else
 * is done with it
 */
export class DomainVerifierService {
  private readonly timeout: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly http: AxiosInstance;
  private readonly lookup: DnsLookup;
  private readonly cache: VerificationCache<Promise<HttpProbeResult>>;

  constructor(options: DomainVerifierOptions = {}) {
    this.timeout = options.timeout ?? 5000;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.http = options.http ?? createHttpClient();
    this.lookup = options.lookup ?? ((hostname) => dnsPromises.lookup(hostname));
    this.cache = options.cache ?? new VerificationCache();
  }

  /**
   * Check if domain has valid DNS resolution
   */
  async domainHasDns(domain: string | null | undefined): Promise<DnsCheckResult> {
    if (!domain) {
      return { success: false, address: null, error: 'Empty domain' };
    }

    try {
      const { address } = await this.lookup(domain);
      return { success: true, address, error: null };
    } catch (error) {
      if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        if (DNS_FAILURE_CODES.has(error.code)) {
          return { success: false, address: null, error: 'DNS resolution failed' };
        }
      }
      return { success: false, address: null, error: `DNS error: ${getErrorMessage(error)}` };
    }
  }

  /**
   * Probe https then http with HEAD requests. Results are cached per domain.
   */
  domainRespondsToHttp(domain: string | null | undefined): Promise<HttpProbeResult> {
    if (!domain) {
      return Promise.resolve({
        success: false,
        status: null,
        server: null,
        url: null,
        error: 'Empty domain',
      });
    }

    return this.cache.getOrCreate(`http_check:${domain}`, () => this.probe(domain));
  }

  private async probe(domain: string): Promise<HttpProbeResult> {
    const urlsToTry = [`https://${domain}`, `http://${domain}`];

    for (const url of urlsToTry) {
      try {
        const response = await withRetry(
          () =>
            this.http.head(url, {
              timeout: this.timeout,
              maxRedirects: MAX_REDIRECTS,
              httpsAgent: insecureHttpsAgent,
              validateStatus: () => true,
            }),
          {
            maxAttempts: this.retries,
            initialDelay: this.retryDelayMs,
            backoffMultiplier: 1,
            shouldRetry: isTimeoutError,
            onRetry: (attempt) => {
              console.log(`[DomainVerifier] Timeout on ${url}, retry attempt ${attempt}`);
            },
          }
        );

        return {
          success: true,
          status: response.status,
          server: readHeader(response.headers, 'server') ?? 'Unknown',
          url,
          error: null,
        };
      } catch (error) {
        const kind = isTimeoutError(error)
          ? 'timed out'
          : isConnectionError(error)
            ? 'connection failed'
            : 'failed';
        console.log(`[DomainVerifier] ${url} ${kind}: ${getErrorMessage(error)}`);
      }
    }

    return { success: false, status: null, server: null, url: null, error: 'No HTTP response' };
  }

  /**
   * Comprehensive domain verification. Stops at the first failing check.
   */
  async verifyDomain(
    candidate: string | null | undefined,
    options: VerifyOptions = {}
  ): Promise<VerificationResult> {
    const { requireDns = true, requireHttp = true } = options;

    const result: VerificationResult = {
      verified: false,
      domain: candidate || null,
      dnsValid: false,
      dnsIp: null,
      httpResponds: false,
      httpStatus: null,
      server: null,
      url: null,
      error: null,
    };

    if (!candidate) {
      result.error = 'Empty domain';
      return result;
    }

    const domain = extractDomain(candidate);
    if (!domain) {
      result.error = 'Invalid domain format';
      return result;
    }
    result.domain = domain;

    if (!requireDns && !requireHttp) {
      result.error = 'No verification checks requested';
      return result;
    }

    if (requireDns) {
      const dns = await this.domainHasDns(domain);
      result.dnsValid = dns.success;
      if (!dns.success) {
        result.error = dns.error;
        return result;
      }
      result.dnsIp = dns.address;
    }

    if (requireHttp) {
      const http = await this.domainRespondsToHttp(domain);
      result.httpResponds = http.success;
      if (!http.success) {
        result.error = http.error;
        return result;
      }
      result.httpStatus = http.status;
      result.server = http.server;
      result.url = http.url;
    }

    result.verified = true;
    return result;
  }

  /**
   * Verify list of domains, return only verified ones
   */
  async verifyMultipleDomains(domains: unknown[]): Promise<VerificationResult[]> {
    const verified: VerificationResult[] = [];

    for (const domain of domains) {
      if (typeof domain !== 'string' || !domain) {
        continue;
      }

      const result = await this.verifyDomain(domain);
      if (result.verified) {
        verified.push(result);
      }
    }

    return verified;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
