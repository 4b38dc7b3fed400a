import type { AxiosInstance, AxiosResponse } from 'axios';
import * as cheerio from 'cheerio';
import { attempt, type Result } from '../utils/result';
import { toUrl } from '../utils/domain';
import {
  bodyText,
  createHttpClient,
  insecureHttpsAgent,
  readHeader,
  MAX_REDIRECTS,
} from '../utils/http';
import { NoopVulnerabilityScanner, type VulnerabilityScanner } from './vulnerability-scanner-service';
import {
  SECURITY_HEADERS,
  type CmsType,
  type OtherCmsInfo,
  type ServerInfo,
  type TechStack,
  type WordPressInfo,
} from '../types/tech-stack';

export interface TechFingerprintOptions {
  http?: AxiosInstance;
  timeout?: number;
  scanner?: VulnerabilityScanner;
}

const WORDPRESS_INDICATORS = [
  'wp-content',
  'wp-includes',
  '/wp-json/',
  'wordpress',
  '<meta name="generator" content="wordpress',
];

// Checked in order, first match wins
const CMS_INDICATORS: Array<{ cmsType: CmsType; keywords: string[] }> = [
  { cmsType: 'Drupal', keywords: ['drupal', 'sites/all/modules'] },
  { cmsType: 'Joomla', keywords: ['joomla', 'administrator/index.php'] },
  { cmsType: 'Magento', keywords: ['magento', 'var/log/system.log'] },
];

const WP_VERSION_PATTERN = /\$wp_version\s*=\s*['"]([^'"]+)['"]/;
const APACHE_VERSION_PATTERN = /Apache\/(\d+\.\d+)/;
const DRUPAL_VERSION_PATTERN = /drupal\s+(\d+\.\d+)/;

export function emptyServerInfo(): ServerInfo {
  return {
    server: null,
    version: null,
    outdated: false,
    framework: null,
    poweredBy: null,
    securityHeaders: {},
  };
}

export function emptyWordPressInfo(): WordPressInfo {
  return {
    isWordPress: false,
    version: null,
    plugins: [],
    vulnerablePlugins: [],
    vulnerabilities: 0,
    outdatedCore: false,
  };
}

export function emptyOtherCmsInfo(): OtherCmsInfo {
  return { cmsType: null, version: null, outdated: false };
}

function majorVersion(version: string | null): number | null {
  if (!version) return null;
  const major = parseInt(version.split('.')[0], 10);
  return Number.isNaN(major) ? null : major;
}

/**
 * Fingerprints server software, CMS and security headers of a live site.
 * No method throws: failed requests leave fields at their defaults.
 */
export class TechFingerprintService {
  private readonly http: AxiosInstance;
  private readonly timeout: number;
  private readonly scanner: VulnerabilityScanner;

  constructor(options: TechFingerprintOptions = {}) {
    this.http = options.http ?? createHttpClient();
    this.timeout = options.timeout ?? 5000;
    this.scanner = options.scanner ?? new NoopVulnerabilityScanner();
  }

  /**
   * Detect server type and version from HTTP headers
   */
  async detectServerInfo(url: string): Promise<ServerInfo> {
    const response = await this.head(toUrl(url));
    if (!response.ok) {
      console.log(`[TechFingerprint] Header probe failed for ${url}: ${response.error}`);
      return emptyServerInfo();
    }
    return this.inspectHeaders(response.value.headers);
  }

  /**
   * Detect WordPress from page content, then look for its version and plugins
   */
  async detectWordPress(url: string): Promise<WordPressInfo> {
    const target = toUrl(url);
    const page = await this.fetchText(target);
    if (!page.ok) {
      console.log(`[TechFingerprint] Homepage fetch failed for ${url}: ${page.error}`);
      return emptyWordPressInfo();
    }
    return this.inspectWordPress(target, page.value);
  }

  /**
   * Detect Drupal, Joomla or Magento from page content
   */
  async detectOtherCms(url: string): Promise<OtherCmsInfo> {
    const page = await this.fetchText(toUrl(url));
    if (!page.ok) {
      return emptyOtherCmsInfo();
    }
    return this.inspectOtherCms(page.value);
  }

  /**
   * Full tech stack. The homepage is fetched once for both CMS detectors.
   */
  async analyzeTechStack(url: string): Promise<TechStack> {
    const target = toUrl(url);
    console.log(`[TechFingerprint] Analyzing ${target}`);

    const server = await this.detectServerInfo(target);
    const page = await this.fetchText(target);

    let wordpress = emptyWordPressInfo();
    let otherCms = emptyOtherCmsInfo();
    if (page.ok) {
      wordpress = await this.inspectWordPress(target, page.value);
      otherCms = this.inspectOtherCms(page.value);
    } else {
      console.log(`[TechFingerprint] Homepage fetch failed for ${target}: ${page.error}`);
    }

    return {
      server,
      wordpress,
      otherCms,
      scanTimestamp: new Date().toISOString(),
    };
  }

  private inspectHeaders(headers: AxiosResponse['headers']): ServerInfo {
    const info = emptyServerInfo();

    const server = readHeader(headers, 'Server');
    if (server) {
      info.server = server;
      if (server.includes('Apache')) {
        const match = server.match(APACHE_VERSION_PATTERN);
        if (match) {
          info.version = match[1];
          // Apache 2.2 reached end of life in 2017
          info.outdated = match[1].startsWith('2.2');
        }
      }
    }

    const poweredBy = readHeader(headers, 'X-Powered-By');
    if (poweredBy) {
      info.poweredBy = poweredBy;
      if (poweredBy.includes('PHP')) {
        info.framework = 'PHP';
      }
    }

    for (const name of SECURITY_HEADERS) {
      const value = readHeader(headers, name);
      if (value !== null) {
        info.securityHeaders[name] = value;
      }
    }

    return info;
  }

  private async inspectWordPress(url: string, html: string): Promise<WordPressInfo> {
    const content = html.toLowerCase();
    if (!WORDPRESS_INDICATORS.some((indicator) => content.includes(indicator))) {
      return emptyWordPressInfo();
    }

    const info = emptyWordPressInfo();
    info.isWordPress = true;
    info.version = (await this.fetchCoreVersion(url)) ?? this.generatorVersion(html);

    const report = await this.scanner.scanWordPress(url);
    if (report) {
      info.plugins = report.plugins;
      info.vulnerablePlugins = report.vulnerablePlugins;
      info.vulnerabilities = report.vulnerablePlugins.length;
      if (report.version) {
        info.version = report.version;
      }
    }

    const major = majorVersion(info.version);
    info.outdatedCore = major !== null && major < 5;

    return info;
  }

  private async fetchCoreVersion(url: string): Promise<string | null> {
    const response = await this.fetchText(`${url}/wp-includes/version.php`);
    if (!response.ok) return null;
    const match = response.value.match(WP_VERSION_PATTERN);
    return match ? match[1] : null;
  }

  private generatorVersion(html: string): string | null {
    const $ = cheerio.load(html);
    const generators = $('meta[name="generator"]')
      .map((_, element) => $(element).attr('content') ?? '')
      .get();

    for (const generator of generators) {
      const match = generator.match(/wordpress\s+([\d.]+)/i);
      if (match) return match[1];
    }
    return null;
  }

  private inspectOtherCms(html: string): OtherCmsInfo {
    const content = html.toLowerCase();
    const info = emptyOtherCmsInfo();

    const detected = CMS_INDICATORS.find(({ keywords }) =>
      keywords.some((keyword) => content.includes(keyword))
    );
    if (!detected) {
      return info;
    }

    info.cmsType = detected.cmsType;
    if (detected.cmsType === 'Drupal') {
      const match = content.match(DRUPAL_VERSION_PATTERN);
      if (match) {
        info.version = match[1];
        const major = majorVersion(info.version);
        info.outdated = major !== null && major < 8;
      }
    }

    return info;
  }

  private head(url: string): Promise<Result<AxiosResponse>> {
    return attempt(() =>
      this.http.head(url, {
        timeout: this.timeout,
        maxRedirects: MAX_REDIRECTS,
        httpsAgent: insecureHttpsAgent,
        validateStatus: () => true,
      })
    );
  }

  private async fetchText(url: string): Promise<Result<string>> {
    const response = await attempt(() =>
      this.http.get(url, {
        timeout: this.timeout,
        maxRedirects: MAX_REDIRECTS,
        httpsAgent: insecureHttpsAgent,
        responseType: 'text',
        validateStatus: () => true,
      })
    );
    if (!response.ok) return response;
    return { ok: true, value: bodyText(response.value.data) };
  }
}
