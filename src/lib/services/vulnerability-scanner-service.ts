import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';
import { ScannerError, logError, getErrorMessage } from '../utils/errors';
import type { VulnerablePlugin } from '../types/tech-stack';

export interface WordPressScanReport {
  version: string | null;
  plugins: string[];
  vulnerablePlugins: VulnerablePlugin[];
}

/**
 * External WordPress vulnerability scanning capability.
 * Implementations resolve to null when no report could be produced.
 */
export interface VulnerabilityScanner {
  readonly name: string;
  scanWordPress(url: string): Promise<WordPressScanReport | null>;
}

export class NoopVulnerabilityScanner implements VulnerabilityScanner {
  readonly name = 'none';

  async scanWordPress(): Promise<WordPressScanReport | null> {
    return null;
  }
}

export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeout: number }
) => Promise<{ stdout: string }>;

const execFileAsync = promisify(execFile);

const defaultRunner: CommandRunner = async (file, args, { timeout }) => {
  try {
    const { stdout } = await execFileAsync(file, args, {
      timeout,
      maxBuffer: 20 * 1024 * 1024,
      encoding: 'utf-8',
    });
    return { stdout };
  } catch (error) {
    // wpscan exits non-zero when it finds vulnerabilities but still prints the report
    if (
      error instanceof Error &&
      'stdout' in error &&
      typeof error.stdout === 'string' &&
      error.stdout.trim().startsWith('{')
    ) {
      return { stdout: error.stdout };
    }
    throw error;
  }
};

// wpscan reports versions as { number } objects, or null/false when unknown
const versionSchema = z.unknown();

const wpscanReportSchema = z
  .object({
    version: versionSchema,
    plugins: z
      .record(
        z
          .object({
            version: versionSchema,
            vulnerabilities: z.array(z.unknown()).nullish(),
          })
          .passthrough()
      )
      .nullish(),
  })
  .passthrough();

function versionString(value: unknown): string | null {
  if (typeof value === 'string' && value) return value;
  if (value && typeof value === 'object' && 'number' in value && typeof value.number === 'string') {
    return value.number;
  }
  return null;
}

/**
 * Parse the JSON report printed by `wpscan --format json`
 */
export function parseWpscanReport(stdout: string): WordPressScanReport {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new ScannerError('wpscan output is not JSON', { length: stdout.length });
  }

  const parsed = wpscanReportSchema.safeParse(json);
  if (!parsed.success) {
    throw new ScannerError('Unexpected wpscan report shape', {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }

  const plugins: string[] = [];
  const vulnerablePlugins: VulnerablePlugin[] = [];

  for (const [name, plugin] of Object.entries(parsed.data.plugins ?? {})) {
    plugins.push(name);
    const vulnerabilities = plugin.vulnerabilities ?? [];
    if (vulnerabilities.length > 0) {
      vulnerablePlugins.push({
        name,
        version: versionString(plugin.version) ?? 'Unknown',
        vulnerabilities: vulnerabilities.length,
      });
    }
  }

  return {
    version: versionString(parsed.data.version),
    plugins,
    vulnerablePlugins,
  };
}

export interface WpscanScannerOptions {
  binaryPath?: string;
  timeout?: number;
  runner?: CommandRunner;
}

/**
 * Shells out to the wpscan CLI
 */
export class WpscanScanner implements VulnerabilityScanner {
  readonly name = 'wpscan';
  private readonly binaryPath: string;
  private readonly timeout: number;
  private readonly runner: CommandRunner;

  constructor(options: WpscanScannerOptions = {}) {
    this.binaryPath = options.binaryPath ?? 'wpscan';
    this.timeout = options.timeout ?? 30000;
    this.runner = options.runner ?? defaultRunner;
  }

  async scanWordPress(url: string): Promise<WordPressScanReport | null> {
    const args = [
      '--url',
      url,
      '--enumerate',
      'vp,ap',
      '--plugins-detection',
      'aggressive',
      '--format',
      'json',
      '--no-banner',
      '--disable-tls-checks',
    ];

    try {
      const { stdout } = await this.runner(this.binaryPath, args, { timeout: this.timeout });
      return parseWpscanReport(stdout);
    } catch (error) {
      // Missing binary, timeout, non-zero exit or bad output: carry on without a report
      if (error instanceof ScannerError) {
        logError(error, { url });
      } else {
        console.log(`[WpscanScanner] Scan skipped for ${url}: ${getErrorMessage(error)}`);
      }
      return null;
    }
  }
}
