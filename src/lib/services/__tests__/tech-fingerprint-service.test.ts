import { TechFingerprintService } from '../tech-fingerprint-service';
import type { VulnerabilityScanner, WordPressScanReport } from '../vulnerability-scanner-service';
import { createStubHttp, routes, type StubOutcome } from './fixtures/http-stub';

const WP_HOMEPAGE = `<html><head>
<link rel="stylesheet" href="/wp-content/themes/twentyten/style.css">
</head><body>Welcome</body></html>`;

function fingerprinter(table: Record<string, StubOutcome>, scanner?: VulnerabilityScanner) {
  const { http, calls } = createStubHttp(routes(table));
  return { service: new TechFingerprintService({ http, scanner }), calls };
}

function fixedScanner(report: WordPressScanReport | null) {
  const scanWordPress = jest.fn(async (_url: string) => report);
  const scanner: VulnerabilityScanner = { name: 'fixed', scanWordPress };
  return { scanner, scanWordPress };
}

describe('TechFingerprintService', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('detectServerInfo', () => {
    test('should read server, framework and security headers', async () => {
      const { service, calls } = fingerprinter({
        'HEAD https://example.com': {
          headers: {
            Server: 'Apache/2.2.15 (CentOS)',
            'X-Powered-By': 'PHP/5.4.16',
            'x-frame-options': 'SAMEORIGIN',
            'Strict-Transport-Security': 'max-age=63072000',
          },
        },
      });

      const info = await service.detectServerInfo('example.com');

      expect(info).toEqual({
        server: 'Apache/2.2.15 (CentOS)',
        version: '2.2',
        outdated: true,
        framework: 'PHP',
        poweredBy: 'PHP/5.4.16',
        securityHeaders: {
          'Strict-Transport-Security': 'max-age=63072000',
          'X-Frame-Options': 'SAMEORIGIN',
        },
      });
      expect(calls).toEqual(['HEAD https://example.com']);
    });

    test('should not flag current Apache releases', async () => {
      const { service } = fingerprinter({
        'HEAD https://example.com': { headers: { Server: 'Apache/2.4.57 (Debian)' } },
      });

      const info = await service.detectServerInfo('https://example.com');

      expect(info.version).toBe('2.4');
      expect(info.outdated).toBe(false);
    });

    test('should leave version empty for other servers', async () => {
      const { service } = fingerprinter({
        'HEAD https://example.com': { headers: { Server: 'nginx/1.25.3', 'X-Powered-By': 'Express' } },
      });

      const info = await service.detectServerInfo('example.com');

      expect(info.server).toBe('nginx/1.25.3');
      expect(info.version).toBeNull();
      expect(info.poweredBy).toBe('Express');
      expect(info.framework).toBeNull();
    });

    test('should return defaults when the request fails', async () => {
      const { service } = fingerprinter({});

      await expect(service.detectServerInfo('example.com')).resolves.toEqual({
        server: null,
        version: null,
        outdated: false,
        framework: null,
        poweredBy: null,
        securityHeaders: {},
      });
    });
  });

  describe('detectWordPress', () => {
    test('should read the core version from version.php', async () => {
      const { service, calls } = fingerprinter({
        'GET https://example.com': { body: WP_HOMEPAGE },
        'GET https://example.com/wp-includes/version.php': {
          body: "<?php\n$wp_version = '4.9.8';\n",
        },
      });

      const info = await service.detectWordPress('example.com');

      expect(info.isWordPress).toBe(true);
      expect(info.version).toBe('4.9.8');
      expect(info.outdatedCore).toBe(true);
      expect(calls).toEqual([
        'GET https://example.com',
        'GET https://example.com/wp-includes/version.php',
      ]);
    });

    test('should fall back to the generator meta tag', async () => {
      const { service } = fingerprinter({
        'GET https://example.com': {
          body: '<html><head><meta name="generator" content="WordPress 6.4.2"></head></html>',
        },
        'GET https://example.com/wp-includes/version.php': { status: 404, body: '' },
      });

      const info = await service.detectWordPress('example.com');

      expect(info.isWordPress).toBe(true);
      expect(info.version).toBe('6.4.2');
      expect(info.outdatedCore).toBe(false);
    });

    test('should stop after the homepage when no indicator is present', async () => {
      const { service, calls } = fingerprinter({
        'GET https://example.com': { body: '<html><body>Hello</body></html>' },
      });

      const info = await service.detectWordPress('example.com');

      expect(info.isWordPress).toBe(false);
      expect(info.version).toBeNull();
      expect(calls).toEqual(['GET https://example.com']);
    });

    test('should merge the vulnerability scan report', async () => {
      const { scanner, scanWordPress } = fixedScanner({
        version: '4.7',
        plugins: ['contact-form-7', 'akismet'],
        vulnerablePlugins: [{ name: 'contact-form-7', version: '4.1', vulnerabilities: 3 }],
      });
      const { service } = fingerprinter(
        {
          'GET https://example.com': { body: WP_HOMEPAGE },
          'GET https://example.com/wp-includes/version.php': { status: 403, body: 'Forbidden' },
        },
        scanner
      );

      const info = await service.detectWordPress('example.com');

      expect(scanWordPress).toHaveBeenCalledWith('https://example.com');
      expect(info).toEqual({
        isWordPress: true,
        version: '4.7',
        plugins: ['contact-form-7', 'akismet'],
        vulnerablePlugins: [{ name: 'contact-form-7', version: '4.1', vulnerabilities: 3 }],
        vulnerabilities: 1,
        outdatedCore: true,
      });
    });

    test('should keep page findings when the scanner has no report', async () => {
      const { scanner } = fixedScanner(null);
      const { service } = fingerprinter(
        {
          'GET https://example.com': { body: WP_HOMEPAGE },
          'GET https://example.com/wp-includes/version.php': { body: "$wp_version = '6.5';" },
        },
        scanner
      );

      const info = await service.detectWordPress('example.com');

      expect(info.version).toBe('6.5');
      expect(info.plugins).toEqual([]);
      expect(info.vulnerabilities).toBe(0);
    });
  });

  describe('detectOtherCms', () => {
    test('should detect Drupal with its version', async () => {
      const { service } = fingerprinter({
        'GET https://example.com': { body: '<footer>Powered by Drupal 7.59</footer>' },
      });

      await expect(service.detectOtherCms('example.com')).resolves.toEqual({
        cmsType: 'Drupal',
        version: '7.59',
        outdated: true,
      });
    });

    test('should prefer Drupal over Joomla when both match', async () => {
      const { service } = fingerprinter({
        'GET https://example.com': { body: 'drupal and joomla comparison' },
      });

      await expect(service.detectOtherCms('example.com')).resolves.toEqual({
        cmsType: 'Drupal',
        version: null,
        outdated: false,
      });
    });

    test('should detect Joomla and Magento', async () => {
      const joomla = fingerprinter({
        'GET https://example.com': { body: '<a href="/administrator/index.php">Admin</a>' },
      });
      const magento = fingerprinter({
        'GET https://example.com': { body: '<script src="/static/Magento_Ui/js/core.js"></script>' },
      });

      expect((await joomla.service.detectOtherCms('example.com')).cmsType).toBe('Joomla');
      expect((await magento.service.detectOtherCms('example.com')).cmsType).toBe('Magento');
    });

    test('should return an empty result when nothing matches', async () => {
      const { service } = fingerprinter({ 'GET https://example.com': { body: 'plain page' } });

      await expect(service.detectOtherCms('example.com')).resolves.toEqual({
        cmsType: null,
        version: null,
        outdated: false,
      });
    });
  });

  describe('analyzeTechStack', () => {
    test('should fetch the homepage once for both detectors', async () => {
      const { service, calls } = fingerprinter({
        'HEAD https://example.com': { headers: { Server: 'Apache/2.4.41' } },
        'GET https://example.com': { body: WP_HOMEPAGE },
        'GET https://example.com/wp-includes/version.php': { body: "$wp_version = '5.8.1';" },
      });

      const stack = await service.analyzeTechStack('example.com');

      expect(stack.server.server).toBe('Apache/2.4.41');
      expect(stack.wordpress.isWordPress).toBe(true);
      expect(stack.wordpress.version).toBe('5.8.1');
      expect(stack.otherCms.cmsType).toBeNull();
      expect(stack.scanTimestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
      expect(calls).toEqual([
        'HEAD https://example.com',
        'GET https://example.com',
        'GET https://example.com/wp-includes/version.php',
      ]);
    });

    test('should return defaults for an unreachable site', async () => {
      const { service } = fingerprinter({});

      const stack = await service.analyzeTechStack('http://example.com');

      expect(stack.server.server).toBeNull();
      expect(stack.wordpress.isWordPress).toBe(false);
      expect(stack.otherCms.cmsType).toBeNull();
    });
  });
});
