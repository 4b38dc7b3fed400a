export const SECURITY_HEADERS = [
  'Strict-Transport-Security',
  'Content-Security-Policy',
  'X-Content-Type-Options',
  'X-Frame-Options',
  'X-XSS-Protection',
] as const;

export type SecurityHeaderName = (typeof SECURITY_HEADERS)[number];

export interface ServerInfo {
  server: string | null;
  version: string | null;
  outdated: boolean;
  framework: string | null;
  poweredBy: string | null;
  securityHeaders: Partial<Record<SecurityHeaderName, string>>;
}

export interface VulnerablePlugin {
  name: string;
  version: string;
  vulnerabilities: number;
}

export interface WordPressInfo {
  isWordPress: boolean;
  version: string | null;
  plugins: string[];
  vulnerablePlugins: VulnerablePlugin[];
  vulnerabilities: number;
  outdatedCore: boolean;
}

export type CmsType = 'Drupal' | 'Joomla' | 'Magento';

export interface OtherCmsInfo {
  cmsType: CmsType | null;
  version: string | null;
  outdated: boolean;
}

export interface TechStack {
  server: ServerInfo;
  wordpress: WordPressInfo;
  otherCms: OtherCmsInfo;
  scanTimestamp: string; // ISO timestamp
}

export interface SalesSignals {
  hasOutdatedServer: boolean;
  hasOutdatedCms: boolean;
  hasVulnerablePlugins: boolean;
  hasPoorSecurity: boolean;
  opportunityScore: number;
  painPoints: string[];
}
