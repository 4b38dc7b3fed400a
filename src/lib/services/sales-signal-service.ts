import type { SalesSignals, TechStack } from '../types/tech-stack';

export const SIGNAL_WEIGHTS = {
  outdatedServer: 15,
  outdatedCms: 20,
  vulnerablePlugins: 25,
  poorSecurity: 10,
} as const;

/** Fewer present security headers than this counts as poor security */
export const MIN_SECURITY_HEADERS = 3;

export class SalesSignalService {
  /**
   * Extract sales-relevant signals from a tech stack.
   * The opportunity score is an uncapped sum.
   */
  extractSignals(techStack: TechStack): SalesSignals {
    const signals: SalesSignals = {
      hasOutdatedServer: false,
      hasOutdatedCms: false,
      hasVulnerablePlugins: false,
      hasPoorSecurity: false,
      opportunityScore: 0,
      painPoints: [],
    };

    if (techStack.server.outdated) {
      signals.hasOutdatedServer = true;
      signals.painPoints.push('Outdated server software - security risk');
      signals.opportunityScore += SIGNAL_WEIGHTS.outdatedServer;
    }

    const wordpress = techStack.wordpress;
    if (wordpress.isWordPress) {
      if (wordpress.outdatedCore) {
        signals.hasOutdatedCms = true;
        signals.painPoints.push(`Outdated WordPress ${wordpress.version ?? 'core'} - needs upgrade`);
        signals.opportunityScore += SIGNAL_WEIGHTS.outdatedCms;
      }

      if (wordpress.vulnerablePlugins.length > 0) {
        signals.hasVulnerablePlugins = true;
        signals.painPoints.push(`${wordpress.vulnerablePlugins.length} vulnerable plugins detected`);
        signals.opportunityScore += SIGNAL_WEIGHTS.vulnerablePlugins;
      }
    }

    if (Object.keys(techStack.server.securityHeaders).length < MIN_SECURITY_HEADERS) {
      signals.hasPoorSecurity = true;
      signals.painPoints.push('Missing critical security headers');
      signals.opportunityScore += SIGNAL_WEIGHTS.poorSecurity;
    }

    return signals;
  }
}

export const salesSignalService = new SalesSignalService();
