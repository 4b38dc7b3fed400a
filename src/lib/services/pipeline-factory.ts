import { loadExclusionKeywords, type PipelineConfig } from '../config/env';
import { DomainVerifierService } from './domain-verifier-service';
import { TechFingerprintService } from './tech-fingerprint-service';
import { SalesSignalService } from './sales-signal-service';
import { ViabilityScorerService, type ProspectAssessor } from './viability-scorer-service';
import { ProspectPipelineService } from './prospect-pipeline-service';
import {
  NoopVulnerabilityScanner,
  WpscanScanner,
  type VulnerabilityScanner,
} from './vulnerability-scanner-service';

export interface PipelineOverrides {
  exclusionKeywords?: string[];
  scanner?: VulnerabilityScanner;
  assessor?: ProspectAssessor;
}

/**
 * Wire a pipeline from configuration
 */
export function createProspectPipeline(
  config: PipelineConfig,
  overrides: PipelineOverrides = {}
): ProspectPipelineService {
  const scanner =
    overrides.scanner ??
    (config.wpscan.enabled
      ? new WpscanScanner({ binaryPath: config.wpscan.binaryPath, timeout: config.wpscan.timeout })
      : new NoopVulnerabilityScanner());

  const exclusionKeywords =
    overrides.exclusionKeywords ?? loadExclusionKeywords(config.exclusionKeywordsFile);

  console.log(
    `[PipelineFactory] Scanner: ${scanner.name}, exclusion keywords: ${exclusionKeywords.length}, ` +
      `timeout: ${config.probe.timeout}ms, retries: ${config.probe.retries}`
  );

  return new ProspectPipelineService(
    {
      verifier: new DomainVerifierService(config.probe),
      fingerprinter: new TechFingerprintService({ timeout: config.probe.timeout, scanner }),
      signals: new SalesSignalService(),
      scorer: new ViabilityScorerService({ exclusionKeywords, assessor: overrides.assessor }),
    },
    {
      concurrency: config.concurrency,
      requireDns: config.requireDns,
      requireHttp: config.requireHttp,
    }
  );
}
