export * from './lib/types/business';
export * from './lib/types/verification';
export * from './lib/types/tech-stack';
export { extractDomain, buildDomainCandidates, buildNamePatterns } from './lib/utils/domain';
export { LeadPipelineError, ConfigError, DataLoadError, ScannerError } from './lib/utils/errors';
export { loadPipelineConfig, loadExclusionKeywords, type PipelineConfig } from './lib/config/env';
export { VerificationCache } from './lib/services/verification-cache';
export { DomainVerifierService, type DomainVerifierOptions, type DnsLookup } from './lib/services/domain-verifier-service';
export { TechFingerprintService, type TechFingerprintOptions } from './lib/services/tech-fingerprint-service';
export {
  NoopVulnerabilityScanner,
  WpscanScanner,
  parseWpscanReport,
  type VulnerabilityScanner,
  type WordPressScanReport,
} from './lib/services/vulnerability-scanner-service';
export { SalesSignalService } from './lib/services/sales-signal-service';
export {
  ViabilityScorerService,
  recommendationFor,
  type ProspectAssessor,
  type ScoreInput,
} from './lib/services/viability-scorer-service';
export { ProspectPipelineService } from './lib/services/prospect-pipeline-service';
export { createProspectPipeline } from './lib/services/pipeline-factory';
export { BusinessLoaderService } from './lib/services/business-loader-service';
export { ReportService, escapeCsvField } from './lib/services/report-service';
