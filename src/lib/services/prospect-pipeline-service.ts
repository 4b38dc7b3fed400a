import { processBatch } from '../utils/batch';
import { logError } from '../utils/errors';
import { buildDomainCandidates } from '../utils/domain';
import type { DomainVerifierService } from './domain-verifier-service';
import type { TechFingerprintService } from './tech-fingerprint-service';
import type { SalesSignalService } from './sales-signal-service';
import type { ViabilityScorerService } from './viability-scorer-service';
import type { BusinessRecord, DomainSource, ScoredProspect } from '../types/business';
import type { VerificationResult } from '../types/verification';

export interface ProspectPipelineDeps {
  verifier: DomainVerifierService;
  fingerprinter: TechFingerprintService;
  signals: SalesSignalService;
  scorer: ViabilityScorerService;
}

export interface PipelineOptions {
  concurrency?: number;
  requireDns?: boolean;
  requireHttp?: boolean;
}

export interface RunOptions {
  onProgress?: (completed: number, total: number, prospect: ScoredProspect) => void;
}

export interface DomainResolution {
  verification: VerificationResult;
  source: DomainSource;
  candidatesTried: string[];
}

/**
 * Feeds businesses through verification, fingerprinting, signal extraction
 * and scoring
 */
export class ProspectPipelineService {
  private readonly concurrency: number;
  private readonly requireDns: boolean;
  private readonly requireHttp: boolean;

  constructor(
    private readonly deps: ProspectPipelineDeps,
    options: PipelineOptions = {}
  ) {
    this.concurrency = options.concurrency ?? 1;
    this.requireDns = options.requireDns ?? true;
    this.requireHttp = options.requireHttp ?? true;
  }

  /**
   * Verify the provided website, falling back to domains guessed from the
   * business name. The first verified candidate wins.
   */
  async resolveBusinessDomain(business: BusinessRecord): Promise<DomainResolution> {
    const candidatesTried: string[] = [];
    const verifyOptions = { requireDns: this.requireDns, requireHttp: this.requireHttp };

    const website = business.website?.trim();
    if (website) {
      candidatesTried.push(website);
      const verification = await this.deps.verifier.verifyDomain(website, verifyOptions);
      if (verification.verified) {
        return { verification, source: 'provided', candidatesTried };
      }
      console.log(
        `[ProspectPipeline] Provided website ${website} for ${business.name} failed: ${verification.error}`
      );
    }

    for (const candidate of buildDomainCandidates(business.name)) {
      candidatesTried.push(candidate);
      const verification = await this.deps.verifier.verifyDomain(candidate, verifyOptions);
      if (verification.verified) {
        console.log(`[ProspectPipeline] Guessed ${candidate} for ${business.name}`);
        return { verification, source: 'guessed', candidatesTried };
      }
    }

    return {
      verification: {
        verified: false,
        domain: null,
        dnsValid: false,
        dnsIp: null,
        httpResponds: false,
        httpStatus: null,
        server: null,
        url: null,
        error: `Could not verify domain for ${business.name}`,
      },
      source: 'none',
      candidatesTried,
    };
  }

  /**
   * Verify, fingerprint and score one business
   */
  async processBusiness(business: BusinessRecord): Promise<ScoredProspect> {
    const { verification, source, candidatesTried } = await this.resolveBusinessDomain(business);

    if (!verification.verified || !verification.domain) {
      return {
        business,
        verification,
        domainSource: source,
        candidatesTried,
        techStack: null,
        signals: null,
        score: 0,
        recommendation: 'EXCLUDE',
        reasons: [verification.error ?? 'Domain not verified'],
      };
    }

    const techStack = await this.deps.fingerprinter.analyzeTechStack(
      verification.url ?? verification.domain
    );
    const signals = this.deps.signals.extractSignals(techStack);
    const assessment = await this.deps.scorer.assess({
      businessName: business.name,
      techStack,
      signals,
      location: locationFromAddress(business.address),
      domain: verification.domain,
    });

    return {
      business,
      verification,
      domainSource: source,
      candidatesTried,
      techStack,
      signals,
      ...assessment,
    };
  }

  /**
   * Process every business, keeping input order
   */
  async run(businesses: BusinessRecord[], options: RunOptions = {}): Promise<ScoredProspect[]> {
    console.log(
      `[ProspectPipeline] Starting run over ${businesses.length} businesses (concurrency ${this.concurrency})`
    );

    const prospects = await processBatch(businesses, (business) => this.processBusiness(business), {
      concurrency: this.concurrency,
      onProgress: (completed, total, prospect) => {
        options.onProgress?.(completed, total, prospect);
        if (completed % 10 === 0 || completed === total) {
          console.log(`[ProspectPipeline] Progress: ${completed}/${total} businesses processed`);
        }
      },
      onError: (error, business) => {
        logError(error, { businessName: business.name });
      },
    });

    const verified = prospects.filter((p) => p.verification.verified).length;
    console.log(`[ProspectPipeline] Completed: ${verified}/${prospects.length} domains verified`);

    return prospects;
  }
}

/**
 * "2324 Garrison Avenue, Fort Smith, AR 72901" -> "Fort Smith, AR 72901"
 */
export function locationFromAddress(address: string): string | null {
  const commaIndex = address.indexOf(',');
  if (commaIndex === -1) return null;
  const location = address.slice(commaIndex + 1).trim();
  return location || null;
}
