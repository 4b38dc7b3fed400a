import type { VerificationResult } from './verification';
import type { SalesSignals, TechStack } from './tech-stack';

export interface BusinessRecord {
  name: string;
  address: string;
  phone: string;
  website?: string;
}

export type Recommendation = 'CONTACT' | 'MAYBE' | 'EXCLUDE';

export type DomainSource = 'provided' | 'guessed' | 'none';

export interface ViabilityAssessment {
  score: number;
  recommendation: Recommendation;
  reasons: string[];
}

export interface ScoredProspect extends ViabilityAssessment {
  business: BusinessRecord;
  verification: VerificationResult;
  domainSource: DomainSource;
  candidatesTried: string[];
  techStack: TechStack | null; // null when no domain verified
  signals: SalesSignals | null;
}
