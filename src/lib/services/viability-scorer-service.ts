import { z } from 'zod';
import { getErrorMessage } from '../utils/errors';
import type { Recommendation, ViabilityAssessment } from '../types/business';
import type { SalesSignals, TechStack } from '../types/tech-stack';

export const BASE_SCORE = 50;
export const CONTACT_THRESHOLD = 70;
export const MAYBE_THRESHOLD = 50;

export const SCORE_WEIGHTS = {
  wordpress: 20,
  serverDetected: 15,
  vulnerablePlugins: 25,
  outdatedCore: 15,
  noSecurityHeaders: 10,
} as const;

export interface ScoreInput {
  businessName: string;
  techStack: TechStack;
  signals: SalesSignals;
  location?: string | null;
  domain?: string | null;
  osintFindings?: number;
}

/**
 * Optional external judgement (for example an LLM) consulted before the
 * heuristic. Its output is untrusted and validated.
 */
export interface ProspectAssessor {
  readonly name: string;
  assess(input: ScoreInput): Promise<unknown>;
}

const assessorOutputSchema = z.object({
  score: z.number().min(0).max(100),
  recommendation: z.enum(['CONTACT', 'MAYBE', 'EXCLUDE']),
  reasons: z.array(z.string()).default([]),
});

export interface ViabilityScorerOptions {
  exclusionKeywords: string[];
  assessor?: ProspectAssessor;
}

export function recommendationFor(score: number): Recommendation {
  if (score >= CONTACT_THRESHOLD) return 'CONTACT';
  if (score >= MAYBE_THRESHOLD) return 'MAYBE';
  return 'EXCLUDE';
}

export function clampScore(score: number): number {
  return Math.max(0, Math.min(100, score));
}

export class ViabilityScorerService {
  private readonly exclusionKeywords: string[];
  private readonly assessor: ProspectAssessor | null;

  constructor(options: ViabilityScorerOptions) {
    this.exclusionKeywords = options.exclusionKeywords
      .map((keyword) => keyword.trim().toLowerCase())
      .filter(Boolean);
    this.assessor = options.assessor ?? null;
  }

  /**
   * First exclusion keyword contained in the business name
   */
  findExclusionKeyword(businessName: string): string | null {
    const name = businessName.toLowerCase();
    return this.exclusionKeywords.find((keyword) => name.includes(keyword)) ?? null;
  }

  /**
   * Deterministic rule-based score. Every rule reads the tech stack; signals
   * are accepted alongside it but do not change the result.
   */
  scoreHeuristic(businessName: string, techStack: TechStack, _signals: SalesSignals): ViabilityAssessment {
    const excluded = this.exclusionResult(businessName);
    if (excluded) {
      return excluded;
    }

    let score = BASE_SCORE;
    const reasons: string[] = [];

    if (techStack.wordpress.isWordPress) {
      score += SCORE_WEIGHTS.wordpress;
      reasons.push('WordPress detected');
    }

    if (techStack.server.server) {
      score += SCORE_WEIGHTS.serverDetected;
      reasons.push(`Server detected: ${techStack.server.server}`);
    }

    const vulnerableCount = techStack.wordpress.vulnerablePlugins.length;
    if (vulnerableCount > 0) {
      score += SCORE_WEIGHTS.vulnerablePlugins;
      reasons.push(`${vulnerableCount} vulnerable plugins`);
    }

    if (techStack.wordpress.outdatedCore) {
      score += SCORE_WEIGHTS.outdatedCore;
      reasons.push('Outdated WordPress core');
    }

    if (Object.keys(techStack.server.securityHeaders).length === 0) {
      score += SCORE_WEIGHTS.noSecurityHeaders;
      reasons.push('Missing security headers');
    }

    score = clampScore(score);

    return { score, recommendation: recommendationFor(score), reasons };
  }

  /**
   * Score a prospect. Exclusion keywords always win; the assessor, when
   * configured, is tried before the heuristic.
   */
  async assess(input: ScoreInput): Promise<ViabilityAssessment> {
    const excluded = this.exclusionResult(input.businessName);
    if (excluded) {
      return excluded;
    }

    if (this.assessor) {
      try {
        const output = assessorOutputSchema.safeParse(await this.assessor.assess(input));
        if (output.success) {
          return { ...output.data, score: Math.round(output.data.score) };
        }
        console.log(
          `[ViabilityScorer] ${this.assessor.name} returned invalid output for ${input.businessName}, using heuristic`
        );
      } catch (error) {
        console.log(
          `[ViabilityScorer] ${this.assessor.name} failed for ${input.businessName}: ${getErrorMessage(error)}`
        );
      }
    }

    return this.scoreHeuristic(input.businessName, input.techStack, input.signals);
  }

  private exclusionResult(businessName: string): ViabilityAssessment | null {
    const keyword = this.findExclusionKeyword(businessName);
    if (!keyword) return null;
    return {
      score: 0,
      recommendation: 'EXCLUDE',
      reasons: [`Matches exclusion keyword: ${keyword}`],
    };
  }
}
