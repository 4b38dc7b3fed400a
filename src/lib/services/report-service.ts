import type { Recommendation, ScoredProspect } from '../types/business';

export const REPORT_HEADERS = [
  'Company',
  'Address',
  'Phone',
  'Website',
  'Domain_Verified',
  'Sales_Fit_Score',
  'Sales_Recommendation',
  'Has_WordPress',
  'Server_Detected',
  'Security_Headers_Count',
  'Reasons',
];

export interface ProspectSummary {
  total: number;
  verified: number;
  byRecommendation: Record<Recommendation, number>;
}

export class ReportService {
  /**
   * Render prospects as CSV, one row per business
   */
  toCsv(prospects: ScoredProspect[]): string {
    const rows = prospects.map((p) => [
      escapeCsvField(p.business.name),
      escapeCsvField(p.business.address),
      escapeCsvField(p.business.phone),
      escapeCsvField(p.business.website ?? ''),
      escapeCsvField(p.verification.verified ? p.verification.domain ?? '' : ''),
      String(p.score),
      p.recommendation,
      p.techStack?.wordpress.isWordPress ? 'Yes' : 'No',
      escapeCsvField(p.techStack?.server.server ?? 'None'),
      String(p.techStack ? Object.keys(p.techStack.server.securityHeaders).length : 0),
      escapeCsvField(p.reasons.join('; ')),
    ]);

    const csvLines = [REPORT_HEADERS.join(','), ...rows.map((row) => row.join(','))];

    return csvLines.join('\n');
  }

  summarize(prospects: ScoredProspect[]): ProspectSummary {
    const byRecommendation: Record<Recommendation, number> = { CONTACT: 0, MAYBE: 0, EXCLUDE: 0 };
    for (const prospect of prospects) {
      byRecommendation[prospect.recommendation]++;
    }

    return {
      total: prospects.length,
      verified: prospects.filter((p) => p.verification.verified).length,
      byRecommendation,
    };
  }

  /**
   * Highest scoring CONTACT prospects
   */
  topProspects(prospects: ScoredProspect[], limit = 10): ScoredProspect[] {
    return prospects
      .filter((p) => p.recommendation === 'CONTACT')
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }
}

export function escapeCsvField(field: string): string {
  if (field.includes(',') || field.includes('"') || field.includes('\n') || field.includes('\r')) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

export const reportService = new ReportService();
