import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { loadPipelineConfig } from '../src/lib/config/env';
import { businessLoaderService } from '../src/lib/services/business-loader-service';
import { createProspectPipeline } from '../src/lib/services/pipeline-factory';
import { reportService } from '../src/lib/services/report-service';
import { logError } from '../src/lib/utils/errors';

dotenv.config();

/**
 * Verified crawl for one city's business list
 * Run with: npm run crawl -- data/fort_smith_ar.csv [output.csv]
 */
async function crawlCity() {
  const [inputPath, outputArg] = process.argv.slice(2);

  if (!inputPath) {
    console.log('Usage: npm run crawl -- <businesses.csv|businesses.json> [output.csv]');
    console.log('\nCSV headers: name,address,phone,website');
    process.exitCode = 1;
    return;
  }

  const baseName = path.basename(inputPath, path.extname(inputPath));
  const outputPath = outputArg ?? path.join(path.dirname(inputPath), `${baseName}_verified_results.csv`);

  const config = loadPipelineConfig();
  const businesses = await businessLoaderService.loadBusinesses(inputPath);

  console.log('='.repeat(80));
  console.log(`VERIFIED BUSINESS CRAWL - ${baseName}`);
  console.log('='.repeat(80));
  console.log(`Started: ${new Date().toISOString()}`);
  console.log(`Businesses in list: ${businesses.length}\n`);

  if (businesses.length === 0) {
    console.log('❌ No businesses to process. Stopping.');
    return;
  }

  const pipeline = createProspectPipeline(config);
  const prospects = await pipeline.run(businesses);

  fs.writeFileSync(outputPath, reportService.toCsv(prospects) + '\n', 'utf-8');
  console.log(`\n✓ CSV created: ${outputPath}`);

  const summary = reportService.summarize(prospects);
  console.log('\nFinal Statistics:');
  console.log(`  Total businesses: ${summary.total}`);
  console.log(`  Domain verification passed: ${summary.verified}`);
  console.log(`  CONTACT (70+): ${summary.byRecommendation.CONTACT}`);
  console.log(`  MAYBE (50-69): ${summary.byRecommendation.MAYBE}`);
  console.log(`  EXCLUDE (<50): ${summary.byRecommendation.EXCLUDE}`);

  const top = reportService.topProspects(prospects);
  if (top.length > 0) {
    console.log('\nTop CONTACT Prospects:');
    top.forEach((p, i) => {
      console.log(`  #${i + 1} - ${p.business.name}: Score ${p.score} (${p.verification.domain})`);
    });
  }

  console.log(`\nCompleted: ${new Date().toISOString()}`);
}

crawlCity().catch((error) => {
  logError(error instanceof Error ? error : new Error(String(error)), { script: 'crawl-city' });
  process.exit(1);
});
