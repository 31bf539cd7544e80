#!/usr/bin/env tsx
import { config as dotenvConfig } from 'dotenv';
import { getEnvConfig } from '../lib/config.js';
import { runUnfulfilledOrdersReport } from '../lib/unfulfilledOrdersReport.js';

async function main() {
  dotenvConfig();
  const dryRun = process.argv.slice(2).includes('--dry-run');

  console.log('🔔 Unfulfilled Orders Report');
  console.log(`   Mode: ${dryRun ? 'DRY RUN' : 'LIVE'}`);
  console.log('');

  const env = getEnvConfig();
  const result = await runUnfulfilledOrdersReport(env, { dryRun });

  for (const [index, block] of (result.preview ?? []).entries()) {
    console.log(`\n--- Message ${index + 1}/${result.messages} ---`);
    if (block.header) console.log(block.header);
    console.log(block.body);
  }

  if (result.failedMessages) {
    console.error(`\n❌ ${result.failedMessages} Slack message(s) failed to post`);
    process.exit(1);
  }
  console.log('\n✅ Report complete');
}

main().catch((err) => {
  console.error('❌ Fatal error:', err);
  process.exit(1);
});
