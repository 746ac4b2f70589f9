import 'dotenv/config';
import { loadConfig } from '@cognisync/schemas/src/config-loader.js';
import { createServices } from '@cognisync/core/src/infrastructure/services.js';

async function main(): Promise<void> {
  const text =
    process.argv[2] ?? 'The sky is green and water boils at 50°C. Everyone knows this is obviously true.';
  const maxClaims = process.argv[3];

  const config = loadConfig();

  console.log('=== CogniSync Job Runner ===\n');
  console.log(`Input text: ${text}`);
  console.log(`Mock LLM: ${config.llm.mock ? 'yes' : 'no'} (model ${config.llm.model})`);
  console.log(`Job store: ${config.jobStore.kind}\n`);

  const startTime = Date.now();
  const { jobService } = await createServices(config);

  const { job, payment } = await jobService.startJob({
    identifier_from_purchaser: 'cli',
    input_data: maxClaims !== undefined ? { text, max_claims: maxClaims } : { text },
  });
  console.log(`Job ${job.id} created (${payment.blockchainIdentifier})`);

  await jobService.whenIdle();
  const finished = await jobService.getStatus(job.id);
  const elapsed = Date.now() - startTime;

  if (finished.status === 'completed') {
    const { result } = finished;
    console.log('\n--- Summary ---');
    console.log(`  ${result.summary}`);
    console.log('\n--- Key claims ---');
    for (const claim of result.keyClaims) {
      console.log(`  - ${claim}`);
    }
    console.log('\n--- Assessment ---');
    console.log(`  Reliability: ${String(result.reliabilityScore)}/100`);
    console.log(`  Bias: ${result.biasLevel} (${result.biasExplanation})`);
    console.log(`  Status: ${result.verificationStatus}`);
    if (result.provenance.biasMarkers.length > 0) {
      console.log(`  Markers: ${result.provenance.biasMarkers.join(', ')}`);
    }
  } else {
    console.log(`\nJob ended as ${finished.status}`);
    if (finished.status === 'failed') {
      console.log(`  Error: ${finished.error}`);
    }
    process.exitCode = 1;
  }

  console.log(`\nCompleted in ${String(elapsed)}ms`);
}

main().catch((error: unknown) => {
  console.error('Job runner failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
