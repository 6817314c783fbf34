#!/usr/bin/env node

async function run(): Promise<void> {
  // First Ctrl+C interrupts the running pipelines (classified as killed); a second one exits.
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error('[INTERRUPT] stopping current runs; press Ctrl+C again to exit immediately');
    controller.abort();
  });

  const { main } = await import('./cli.js');
  await main(process.argv.slice(2), { signal: controller.signal });
}

run().catch((err) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
