import { formatOutcome, importAssets } from './cli/import-assets.js';
import { ConfigError, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { FileAssetStore, ffprobeMetadata } from './storage/asset-store.js';

async function main() {
  const sources = process.argv.slice(2);
  if (sources.length === 0) {
    console.error('Usage: import-asset <file> [file...]');
    process.exitCode = 2;
    return;
  }

  const config = loadConfig();
  const logger = createLogger(config);
  const store = new FileAssetStore(config.dataDir, ffprobeMetadata(config.ffprobePath));

  const outcomes = await importAssets(store, sources, logger);
  for (const outcome of outcomes) {
    console.log(formatOutcome(outcome));
  }
  if (outcomes.some((outcome) => 'error' in outcome)) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Error importing assets:', error);
  }
  process.exit(1);
});
