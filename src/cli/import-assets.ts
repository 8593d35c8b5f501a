import { describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Asset } from '../types/asset.js';

export interface AssetImporter {
  importFile(sourcePath: string): Promise<Asset>;
}

export type ImportOutcome =
  | { source: string; asset: Asset }
  | { source: string; error: string };

/** Imports each file in turn; one bad file does not stop the rest. */
export async function importAssets(
  store: AssetImporter,
  sources: readonly string[],
  logger: Logger
): Promise<ImportOutcome[]> {
  const outcomes: ImportOutcome[] = [];
  for (const source of sources) {
    try {
      const asset = await store.importFile(source);
      logger.info({ source, assetId: asset.id, kind: asset.kind }, 'asset imported');
      outcomes.push({ source, asset });
    } catch (err) {
      logger.warn({ err, source }, 'asset import failed');
      outcomes.push({ source, error: describeError(err) });
    }
  }
  return outcomes;
}

/** One line per file: `<assetId>\t<kind>\t<source>`, or `error\t<source>\t<message>`. */
export function formatOutcome(outcome: ImportOutcome): string {
  if ('asset' in outcome) {
    return `${outcome.asset.id}\t${outcome.asset.kind}\t${outcome.source}`;
  }
  return `error\t${outcome.source}\t${outcome.error}`;
}
