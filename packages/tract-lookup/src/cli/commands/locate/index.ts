/**
 * Locate Command
 *
 * Load the catalog once and resolve a single point.
 */

import { TractLookupService } from '../../../serving/lookup-service.js';
import { resolveConfig, type SourceOptions } from '../options.js';
import { EXIT_CODES, type ExitCode } from '../../exit-codes.js';

export interface LocateOutput {
  readonly lat: number;
  readonly lon: number;
  readonly geoid: string | null;
  readonly score: number | null;
}

/**
 * @returns SUCCESS when the point resolves, NOT_FOUND when it lies outside every region
 * @throws load errors (missing file, schema, decode)
 */
export async function locateCommand(
  lat: number,
  lon: number,
  options: SourceOptions,
  print: (line: string) => void = console.log
): Promise<ExitCode> {
  const config = resolveConfig(options);
  const service = new TractLookupService({
    sources: config.sources,
    containment: config.containment,
  });

  await service.load();
  const result = service.locate(lat, lon);

  const output: LocateOutput = { lat, lon, geoid: result.regionId, score: result.score };
  print(JSON.stringify(output));

  return result.regionId === null ? EXIT_CODES.NOT_FOUND : EXIT_CODES.SUCCESS;
}
