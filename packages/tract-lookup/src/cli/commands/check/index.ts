/**
 * Check Command
 *
 * Build the catalog from the configured artifacts without serving it, and
 * print its summary. Used to validate new files before a reload.
 */

import { errorMessage, isLookupError } from '../../../core/errors.js';
import { TractLookupService } from '../../../serving/lookup-service.js';
import { resolveConfig, type SourceOptions } from '../options.js';
import { EXIT_CODES, type ExitCode } from '../../exit-codes.js';

/**
 * @returns SUCCESS on a ready catalog, ERRORS on any load error
 */
export async function checkCommand(
  options: SourceOptions,
  print: (line: string) => void = console.log
): Promise<ExitCode> {
  const config = resolveConfig(options);
  const service = new TractLookupService({
    sources: config.sources,
    containment: config.containment,
  });

  try {
    const summary = await service.load();
    print(JSON.stringify({ ok: true, catalog: summary }));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    print(
      JSON.stringify({
        ok: false,
        error: errorMessage(error),
        code: isLookupError(error) ? error.code : null,
      })
    );
    return EXIT_CODES.ERRORS;
  }
}
