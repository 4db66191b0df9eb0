import { glob, hasMagic } from 'glob';
import { SuiteParser } from '../parser/suite-parser.ts';
import { duplicateTestIdsAcrossSuites, validateSuite } from '../parser/suite-validator.ts';
import type { Suite } from '../runner/types.ts';
import type { Logger } from '../utils/logger.ts';

export const DEFAULT_SUITE_FILE = 'tests.yaml';

/**
 * Expand suite file arguments. Plain paths are kept as given, so a missing file
 * is reported by the loader; glob patterns expand to their sorted matches.
 */
export async function resolveSuiteFiles(patterns: readonly string[]): Promise<string[]> {
  const inputs = patterns.length > 0 ? patterns : [DEFAULT_SUITE_FILE];
  const files: string[] = [];
  for (const pattern of inputs) {
    if (hasMagic(pattern)) {
      const matches = await glob(pattern, { nodir: true });
      files.push(...matches.sort());
    } else {
      files.push(pattern);
    }
  }
  return [...new Set(files)];
}

export function loadSuites(files: readonly string[]): Array<{ file: string; suite: Suite }> {
  return files.map((file) => ({ file, suite: SuiteParser.loadSuite(file) }));
}

/**
 * Print validation issues for each suite, then those spanning suite files;
 * returns how many were found.
 */
export function reportValidation(
  suites: ReadonlyArray<{ file: string; suite: Suite }>,
  knownProviders: readonly string[],
  logger: Logger
): number {
  let total = 0;
  for (const { file, suite } of suites) {
    const issues = validateSuite(suite, { knownProviders });
    total += issues.length;
    if (issues.length === 0) continue;
    logger.error(`❌ ${file}: ${issues.length} issue(s)`);
    for (const issue of issues) {
      logger.error(`   • ${issue.path}: ${issue.message}`);
    }
  }

  const shared = duplicateTestIdsAcrossSuites(suites);
  if (shared.length > 0) {
    total += shared.length;
    logger.error(`❌ ${shared.length} issue(s) across suite files`);
    for (const issue of shared) {
      logger.error(`   • ${issue.path}: ${issue.message}`);
    }
  }
  return total;
}

export function useColor(): boolean {
  return Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;
}
