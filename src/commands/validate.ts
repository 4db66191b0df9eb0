/**
 * promptcheck validate
 * Static checks over suite files, without calling any provider
 */

import type { Command } from 'commander';
import { ConfigLoader } from '../utils/config-loader.ts';
import { renderFailure } from '../utils/error-renderer.ts';
import { ConsoleLogger } from '../utils/logger.ts';
import { loadSuites, reportValidation, resolveSuiteFiles, useColor } from './shared.ts';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check suite files for configuration mistakes')
    .argument('[files...]', 'Suite files or glob patterns (default: tests.yaml)')
    .action(async (patterns: string[]) => {
      const logger = new ConsoleLogger();
      try {
        const config = ConfigLoader.load();
        const files = await resolveSuiteFiles(patterns);
        if (files.length === 0) {
          logger.error('❌ No suite files matched');
          process.exitCode = 1;
          return;
        }

        const suites = loadSuites(files);
        const issues = reportValidation(suites, Object.keys(config.providers), logger);
        if (issues > 0) {
          process.exitCode = 1;
          return;
        }

        const tests = suites.reduce((total, { suite }) => total + suite.tests.length, 0);
        logger.log(`✓ ${files.length} suite file(s), ${tests} test(s): no issues found`);
      } catch (error) {
        logger.error(renderFailure(error, useColor()));
        process.exitCode = 1;
      }
    });
}
