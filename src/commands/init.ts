/**
 * promptcheck init
 * Scaffold a starter suite, project config and .env.example
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { Command } from 'commander';
import { CONFIG_DIR } from '../utils/config-loader.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';

const TEMPLATES: Array<{ template: string; target: string }> = [
  { template: 'tests.yaml', target: 'tests.yaml' },
  { template: 'config.yaml', target: join(CONFIG_DIR, 'config.yaml') },
  { template: 'env.example', target: '.env.example' },
];

function readTemplate(name: string): string {
  return readFileSync(new URL(`../templates/${name}`, import.meta.url), 'utf8');
}

export interface InitResult {
  created: string[];
  skipped: string[];
}

/**
 * Write the starter files into `projectDir`, never overwriting existing ones.
 */
export function initProject(projectDir: string, logger: Logger): InitResult {
  const result: InitResult = { created: [], skipped: [] };

  for (const { template, target } of TEMPLATES) {
    const path = join(projectDir, target);
    if (existsSync(path)) {
      logger.warn(`  ⚠️  ${target} already exists, skipping.`);
      result.skipped.push(target);
      continue;
    }
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, readTemplate(template));
    logger.log(`  ✓ Created ${target}`);
    result.created.push(target);
  }

  return result;
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a starter tests.yaml and .promptcheck/config.yaml')
    .action(() => {
      const logger = new ConsoleLogger();
      logger.log('\n  ⚡ promptcheck: project init\n');
      const { created } = initProject(process.cwd(), logger);
      if (created.includes('tests.yaml')) {
        logger.log('\n  Next: set OPENAI_API_KEY and run `promptcheck run`');
      }
    });
}
