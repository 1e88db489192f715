import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createCheckCommand } from './commands/check.js';
import { createExtractCommand } from './commands/extract.js';

const here = dirname(fileURLToPath(import.meta.url));
const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(resolve(here, '../../package.json'), 'utf-8'));
  return PackageJsonSchema.parse(raw).version;
}

/** Create the CLI program. `extract` runs when no command is named. */
export function createCli(): Command {
  return new Command()
    .name('phrasecards')
    .description('Extract vocabulary flash cards from a text using a text-generation API')
    .version(readVersion())
    .addCommand(createExtractCommand(), { isDefault: true })
    .addCommand(createCheckCommand());
}
