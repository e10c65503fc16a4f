import { Command } from 'commander';
import { createRequire } from 'node:module';
import { isRecord } from '@authority-rag/core';
import { registerInitCommand } from './commands/init.js';
import { registerSearchCommand } from './commands/search.js';
import { registerExplainCommand } from './commands/explain.js';
import { registerOntologyCommand } from './commands/ontology.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');
const version = isRecord(pkg) && typeof pkg['version'] === 'string' ? pkg['version'] : '0.0.0';

export function createProgram(programVersion: string = version): Command {
  const program = new Command();
  program
    .name('authrag')
    .description('authority-rag: ontology-guided, authority-aware retrieval')
    .version(programVersion);

  registerInitCommand(program);
  registerSearchCommand(program);
  registerExplainCommand(program);
  registerOntologyCommand(program);
  return program;
}
