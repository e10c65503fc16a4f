import { Command } from 'commander';
import chalk from 'chalk';
import { access } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  BUNDLED_ONTOLOGY_PATH,
  CONFIG_FILE_NAME,
  ConfigurationError,
  loadConfig,
  loadOntologyFile,
  type OntologyStats,
} from '@authority-rag/core';

/**
 * Pick the ontology file: an explicit argument, then the configured path,
 * then the bundled sample when the directory has no config.
 */
export async function resolveOntologyPath(
  rootDir: string,
  file?: string,
): Promise<Result<string, ConfigurationError>> {
  if (file) return ok(resolve(rootDir, file));

  try {
    await access(join(rootDir, CONFIG_FILE_NAME));
  } catch {
    return ok(BUNDLED_ONTOLOGY_PATH);
  }

  const config = await loadConfig(rootDir);
  if (config.isErr()) return err(config.error);
  return ok(resolve(rootDir, config.value.ontology.path));
}

function counts(record: Record<string, number>): string {
  const entries = Object.entries(record)
    .filter(([, n]) => n > 0)
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  return entries.length > 0 ? entries.map(([name, n]) => `${name} ${n}`).join(', ') : 'none';
}

export function formatOntologyStats(stats: OntologyStats, version: string): string {
  return [
    chalk.bold(`Ontology v${version}`),
    `  Concepts:        ${chalk.cyan(String(stats.concepts))}`,
    `  Roots:           ${chalk.cyan(String(stats.roots))}`,
    `  Hierarchy edges: ${chalk.cyan(String(stats.hierarchyEdges))}`,
    `  Synonyms:        ${chalk.cyan(String(stats.synonyms))}`,
    `  Relations:       ${counts(stats.relations)}`,
    `  Domains:         ${counts(stats.domains)}`,
  ].join('\n');
}

export function registerOntologyCommand(program: Command): void {
  const ontology = program.command('ontology').description('Inspect the concept ontology');

  ontology
    .command('validate')
    .description('Check schema, references and hierarchy acyclicity')
    .argument('[file]', 'Ontology JSON file (default: configured path)')
    .action(async (file: string | undefined) => {
      const path = await resolveOntologyPath(process.cwd(), file);
      if (path.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red(path.error.message));
        process.exit(1);
      }

      const graph = await loadOntologyFile(path.value);
      if (graph.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red('✘'), graph.error.message);
        process.exit(1);
      }

      // eslint-disable-next-line no-console
      console.log(chalk.green('✔'), `${path.value}: ${graph.value.size} concepts, version ${graph.value.version}`);
    });

  ontology
    .command('stats')
    .description('Print concept, edge and domain counts')
    .argument('[file]', 'Ontology JSON file (default: configured path)')
    .option('--json', 'Print stats as JSON')
    .action(async (file: string | undefined, options: { json?: boolean }) => {
      const path = await resolveOntologyPath(process.cwd(), file);
      if (path.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red(path.error.message));
        process.exit(1);
      }

      const graph = await loadOntologyFile(path.value);
      if (graph.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red(graph.error.message));
        process.exit(1);
      }

      const stats = graph.value.stats();
      // eslint-disable-next-line no-console
      console.log(
        options.json
          ? JSON.stringify({ version: graph.value.version, ...stats }, null, 2)
          : formatOntologyStats(stats, graph.value.version),
      );
    });
}
