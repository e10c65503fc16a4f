import { Command } from 'commander';
import chalk from 'chalk';
import { access, copyFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { stringify } from 'yaml';
import { ok, err, type Result } from 'neverthrow';
import {
  BUNDLED_AUTHORITIES_PATH,
  BUNDLED_ONTOLOGY_PATH,
  CONFIG_FILE_NAME,
  ConfigurationError,
  DEFAULT_CONFIG,
} from '@authority-rag/core';

export interface InitOptions {
  force?: boolean;
}

export interface InitSummary {
  configPath: string;
  /** Knowledge files copied from the bundled samples. */
  copied: string[];
  /** Knowledge files already present and left untouched. */
  kept: string[];
}

/**
 * Build the default config object for .authrag.yaml.
 */
export function buildDefaultConfig(): Record<string, unknown> {
  return {
    version: '1',
    ontology: { path: DEFAULT_CONFIG.ontology.path },
    authority: { path: DEFAULT_CONFIG.authority.path },
    embedding: { ...DEFAULT_CONFIG.embedding },
    vectorIndex: {
      provider: DEFAULT_CONFIG.vectorIndex.provider,
      url: DEFAULT_CONFIG.vectorIndex.url,
      collections: { ...DEFAULT_CONFIG.vectorIndex.collections },
    },
    search: { ...DEFAULT_CONFIG.search },
    logging: { level: 'info' },
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write .authrag.yaml and copy the sample ontology and authority table
 * next to it. Existing knowledge files are never overwritten.
 */
export async function initProject(
  rootDir: string,
  options: InitOptions = {},
): Promise<Result<InitSummary, ConfigurationError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);
  if (!options.force && (await exists(configPath))) {
    return err(new ConfigurationError(`${CONFIG_FILE_NAME} already exists. Use --force to overwrite.`));
  }

  await writeFile(configPath, stringify(buildDefaultConfig()), 'utf-8');

  const summary: InitSummary = { configPath, copied: [], kept: [] };
  const samples: Array<[string, string]> = [
    [BUNDLED_ONTOLOGY_PATH, join(rootDir, DEFAULT_CONFIG.ontology.path)],
    [BUNDLED_AUTHORITIES_PATH, join(rootDir, DEFAULT_CONFIG.authority.path)],
  ];
  for (const [source, target] of samples) {
    if (await exists(target)) {
      summary.kept.push(target);
      continue;
    }
    await mkdir(dirname(target), { recursive: true });
    await copyFile(source, target);
    summary.copied.push(target);
  }

  return ok(summary);
}

/**
 * Check if Ollama is reachable.
 */
export async function checkOllama(baseUrl: string): Promise<{ ok: boolean; message: string }> {
  try {
    const response = await globalThis.fetch(`${baseUrl}/api/tags`, {
      signal: AbortSignal.timeout(3000),
    });
    if (response.ok) {
      return { ok: true, message: `Ollama is running at ${baseUrl}` };
    }
    return { ok: false, message: `Ollama returned status ${response.status}` };
  } catch {
    return { ok: false, message: `Ollama is not reachable at ${baseUrl}` };
  }
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create .authrag.yaml and sample knowledge files in the current directory')
    .option('--force', 'Overwrite existing configuration file')
    .option('--skip-ollama-check', 'Do not check the embedding server')
    .action(async (options: { force?: boolean; skipOllamaCheck?: boolean }) => {
      try {
        const result = await initProject(process.cwd(), { force: options.force });
        if (result.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(result.error.message));
          process.exit(1);
        }

        const summary = result.value;
        // eslint-disable-next-line no-console
        console.log(chalk.green('Created'), summary.configPath);
        for (const path of summary.copied) {
          // eslint-disable-next-line no-console
          console.log(chalk.green('Created'), path);
        }
        for (const path of summary.kept) {
          // eslint-disable-next-line no-console
          console.log(chalk.dim('Kept existing'), path);
        }

        if (!options.skipOllamaCheck) {
          const ollama = await checkOllama(process.env['OLLAMA_HOST'] ?? DEFAULT_CONFIG.embedding.baseUrl);
          // eslint-disable-next-line no-console
          console.log(ollama.ok ? chalk.green('✔') : chalk.yellow('⚠'), ollama.message);
        }

        // eslint-disable-next-line no-console
        console.log(chalk.green('\nProject initialized.'));
        // eslint-disable-next-line no-console
        console.log(chalk.dim('Run "authrag ontology validate" to check the knowledge files.'));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Init failed:'), message);
        process.exit(1);
      }
    });
}
