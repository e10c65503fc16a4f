import { Command } from 'commander';
import chalk from 'chalk';
import { ok, err, type Result } from 'neverthrow';
import {
  DOCUMENT_TYPES,
  INTENTS,
  MAX_DEADLINE_MS,
  createRuntime,
  isDocumentType,
  isIntent,
  type PipelineError,
  type RankedResult,
  type RetrievalRequest,
  type RetrievalResponse,
} from '@authority-rag/core';

export interface RequestFlags {
  type?: string;
  intent?: string;
  deadline?: string;
}

/**
 * Turn command-line flags into a retrieval request.
 */
export function parseRequestFlags(query: string, flags: RequestFlags): Result<RetrievalRequest, string> {
  const text = query.trim();
  if (text.length === 0) {
    return err('Query must not be empty.');
  }

  let documentType: RetrievalRequest['documentType'];
  if (flags.type !== undefined) {
    if (!isDocumentType(flags.type)) {
      return err(`Invalid --type "${flags.type}". Expected one of: ${DOCUMENT_TYPES.join(', ')}`);
    }
    documentType = flags.type;
  }

  let intent: RetrievalRequest['intent'];
  if (flags.intent !== undefined) {
    if (!isIntent(flags.intent)) {
      return err(`Invalid --intent "${flags.intent}". Expected one of: ${INTENTS.join(', ')}`);
    }
    intent = flags.intent;
  }

  let deadlineMs: number | undefined;
  if (flags.deadline !== undefined) {
    deadlineMs = Number(flags.deadline);
    if (!Number.isInteger(deadlineMs) || deadlineMs < 1) {
      return err('Invalid --deadline value. Must be a positive integer.');
    }
    if (deadlineMs > MAX_DEADLINE_MS) {
      return err(`Invalid --deadline value. Must be at most ${MAX_DEADLINE_MS}.`);
    }
  }

  return ok({ query: text, documentType, intent, deadlineMs });
}

/**
 * Format a single ranked result for terminal display.
 */
export function formatSearchResult(result: RankedResult, index: number): string {
  const lines: string[] = [];
  const rank = chalk.dim(`[${index + 1}]`);
  const title = chalk.cyan(result.source.title ?? result.documentId);
  const partition = chalk.magenta(result.partition);
  const score = chalk.green(result.score.toFixed(4));

  lines.push(`${rank} ${title}  ${partition}  score: ${score}`);

  const author = result.authority.authorId ? `, ${result.authority.authorId}` : '';
  lines.push(
    chalk.dim(
      `    ${result.chunkId}  authority: ${result.authority.level} (${result.authority.origin}${author})` +
        `  similarity: ${result.similarity.toFixed(4)}  recency: ${result.recency.toFixed(2)}`,
    ),
  );
  lines.push(chalk.dim(`    matched via: ${result.provenances.join(', ')}`));

  return lines.join('\n');
}

/**
 * Header line plus a degradation warning when some searches failed.
 */
export function formatResponseHeader(response: RetrievalResponse): string {
  const lines = [
    chalk.bold(
      `Found ${response.results.length} result(s) for "${response.query}" (intent: ${response.intent})`,
    ),
  ];
  if (response.degraded) {
    const { failed, succeeded, timedOut } = response.stats;
    lines.push(chalk.yellow(`Degraded: ${failed} of ${failed + succeeded} searches failed (${timedOut} timed out)`));
  }
  return lines.join('\n');
}

export function formatPipelineError(error: PipelineError): string {
  return `${chalk.red(`Search failed [${error.code}/${error.reason}]:`)} ${error.message}`;
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Retrieve ranked passages for a question')
    .argument('<query>', 'Search query')
    .option('--type <documentType>', `Restrict to one partition (${DOCUMENT_TYPES.join(', ')})`)
    .option('--intent <intent>', `Skip classification (${INTENTS.join(', ')})`)
    .option('--deadline <ms>', 'Request budget in milliseconds')
    .option('--json', 'Print the full response as JSON')
    .action(async (query: string, options: RequestFlags & { json?: boolean }) => {
      try {
        const request = parseRequestFlags(query, options);
        if (request.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(request.error));
          process.exit(1);
        }

        const runtime = await createRuntime({ rootDir: process.cwd() });
        if (runtime.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(runtime.error.message), 'Run "authrag init" first.');
          process.exit(1);
        }

        const result = await runtime.value.pipeline.run(request.value);
        if (result.isErr()) {
          // eslint-disable-next-line no-console
          console.error(formatPipelineError(result.error));
          process.exit(1);
        }

        const response = result.value;
        if (options.json) {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify(response, null, 2));
          return;
        }

        // eslint-disable-next-line no-console
        console.log(formatResponseHeader(response));
        if (response.results.length === 0) {
          // eslint-disable-next-line no-console
          console.log(chalk.yellow('No results found.'));
          return;
        }
        // eslint-disable-next-line no-console
        console.log('');
        // eslint-disable-next-line no-console
        console.log(response.results.map(formatSearchResult).join('\n\n'));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Search failed:'), message);
        process.exit(1);
      }
    });
}
