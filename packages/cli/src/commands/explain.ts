import { Command } from 'commander';
import chalk from 'chalk';
import { createRuntime, type RetrievalPlan } from '@authority-rag/core';
import { parseRequestFlags, type RequestFlags } from './search.js';

const LABEL_WIDTH = 11;

function label(text: string): string {
  return chalk.dim(`${text}:`.padEnd(LABEL_WIDTH));
}

/**
 * Render what a query would do without searching anything.
 */
export function formatPlan(plan: RetrievalPlan): string {
  const lines: string[] = [];

  const source =
    plan.intentSource === 'override' ? 'override' : plan.ruleId ? `rule ${plan.ruleId}` : 'no rule matched';
  lines.push(`${label('Query')}${plan.query}`);
  lines.push(`${label('Intent')}${chalk.cyan(plan.intent)} (${source})`);
  lines.push(`${label('Terms')}${plan.candidateTerms.join(', ') || chalk.dim('none')}`);
  lines.push(`${label('Expansion')}${plan.expansionTerms.join(', ') || chalk.dim('none')}`);
  lines.push(`${label('Snapshot')}v${plan.snapshotVersion}`);

  lines.push('');
  lines.push(chalk.bold('Variants'));
  plan.variants.forEach((variant, i) => {
    lines.push(`  ${i + 1}. ${chalk.magenta(`[${variant.provenance}]`)} ${variant.text}`);
  });

  lines.push('');
  lines.push(chalk.bold('Routes'));
  for (const route of plan.routes) {
    lines.push(`  ${route.partition.padEnd(12)}${route.weight.toFixed(2)}`);
  }

  return lines.join('\n');
}

export function registerExplainCommand(program: Command): void {
  program
    .command('explain')
    .description('Show intent, query variants and partition routes for a query')
    .argument('<query>', 'Search query')
    .option('--type <documentType>', 'Restrict to one partition')
    .option('--intent <intent>', 'Skip classification')
    .action(async (query: string, options: RequestFlags) => {
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

        // eslint-disable-next-line no-console
        console.log(formatPlan(runtime.value.pipeline.explain(request.value)));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Explain failed:'), message);
        process.exit(1);
      }
    });
}
