import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import type { MappingReport } from '@team-identity/shared/types';
import { parsePositiveInt, withResolver, type StoreOption } from '../runtime.js';

interface ReportOptions extends StoreOption {
  days?: number;
  output?: string;
  json?: boolean;
}

const percent = (value: number) => `${(value * 100).toFixed(1)}%`;

export function formatReport(report: MappingReport): string[] {
  const { overallStats } = report;
  const lines = [
    `=== Mapping Report (last ${report.periodDays} days) ===`,
    '',
    `  Attempts:        ${overallStats.totalAttempts}`,
    `  Successful:      ${overallStats.successfulMappings} (${percent(overallStats.successRate)})`,
    `  Avg confidence:  ${overallStats.avgConfidence.toFixed(3)}`,
    `  Avg elapsed:     ${overallStats.avgElapsedMs.toFixed(2)}ms`,
    `  Manual mappings: ${report.manualMappingsCount}`,
    `  Learned mappings: ${report.learnedMappingsCount}`,
  ];

  if (report.strategyPerformance.length > 0) {
    lines.push('', 'By strategy:');
    for (const s of report.strategyPerformance) {
      lines.push(`  ${s.strategyUsed}: ${s.successes}/${s.attempts} (${percent(s.successRate)})`);
    }
  }

  if (report.failedMappings.length > 0) {
    lines.push('', 'Most frequent failures:');
    for (const f of report.failedMappings) {
      const context = f.context ? ` [${f.context}]` : '';
      const alternatives = f.alternatives.length > 0 ? ` (alternatives: ${f.alternatives.join(', ')})` : '';
      lines.push(`  ${f.failureCount}x ${f.sourceName}${context}${alternatives}`);
    }
  }

  return lines;
}

export const reportCommand = new Command('report')
  .description('Summarize recent resolution attempts')
  .option('-d, --days <n>', 'Window in days', parsePositiveInt)
  .option('-o, --output <file>', 'Also write the report as JSON to this file')
  .option('--json', 'Print the report as JSON')
  .option('--memory', 'Use the in-memory store')
  .action(async (options: ReportOptions) => {
    await withResolver(options, async (resolver) => {
      const report = await resolver.report(options.days);

      console.log(options.json ? JSON.stringify(report, null, 2) : formatReport(report).join('\n'));

      if (options.output) {
        await writeFile(options.output, JSON.stringify(report, null, 2) + '\n', 'utf-8');
        console.error(`Report written to ${options.output}`);
      }
    });
  });
