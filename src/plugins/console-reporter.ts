import type { Plugin } from '../plugin-api';
import { summarize } from '../report';
import type { ResultNode, Verdict } from '../types';

export interface ConsoleReporterOptions {
  verbose?: boolean;
  /** Where to write; defaults to stdout */
  write?: (text: string) => void;
}

function red(text: string): string {
  return `\u001b[31m${text}\u001b[39m`;
}

function green(text: string): string {
  return `\u001b[32m${text}\u001b[39m`;
}

function yellow(text: string): string {
  return `\u001b[33m${text}\u001b[39m`;
}

export function drawProgressBar(passed: number, failed: number, total: number, width: number = 30): string {
  const passedWidth = Math.round((passed / total) * width) || 0;
  const failedWidth = Math.round((failed / total) * width) || 0;
  const pendingWidth = Math.max(0, width - passedWidth - failedWidth);

  const passedBar = green('█'.repeat(passedWidth));
  const failedBar = red('█'.repeat(failedWidth));
  const pendingBar = '░'.repeat(pendingWidth);

  return `[${passedBar}${failedBar}${pendingBar}]`;
}

export function verdictIcon(verdict: Verdict): string {
  switch (verdict.status) {
    case 'pass':
      return '✅';
    case 'schema-violation':
      return '📐';
    case 'semantic-violation':
      return '❌';
    case 'transport-error':
      return verdict.detail === 'cancelled' || verdict.detail.startsWith('timeout') ? '⏰' : '🔌';
    case 'skipped':
      return '⏭️';
  }
}

/** Renders the result tree, one line per node, failure details indented below. */
export function renderTree(node: ResultNode, verbose = false, depth = 0): string[] {
  const indent = '  '.repeat(depth);
  if (node.kind === 'suite') {
    const icon = node.status === 'pass' ? '🗂️ ' : node.status === 'skipped' ? '⏭️ ' : '💥';
    const lines = [`${indent}${icon} ${node.name}${node.optional ? ' (optional)' : ''} (${node.elapsedMs}ms)`];
    if (node.detail) lines.push(red(`${indent}    ${node.detail}`));
    return [...lines, ...node.children.flatMap((child) => renderTree(child, verbose, depth + 1))];
  }
  const optional = node.optional ? ' (optional)' : '';
  const lines = [`${indent}[${verdictIcon(node.verdict)}] ${node.name}${optional} (${node.elapsedMs}ms)`];
  if (node.verdict.status !== 'pass') {
    const detail = `${indent}    ${node.verdict.status}: ${node.verdict.detail}`;
    lines.push(node.verdict.status === 'skipped' ? yellow(detail) : red(detail));
  }
  node.annotations.forEach((note) => lines.push(yellow(`${indent}    note: ${note}`)));
  if (verbose && node.verdict.status !== 'pass' && node.request) {
    lines.push(`${indent}    request:  ${JSON.stringify(node.request)}`);
    lines.push(`${indent}    response: ${JSON.stringify(node.response)}`);
  }
  return lines;
}

export const consoleReporterPlugin = (cfg: ConsoleReporterOptions = {}): Plugin => ({
  name: 'console-reporter',
  setup(ctx) {
    const write = cfg.write ?? ((text: string) => process.stdout.write(text));
    const log = (line = '') => write(`${line}\n`);
    let totalCases = 0;
    let passedCases = 0;
    let failedCases = 0;

    ctx.onRunStart((info) => {
      log(`🚀 Checking ${info.suites.length} suite(s) against ${info.targets.map((t) => t.name).join(', ')}`);
      log('='.repeat(50));
      totalCases = info.caseCount;
    });

    ctx.onCaseEnd((_test, result) => {
      if (result.verdict.status === 'pass') {
        passedCases++;
      } else {
        failedCases++;
      }
      if (totalCases === 0) return;
      const progress = passedCases + failedCases;
      const bar = drawProgressBar(passedCases, failedCases, totalCases);
      const percentage = Math.min(100, (progress / totalCases) * 100).toFixed(0);
      write(`  Progress: ${bar} ${percentage}% (${progress}/${totalCases})\r`);
    });

    ctx.onRunEnd((report) => {
      write('\n');
      const summary = summarize(report.tree);

      log('\n📊 Results:');
      renderTree(report.tree, cfg.verbose).forEach((line) => log(line));

      if (summary.skipped.length > 0) {
        log(`\n⏭️  Skipped ${summary.skipped.length} case(s):`);
        summary.skipped.forEach(({ path, result }) => {
          log(`    - ${[...path, result.name].join(' / ')}: ${result.verdict.status === 'skipped' ? result.verdict.detail : ''}`);
        });
      }

      log('\n' + '='.repeat(50));
      const { counts } = summary;
      log(
        `✨ ${counts.pass}/${summary.total} passed; ${counts['schema-violation']} schema, ` +
          `${counts['semantic-violation']} semantic, ${counts['transport-error']} transport, ${counts.skipped} skipped`
      );
      if (summary.latency) {
        const { min, avg, max } = summary.latency;
        log(`⏱️  Latency: min ${min}ms; avg ${avg}ms; max ${max}ms`);
      }
      log(`⏱️  Testing time: ${(report.elapsedMs / 1000).toFixed(2)}s`);
      log(report.status === 'pass' ? green('🎉 PASS') : red('🚨 FAIL'));
    });
  },
});
