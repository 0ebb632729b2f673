import type { TestSummary } from './types.js';

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(3)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m${(seconds - minutes * 60).toFixed(3)}s`;
}

export function renderSummaryMarkdown(summary: TestSummary): string {
  const result = summary.skipped ? 'SKIP' : summary.passed ? 'PASS' : 'FAIL';
  const list = (items: readonly string[]) => items.length === 0 ? ['- None captured'] : items.map(i => `- ${i}`);

  const lines: string[] = [
    `# Test: ${summary.test_name}`,
    ``,
    `**Result:** ${result}`,
    `**Kind:** ${summary.kind}`,
    `**Duration:** ${summary.duration}`,
    `**Timestamp:** ${summary.timestamp}`,
    ``,
    `## Screenshots`,
    ...list(summary.screenshots),
    ``,
    `## Logs`,
    ...list(summary.logs),
    ``,
    `## Details`,
    summary.details,
    ``,
    `## Errors`,
    ...(summary.errors.length === 0 ? ['None'] : summary.errors.map(e => `- ${e}`)),
    ``,
  ];
  return lines.join('\n');
}
