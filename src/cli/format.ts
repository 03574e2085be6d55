import type { HistoryEntry } from '../stages/types.js';
import type { RunReport } from '../pipeline/types.js';
import type { Lesson } from '../memory/types.js';
import { formatDuration } from '../utils/timer.js';

const STATUS_MARK = { ok: '✓', 'soft-fail': '~', 'hard-fail': '✗' } as const;

/** One-line description of a history entry for live output. */
export function formatEntry(entry: HistoryEntry): string {
  const { result } = entry;
  const mark = STATUS_MARK[result.status];
  const head = `  ${mark} ${result.kind.padEnd(11)}`;

  switch (result.kind) {
    case 'mode':
      return `${head} ${result.output.mode} (score ${result.output.score.toFixed(2)}${result.output.degraded ? ', degraded entropy' : ''})`;
    case 'research':
      return `${head} ${result.output.facts.length} fact(s)`;
    case 'reasoning':
      return result.output.action
        ? `${head} ${result.output.action.kind} "${result.output.action.pattern}" on ${result.output.action.target} (variant ${result.output.action.variant})`
        : `${head} no action`;
    case 'world-model': {
      const verdict = result.output.verdict;
      if (!verdict) return `${head} no verdict`;
      return verdict.status === 'accepted'
        ? `${head} accepted, risk ${verdict.riskScore} < ${verdict.tolerance}`
        : `${head} rejected (${verdict.reason}), risk ${verdict.riskScore}`;
    }
    case 'code':
      return `${head} ${result.output.outcome ? (result.output.outcome.success ? 'executed' : 'execution failed') : 'answer composed'}`;
    case 'critic':
      return `${head} ${result.output.verdict}: ${result.output.critique}`;
  }
}

export function formatReport(report: RunReport): string {
  const lines = [
    '─'.repeat(60),
    report.status === 'success' ? '✅ Completed' : report.status === 'cancelled' ? '⏹  Cancelled' : `❌ Failed: ${report.reason}`,
    '',
    report.response,
    '',
    `Mode: ${report.mode ?? 'none'} | Retries: ${report.retries} | Time: ${formatDuration(report.durationMs)}`,
  ];
  if (report.lessonsRecalled.length > 0) {
    lines.push(`Lessons recalled: ${report.lessonsRecalled.map(lesson => lesson.actionPattern).join(', ')}`);
  }
  if (report.lesson) {
    lines.push(`Lesson learned: ${report.lesson.avoidance}`);
  }
  const degraded = report.diagnostics.filter(d => d.severity === 'degraded');
  if (degraded.length > 0) {
    lines.push(`Degraded: ${degraded.map(d => d.code).join(', ')}`);
  }
  return lines.join('\n');
}

export function formatLesson(lesson: Lesson): string {
  return [
    `[${new Date(lesson.createdAt).toISOString()}] ${lesson.actionPattern} (${lesson.actionKind})`,
    `  ${lesson.summary}`,
    `  cause: ${lesson.cause}`,
    `  avoid: ${lesson.avoidance}`,
  ].join('\n');
}
