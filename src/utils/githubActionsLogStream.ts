/**
 * Pino destination that rewrites JSON log lines as GitHub Actions workflow commands,
 * so warnings and errors surface as annotations on the run summary.
 *
 * @see https://docs.github.com/en/actions/reference/workflow-commands-for-github-actions
 */

import type { DestinationStream } from 'pino';

export type ActionsLogLevel = 'debug' | 'notice' | 'warning' | 'error';

const LABEL_VALUES: Record<string, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Map a pino level (numeric, or a label when a level formatter is installed)
 */
export function actionsLogLevel(pinoLevel: number | string): ActionsLogLevel {
  const value = typeof pinoLevel === 'number' ? pinoLevel : (LABEL_VALUES[pinoLevel] ?? 30);
  if (value >= 50) return 'error';
  if (value >= 40) return 'warning';
  if (value >= 30) return 'notice';
  return 'debug';
}

// Workflow command values must not contain raw newlines or percent signs
function escapeData(value: string): string {
  return value.replace(/%/g, '%25').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

function escapeProperty(value: string): string {
  return escapeData(value).replace(/:/g, '%3A').replace(/,/g, '%2C');
}

/**
 * Convert one serialized pino record into a workflow command line
 */
export function formatActionsLine(line: string): string {
  let record: Record<string, unknown>;
  try {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed !== 'object' || parsed === null) {
      return `${line}\n`;
    }
    record = Object.fromEntries(Object.entries(parsed));
  } catch {
    // Not JSON (already formatted elsewhere), pass through untouched
    return `${line}\n`;
  }

  const level =
    typeof record.level === 'number' || typeof record.level === 'string'
      ? actionsLogLevel(record.level)
      : 'notice';
  const message = typeof record.msg === 'string' ? record.msg : '';
  const title = typeof record.component === 'string' ? record.component : 'wikibase-rdf-patch';

  return `::${level} title=${escapeProperty(title)}::${escapeData(message)}\n`;
}

export function createGithubActionsStream(
  output: { write(chunk: string): unknown } = process.stderr
): DestinationStream {
  return {
    write(line: string): void {
      output.write(formatActionsLine(line.trimEnd()));
    },
  };
}
