/**
 * Compiler diagnostic parsing for the `file:line:col: severity: message`
 * format shared by clang and gcc.
 */

import type { Diagnostic, DiagnosticSeverity } from '../../types';

const WITH_COLUMN = /^(.+?):(\d+):(\d+):\s+(fatal error|error|warning|note):\s+(.*)$/;
const WITHOUT_COLUMN = /^(.+?):(\d+):\s+(fatal error|error|warning|note):\s+(.*)$/;

function severityOf(value: string): DiagnosticSeverity {
  if (value === 'warning') return 'warning';
  if (value === 'note') return 'note';
  return 'error';
}

export function parseDiagnostics(output: string, code?: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const line of output.split(/\r?\n/)) {
    let m = WITH_COLUMN.exec(line);
    if (m) {
      diagnostics.push({
        severity: severityOf(m[4]),
        file: m[1],
        line: Number(m[2]),
        column: Number(m[3]),
        message: m[5],
        ...(code !== undefined && { code }),
      });
      continue;
    }

    m = WITHOUT_COLUMN.exec(line);
    if (m) {
      diagnostics.push({
        severity: severityOf(m[3]),
        file: m[1],
        line: Number(m[2]),
        message: m[4],
        ...(code !== undefined && { code }),
      });
      continue;
    }

    // clang fix-it hints follow the diagnostic they belong to.
    const fixIt = /^\s*fix-it:.*"(.*)"$/.exec(line);
    const previous = diagnostics[diagnostics.length - 1];
    if (fixIt && previous && previous.suggestion === undefined) {
      previous.suggestion = fixIt[1];
    }
  }

  return diagnostics;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
