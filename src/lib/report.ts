/*
 * Text rendering of simulation progress and results.
 */

import type { Summary } from 'lib/simulator.ts'

export const separator = '--------------';

export function progress_line(iterations: number): string {
  return `${iterations} iterations...`;
}

/*
 * Final report, one string per line.  Names are right-aligned to the
 * longest one.
 */
export function report_lines(summary: Summary): string[] {
  const width = Math.max(0, ...summary.rows.map(r => r.name.length));

  return [
    separator,
    summary.converged
      ? '(no overlapping 99% confidence intervals)'
      : `(stopped after ${summary.iterations} iterations; ` +
        'confidence intervals still overlap)',
    `total iterations: ${summary.iterations}`,
    ...summary.rows.map(r =>
      `${r.name.padStart(width)}: ${r.p.toFixed(6)} (${r.count})`
    ),
  ];
}
