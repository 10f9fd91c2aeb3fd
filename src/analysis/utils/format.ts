/**
 * Text formatting for analysis results
 */

import type { ClassificationResult } from '../classifier.js';
import type { AggregateResult } from '../aggregator.js';

export function formatRatio(ratio: number): string {
  return ratio.toFixed(2);
}

export function formatFileLine(filePath: string, result: ClassificationResult): string {
  return `File: ${filePath}, Comment Lines: ${result.commentLines}, Code Lines: ${result.codeLines}, Ratio: ${formatRatio(result.ratio)}`;
}

export function formatSummary(aggregate: AggregateResult): string {
  return [
    '',
    '--- Summary ---',
    `Total Files Analyzed: ${aggregate.fileCount}`,
    `Total Comment Lines: ${aggregate.totalCommentLines}`,
    `Total Code Lines: ${aggregate.totalCodeLines}`,
    `Overall Comment-to-Code Ratio: ${formatRatio(aggregate.overallRatio)}`,
  ].join('\n');
}
