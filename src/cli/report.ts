// src/cli/report.ts

import type { AuditIssue, MetricsComparison, QualityMetrics } from '../@types';
import { IssueSeverity } from '../@types';
import { hasEdgeFixes } from '../core/audit/fixes';
import chalk from 'chalk';

const severityColor: Record<IssueSeverity, (text: string) => string> = {
    [IssueSeverity.Pass]: chalk.green,
    [IssueSeverity.Info]: chalk.blue,
    [IssueSeverity.Warning]: chalk.yellow,
    [IssueSeverity.Error]: chalk.red,
};

export function formatIssue(issue: AuditIssue): string {
    const fix = issue.fixAction ? ` (fix: ${issue.fixAction})` : '';
    return `[${issue.severity.toUpperCase()}] ${issue.checkName}: ${issue.message}${fix}`;
}

export function formatMetrics(metrics: QualityMetrics): string[] {
    return [
        `Sharpness:    ${metrics.sharpness}`,
        `Contrast:     ${metrics.contrast}`,
        `Brightness:   ${metrics.brightness}`,
        `Palette size: ${metrics.paletteSize}`,
    ];
}

function signed(value: number): string {
    return value > 0 ? `+${value}` : `${value}`;
}

export function formatComparison(comparison: MetricsComparison): string[] {
    const { yours, reference } = comparison;
    return [
        `Sharpness:    ${yours.sharpness} vs ${reference.sharpness} (${signed(comparison.sharpnessDiff)})`,
        `Contrast:     ${yours.contrast} vs ${reference.contrast} (${signed(comparison.contrastDiff)})`,
        `Brightness:   ${yours.brightness} vs ${reference.brightness} (${signed(comparison.brightnessDiff)})`,
        `Palette size: ${yours.paletteSize} vs ${reference.paletteSize} (${signed(comparison.paletteSizeDiff)})`,
    ];
}

/**
 * Prints the audit report to stdout, one colored line per check.
 */
export function printAuditReport(issues: readonly AuditIssue[], metrics: QualityMetrics, comparison?: MetricsComparison) {
    console.log(chalk.bold('Quality checks'));
    for (const issue of issues) {
        console.log(severityColor[issue.severity](`  ${formatIssue(issue)}`));
    }
    if (hasEdgeFixes(issues)) {
        console.log(chalk.cyan('  Edge problems found: re-render with --smart-cleanup to fix them.'));
    }
    console.log(chalk.bold('Metrics'));
    for (const line of formatMetrics(metrics)) {
        console.log(`  ${line}`);
    }
    if (comparison) {
        console.log(chalk.bold('Against reference'));
        for (const line of formatComparison(comparison)) {
            console.log(`  ${line}`);
        }
    }
}
