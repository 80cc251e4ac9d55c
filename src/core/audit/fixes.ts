// src/core/audit/fixes.ts

import type { AuditIssue, IconSpecSet } from '../../@types';
import { FixAction } from '../../@types';
import { config } from '../../config';
import { createEdgeRefineSpec } from '../specs/specFactory';

/**
 * The "auto-fix" preset: light alpha smoothing plus crisp corners. Returns a new spec set.
 */
export function applySmartCleanup(specs: IconSpecSet): IconSpecSet {
    return {
        ...specs,
        edgeRefine: createEdgeRefineSpec({
            ...specs.edgeRefine,
            smoothBlurRadius: config.smartCleanup.smoothBlurRadius,
            cornerSharpness: config.smartCleanup.cornerSharpness,
        }),
    };
}

/**
 * Whether any issue offers a fix that the smart cleanup preset addresses.
 */
export function hasEdgeFixes(issues: readonly AuditIssue[]): boolean {
    return issues.some(
        (issue) =>
            issue.fixAction === FixAction.SmartCleanup ||
            issue.fixAction === FixAction.Sharpen ||
            issue.fixAction === FixAction.CleanDebris,
    );
}
