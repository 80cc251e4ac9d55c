// src/core/audit/qualityAuditor.ts

import type { AuditIssue, QualityMetrics, RasterImage } from '../../@types';
import { FixAction, IssueSeverity } from '../../@types';
import { config } from '../../config';
import { isFullyOpaque, isFullyTransparent, toGrayscale } from '../../utils/raster/rasterUtils';
import _ from 'lodash';

function checkAspectRatio({ width, height }: RasterImage): AuditIssue {
    if (width !== height) {
        return {
            checkName: 'Aspect Ratio',
            severity: IssueSeverity.Error,
            message: `Image is not square (${width}x${height}). Icons must be square.`,
            fixAction: FixAction.CropSquare,
        };
    }
    return { checkName: 'Aspect Ratio', severity: IssueSeverity.Pass, message: 'Image is square' };
}

function checkResolution({ width, height }: RasterImage): AuditIssue {
    const shortest = Math.min(width, height);
    if (shortest < config.audit.minResolution) {
        return {
            checkName: 'Resolution',
            severity: IssueSeverity.Warning,
            message: `Resolution is low (${shortest}px). Recommended: 1024px for best quality.`,
        };
    }
    return { checkName: 'Resolution', severity: IssueSeverity.Pass, message: `High resolution (${shortest}px)` };
}

function checkEdgeQuality(image: RasterImage): AuditIssue {
    let visible = 0;
    let soft = 0;
    for (let i = 3; i < image.data.length; i += 4) {
        const alpha = image.data[i];
        if (alpha > 0) {
            visible++;
            if (alpha < 255) soft++;
        }
    }
    const ratio = visible > 0 ? soft / visible : 0;
    if (ratio < config.audit.aliasedRatio) {
        return {
            checkName: 'Edge Quality',
            severity: IssueSeverity.Error,
            message: 'Edges appear jagged/aliased (pixelated).',
            fixAction: FixAction.SmartCleanup,
        };
    }
    if (ratio > config.audit.blurryRatio) {
        return {
            checkName: 'Edge Quality',
            severity: IssueSeverity.Warning,
            message: 'Edges appear blurry/soft.',
            fixAction: FixAction.Sharpen,
        };
    }
    return { checkName: 'Edge Quality', severity: IssueSeverity.Pass, message: 'Edges look smooth and clean' };
}

function checkCleanliness(image: RasterImage): AuditIssue {
    let dirty = 0;
    for (let i = 3; i < image.data.length; i += 4) {
        const alpha = image.data[i];
        if (alpha > 0 && alpha < config.audit.dirtyAlpha) dirty++;
    }
    if (dirty > config.audit.maxDirtyPixels) {
        return {
            checkName: 'Cleanliness',
            severity: IssueSeverity.Warning,
            message: `Found ${dirty} stray/dirty pixels.`,
            fixAction: FixAction.CleanDebris,
        };
    }
    return { checkName: 'Cleanliness', severity: IssueSeverity.Pass, message: 'No dirty pixels detected' };
}

/**
 * Runs the fixed list of icon checks, in order: aspect ratio, resolution, transparency, edge quality
 * (only for images that are neither fully opaque nor fully transparent) and cleanliness.
 */
export function auditImage(image: RasterImage): AuditIssue[] {
    const issues: AuditIssue[] = [checkAspectRatio(image), checkResolution(image)];
    const opaque = isFullyOpaque(image);
    if (opaque) {
        issues.push({
            checkName: 'Transparency',
            severity: IssueSeverity.Info,
            message: "Image is fully opaque. Use a masking mode to remove the background if this is a logo/icon.",
        });
    } else {
        issues.push({ checkName: 'Transparency', severity: IssueSeverity.Pass, message: 'Image has transparency' });
    }
    if (!opaque && !isFullyTransparent(image)) {
        issues.push(checkEdgeQuality(image));
    }
    issues.push(checkCleanliness(image));
    return issues;
}

/**
 * Only the issues worth interrupting an export for.
 */
export function summarizeIssues(issues: readonly AuditIssue[]): AuditIssue[] {
    return issues.filter((issue) => issue.severity === IssueSeverity.Warning || issue.severity === IssueSeverity.Error);
}

/**
 * Derivative along one axis: central difference inside, one-sided at the ends, zero on a line of one pixel.
 */
function axisGradient(gray: Uint8Array, index: number, pos: number, length: number, stride: number): number {
    if (length < 2) {
        return 0;
    }
    if (pos === 0) {
        return gray[index + stride] - gray[index];
    }
    if (pos === length - 1) {
        return gray[index] - gray[index - stride];
    }
    return (gray[index + stride] - gray[index - stride]) / 2;
}

/**
 * Numeric quality scores over the pixels with alpha above 10 (palette counts every visible pixel).
 * Always defined: an image without such pixels scores zero everywhere.
 */
export function analyzeMetrics(image: RasterImage): QualityMetrics {
    const { width, height, data } = image;
    const gray = toGrayscale(image);
    const threshold = config.audit.metricsAlpha;

    let count = 0;
    let gradientSum = 0;
    let graySum = 0;
    const palette = new Set<number>();

    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const index = y * width + x;
            const alpha = data[index * 4 + 3];
            if (alpha > 0) {
                palette.add((data[index * 4] << 16) | (data[index * 4 + 1] << 8) | data[index * 4 + 2]);
            }
            if (alpha <= threshold) {
                continue;
            }
            const dx = axisGradient(gray, index, x, width, 1);
            const dy = axisGradient(gray, index, y, height, width);
            gradientSum += Math.sqrt(dx * dx + dy * dy);
            graySum += gray[index];
            count++;
        }
    }

    if (count === 0) {
        return { sharpness: 0, contrast: 0, brightness: 0, paletteSize: palette.size };
    }

    const mean = graySum / count;
    let squares = 0;
    for (let index = 0; index < gray.length; index++) {
        if (data[index * 4 + 3] > threshold) {
            squares += (gray[index] - mean) ** 2;
        }
    }

    return {
        sharpness: _.round(Math.min((gradientSum / count) * config.audit.sharpnessScale, 100), 1),
        contrast: _.round(Math.sqrt(squares / count), 1),
        brightness: _.round(mean, 1),
        paletteSize: palette.size,
    };
}
