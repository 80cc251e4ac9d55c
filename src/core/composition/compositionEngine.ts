// src/core/composition/compositionEngine.ts

import type { CompositionSpec, ILogger, RasterImage } from '../../@types';
import { FitMode } from '../../@types';
import { resampleRaster } from '../../utils/imageProcessing/sharpSpecific';
import { blitRaster, createRaster, cropRaster } from '../../utils/raster/rasterUtils';

export interface Placement {
    contentWidth: number;
    contentHeight: number;
    offsetX: number;
    offsetY: number;
}

/**
 * Works out how large the content is drawn and where its top-left corner lands on the canvas.
 * A negative offset means the centered window is cut out of content wider (or taller) than the canvas.
 */
export function computePlacement(width: number, height: number, spec: CompositionSpec): Placement {
    const { targetSize, scale: userScale, fitMode } = spec;
    const fitScale =
        fitMode === FitMode.Contain
            ? Math.min(targetSize / width, targetSize / height)
            : Math.max(targetSize / width, targetSize / height);
    const scale = fitScale * userScale;
    const contentWidth = Math.max(1, Math.round(width * scale));
    const contentHeight = Math.max(1, Math.round(height * scale));
    return {
        contentWidth,
        contentHeight,
        offsetX: centerOffset(contentWidth, targetSize),
        offsetY: centerOffset(contentHeight, targetSize),
    };
}

function centerOffset(contentLength: number, canvasLength: number): number {
    if (contentLength <= canvasLength) {
        return Math.floor((canvasLength - contentLength) / 2);
    }
    return -Math.floor((contentLength - canvasLength) / 2);
}

/** The part of one source axis that shows through the canvas, and where it is drawn. */
export interface VisibleSpan {
    sourceStart: number;
    sourceLength: number;
    drawLength: number;
    drawOffset: number;
}

/**
 * Maps the canvas window back onto one source axis. Whole source pixels are kept, so the span
 * may reach up to one scaled pixel past the canvas on each side; the blit clips that.
 */
export function computeVisibleSpan(
    sourceLength: number,
    contentLength: number,
    offset: number,
    canvasLength: number,
): VisibleSpan {
    if (offset >= 0 && offset + contentLength <= canvasLength) {
        return { sourceStart: 0, sourceLength, drawLength: contentLength, drawOffset: offset };
    }
    const ratio = contentLength / sourceLength;
    const visibleStart = Math.max(0, -offset);
    const visibleEnd = Math.min(contentLength, canvasLength - offset);
    const sourceStart = Math.min(sourceLength - 1, Math.floor(visibleStart / ratio));
    const sourceEnd = Math.max(sourceStart + 1, Math.min(sourceLength, Math.ceil(visibleEnd / ratio)));
    return {
        sourceStart,
        sourceLength: sourceEnd - sourceStart,
        drawLength: Math.max(1, Math.round((sourceEnd - sourceStart) * ratio)),
        drawOffset: offset + Math.round(sourceStart * ratio),
    };
}

/**
 * Normalizes content of any aspect ratio onto a transparent `targetSize` square, centered.
 * `Contain` keeps everything visible, `Cover` fills the square and trims the overflow.
 *
 * @param image - Isolated content.
 * @param spec - Fit mode, user scale and canvas size.
 * @param logger - Optional logger for debug output.
 * @return A `targetSize` x `targetSize` raster.
 */
export async function composeOnSquare(image: RasterImage, spec: CompositionSpec, logger?: ILogger): Promise<RasterImage> {
    const placement = computePlacement(image.width, image.height, spec);
    logger?.debug(
        `Placing ${image.width}x${image.height} as ${placement.contentWidth}x${placement.contentHeight} ` +
            `at (${placement.offsetX}, ${placement.offsetY}) on ${spec.targetSize}px canvas.`,
    );
    const spanX = computeVisibleSpan(image.width, placement.contentWidth, placement.offsetX, spec.targetSize);
    const spanY = computeVisibleSpan(image.height, placement.contentHeight, placement.offsetY, spec.targetSize);
    const visible =
        spanX.sourceLength === image.width && spanY.sourceLength === image.height
            ? image
            : cropRaster(image, {
                  left: spanX.sourceStart,
                  top: spanY.sourceStart,
                  width: spanX.sourceLength,
                  height: spanY.sourceLength,
              });
    const content = await resampleRaster(visible, spanX.drawLength, spanY.drawLength, 'lanczos3');
    const canvas = createRaster(spec.targetSize, spec.targetSize);
    blitRaster(content, canvas.data, canvas.width, spanX.drawOffset, spanY.drawOffset);
    return canvas;
}
