// src/core/pipeline/index.ts

import type { IconSpecSet, IPipelineOptions, RasterImage } from '../../@types';
import { createLogger, NoopLogFacility } from '../../utils/logging/logUtils';
import { RenderStateMachine } from './stateMachine';

/**
 * Renders a source raster into a square icon master with the given spec set.
 * Same bytes and same specs always give the same output bytes.
 *
 * @param source - Decoded RGBA source; not modified.
 * @param specs - Complete, validated spec set.
 * @param options - Logger, verbosity and progress bar; silent by default.
 * @return A `targetSize` x `targetSize` raster.
 */
export async function renderIcon(
    source: RasterImage,
    specs: IconSpecSet,
    options: Partial<IPipelineOptions> = {},
): Promise<RasterImage> {
    const verbose = options.verbose ?? false;
    const stateMachine = new RenderStateMachine({
        source,
        specs,
        verbose,
        logger: options.logger ?? createLogger('pipeline', NoopLogFacility, verbose),
        progressBar: options.progressBar,
    });
    await stateMachine.run();
    return stateMachine.result;
}
