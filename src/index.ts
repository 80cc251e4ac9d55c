// src/index.ts

export * from './@types';
export { config } from './config';

export { renderIcon } from './core/pipeline';
export { RenderStateMachine } from './core/pipeline/stateMachine';
export { PipelineStates } from './stateMachine/definedStates';

export {
    applyMasking,
    applyColorKeys,
    matchesColorKey,
    autoCrop,
    applyBorderFlood,
    floodFillFromBorder,
} from './core/masking';
export { composeOnSquare, computePlacement } from './core/composition/compositionEngine';
export type { Placement } from './core/composition/compositionEngine';
export { expand, choke, expandRaster, chokeRaster, applyShapeWeight } from './core/morphology/alphaMorphology';
export { applyStroke, strokeBand } from './core/stroke/strokeGenerator';
export { liquidPolish } from './core/polish/liquidPolisher';
export { refineEdges, cleanEdges, applyCornerSharpness, applyResolutionSnap } from './core/refine/edgeRefiner';

export { auditImage, analyzeMetrics, summarizeIssues } from './core/audit/qualityAuditor';
export { auditAgainstReference, compareMetrics } from './core/audit/comparison';
export { applySmartCleanup, hasEdgeFixes } from './core/audit/fixes';

export * from './core/specs/specFactory';
export { SpecValidationError } from './core/specs/specValidationError';

export {
    exportSizes,
    renderSize,
    presetSizes,
    sharpenParamsForSize,
    padToSquare,
    ExportCancelledError,
} from './core/export/sizeExporter';
export type { ExportPreset } from './core/export/sizeExporter';

export { createRaster, rasterFromBytes, getAlphaMask, findVisibleBounds } from './utils/raster/rasterUtils';
export { loadImageData, writeImageData } from './core/imageProcessing/processor';
export { SharpImageProcessor } from './core/imageProcessing/strategies/SharpImageProcessor';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils';
export { parseHexColor, toHexColor } from './utils/misc/colorUtils';
