// src/config/index.ts

export const config = {
    imageCompression: {
        compressionLevel: 9,
        adaptiveFiltering: false,
    },
    masking: {
        defaultTolerance: 30,
        autoCropPadding: 5, // transparent border re-added around cropped content
        edgeProtectPad: 5, // temporary border that keeps the flood away from full-bleed artwork
    },
    composition: {
        defaultTargetSize: 1024,
        safeMarginScale: 0.9,
        minScale: 0.5,
        maxScale: 1.5,
    },
    morphology: {
        maxShapeWeight: 10,
    },
    stroke: {
        minWidth: 1,
        maxWidth: 50,
    },
    liquidPolish: {
        supersampleFactor: 4,
        blurBase: 2, // sigma at intensity 0, in supersampled pixels
        blurSpan: 8, // added sigma at intensity 1
        levelsLow: 100,
        levelsHigh: 180,
    },
    edgeRefine: {
        defaultDebrisThreshold: 10,
        maxDebrisThreshold: 50,
        defaultSmoothBlurRadius: 1.0,
        rampWidth: 80,
        neutralCornerSharpness: 50,
        roundingThreshold: 128,
        cornerUnsharp: { radius: 2, threshold: 3 },
        snapUnsharp: { radius: 1, threshold: 3 },
        minBlurSigma: 0.3, // smallest sigma libvips accepts
        maxBlurSigma: 1000, // largest sigma sharp accepts
    },
    audit: {
        minResolution: 512,
        aliasedRatio: 0.01,
        blurryRatio: 0.2,
        dirtyAlpha: 10,
        maxDirtyPixels: 10,
        metricsAlpha: 10,
        sharpnessScale: 2,
    },
    smartCleanup: {
        smoothBlurRadius: 0.1,
        cornerSharpness: 80,
    },
    export: {
        presets: {
            windows: [16, 32, 48, 256],
            mac: [16, 32, 64, 128, 256, 512, 1024],
            web: [100],
        },
        sharpenTiers: [
            { maxSize: 32, radius: 0.5, percent: 150, threshold: 2 },
            { maxSize: 64, radius: 0.5, percent: 100, threshold: 3 },
        ],
        binaryAlphaThreshold: 128,
    },
};
