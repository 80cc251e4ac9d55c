#!/usr/bin/env node
// src/cli/index.ts
import { Command } from 'commander';
import path from 'node:path';
import figlet from 'figlet';
import gradient from 'gradient-string';
import { Presets, SingleBar } from 'cli-progress';
import type { IProgressBar } from '../@types';
import { AlphaVariant, FitMode, MaskingMode, SeedMode, StrokeAlignment } from '../@types';
import { config } from '../config';
import { renderIcon } from '../core/pipeline';
import { auditImage, analyzeMetrics, summarizeIssues } from '../core/audit/qualityAuditor';
import { auditAgainstReference } from '../core/audit/comparison';
import { ExportCancelledError, exportSizes, presetSizes } from '../core/export/sizeExporter';
import type { ExportPreset } from '../core/export/sizeExporter';
import { loadImageData, writeImageData } from '../core/imageProcessing/processor';
import { PipelineStates } from '../stateMachine/definedStates';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils';
import { baseNameWithoutExtension, ensureOutputDirectory } from '../utils/storage/storageUtils';
import { choiceParser, collectColor, parseColor, parseDecimal, parseInteger, parseSizeList } from './parsers';
import { printAuditReport } from './report';
import type { SpecCliOptions } from './specOptions';
import { buildSpecSet } from './specOptions';

interface LoggingCliOptions {
    log?: boolean;
    verbose?: boolean;
}

interface RenderCliOptions extends SpecCliOptions, LoggingCliOptions {
    input: string;
    output: string;
    audit?: boolean;
}

interface AuditCliOptions {
    input: string;
    reference?: string;
}

interface ExportCliOptions extends LoggingCliOptions {
    input: string;
    output: string;
    preset: ExportPreset;
    sizes?: number[];
    name?: string;
    binaryAlpha?: boolean;
    concurrency?: number;
    strict?: boolean;
}

function createProgressBar(steps: number): IProgressBar {
    const progressBar = new SingleBar({
        format: 'Processing |{bar}| {percentage}% || {value}/{total} {label}: {state}',
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
    }, Presets.shades_grey);
    progressBar.start(steps, 0, { label: 'state', state: '' });
    return progressBar;
}

function failureMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

const program = new Command();
program
    .name('icon-matte')
    .description('A CLI tool that turns raw artwork into clean, square app icons')
    .version('1.0.0');

program
    .command('render')
    .description('Render an icon master from a source image')
    .requiredOption('-i, --input <file>', 'Source image (PNG, JPEG, WebP or SVG)')
    .requiredOption('-o, --output <file>', 'Output PNG path')
    .option('--mask <mode>', 'Masking mode: none, auto-crop, color-key, border-flood', choiceParser(Object.values(MaskingMode)), MaskingMode.None)
    .option('--key-color <hex>', 'Background color to key out (repeatable)', collectColor)
    .option('--tolerance <number>', 'Color tolerance 0-255 (Default: 30)', parseInteger)
    .option('--seed <mode>', 'Flood seeds: corners, all-edges', choiceParser(Object.values(SeedMode)))
    .option('--autocrop-after', 'Trim to content after removing the background')
    .option('--edge-protect', 'Pad the source before masking so edge-touching art survives')
    .option('--padding <number>', 'Auto-crop padding in pixels (Default: 5)', parseInteger)
    .option('--fit <mode>', 'Fit mode: contain, cover', choiceParser(Object.values(FitMode)))
    .option('--scale <number>', 'Content scale 0.5-1.5 (Default: 1)', parseDecimal)
    .option('--safe-margin', 'Contain at 90% scale')
    .option('--size <number>', `Canvas size (Default: ${config.composition.defaultTargetSize})`, parseInteger)
    .option('--shape-weight <number>', 'Grow (+) or shrink (-) the silhouette, -10 to 10', parseInteger)
    .option('--stroke-color <hex>', 'Add a stroke in this color', parseColor)
    .option('--stroke-width <number>', 'Stroke width 1-50 (Default: 10)', parseInteger)
    .option('--stroke-align <alignment>', 'Stroke alignment: outside, center, inside', choiceParser(Object.values(StrokeAlignment)))
    .option('--liquid <number>', 'Liquid polish intensity 0-1 (Default: 0)', parseDecimal)
    .option('--debris <number>', 'Alpha debris threshold 0-50 (Default: 10)', parseDecimal)
    .option('--smooth <number>', 'Edge smoothing blur radius (Default: 1.0)', parseDecimal)
    .option('--corner <number>', 'Corner sharpness 0-100, 50 is neutral', parseDecimal)
    .option('--snap <number>', 'Resolution snap 0-100 (Default: 0)', parseDecimal)
    .option('--smart-cleanup', 'Apply the smart cleanup edge preset')
    .option('--audit', 'Print a quality audit of the rendered icon')
    .option('-l, --log', 'Enable logging')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async (options: RenderCliOptions) => {
        const verbose = options.verbose || false;
        const isLogging = options.log || false;
        const logger = getLogger('render', isLogging ? console : NoopLogFacility, verbose);

        let progressBar: IProgressBar | undefined;
        try {
            const specs = buildSpecSet(options);
            const source = await loadImageData(path.resolve(options.input));
            if (!isLogging) {
                progressBar = createProgressBar(Object.keys(PipelineStates).length - 1);
            }
            const icon = await renderIcon(source, specs, { logger, verbose, progressBar });
            progressBar?.stop();

            const outputFile = path.resolve(options.output);
            ensureOutputDirectory(path.dirname(outputFile));
            await writeImageData(icon, outputFile);
            logger.success(`Wrote ${icon.width}x${icon.height} icon to "${outputFile}".`);

            if (options.audit) {
                printAuditReport(auditImage(icon), analyzeMetrics(icon));
            }
            process.exit(0);
        } catch (error) {
            progressBar?.stop();
            logger.error(`Render failed: ${failureMessage(error)}`);
            process.exit(1);
        }
    });

program
    .command('audit')
    .description('Check an icon for common quality problems')
    .requiredOption('-i, --input <file>', 'Icon to audit')
    .option('-r, --reference <file>', 'Reference icon to compare metrics against')
    .showHelpAfterError()
    .action(async (options: AuditCliOptions) => {
        const logger = getLogger('audit', console);
        try {
            const image = await loadImageData(path.resolve(options.input));
            const comparison = options.reference
                ? await auditAgainstReference(image, await loadImageData(path.resolve(options.reference)))
                : undefined;
            printAuditReport(auditImage(image), analyzeMetrics(image), comparison);
            process.exit(0);
        } catch (error) {
            logger.error(`Audit failed: ${failureMessage(error)}`);
            process.exit(1);
        }
    });

program
    .command('export')
    .description('Export an icon master to platform sizes')
    .requiredOption('-i, --input <file>', 'Icon master PNG')
    .requiredOption('-o, --output <folder>', 'Output folder')
    .option('--preset <preset>', 'Size preset: windows, mac, web, all', choiceParser<ExportPreset>(['windows', 'mac', 'web', 'all']), 'all')
    .option('--sizes <list>', 'Comma separated sizes, overrides the preset', parseSizeList)
    .option('--name <name>', 'File name prefix (Default: input file name)')
    .option('--binary-alpha', 'Export with hard 0/255 alpha')
    .option('--concurrency <number>', 'Parallel resample workers (Default: CPU count - 1)', parseInteger)
    .option('--strict', 'Abort when the master has quality warnings or errors')
    .option('-l, --log', 'Enable logging')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async (options: ExportCliOptions) => {
        const verbose = options.verbose || false;
        const isLogging = options.log || false;
        const logger = getLogger('export', console, verbose);
        const controller = new AbortController();
        const onInterrupt = () => controller.abort();
        process.once('SIGINT', onInterrupt);

        let progressBar: IProgressBar | undefined;
        try {
            const inputFile = path.resolve(options.input);
            const master = await loadImageData(inputFile);

            const problems = summarizeIssues(auditImage(master));
            for (const issue of problems) {
                logger.warn(`${issue.checkName}: ${issue.message}`);
            }
            if (options.strict && problems.length > 0) {
                throw new Error(`Master has ${problems.length} quality problem(s)`);
            }

            const sizes = options.sizes ?? presetSizes(options.preset);
            if (!isLogging) {
                progressBar = createProgressBar(sizes.length);
            }
            const exported = await exportSizes(
                master,
                {
                    sizes,
                    alphaVariant: options.binaryAlpha ? AlphaVariant.Binary : AlphaVariant.Full,
                    concurrency: options.concurrency,
                    signal: controller.signal,
                },
                {
                    logger,
                    onSizeDone: (size) => progressBar?.increment({ label: 'size', state: `${size}px` }),
                },
            );
            progressBar?.stop();

            const outputFolder = path.resolve(options.output);
            const name = options.name ?? baseNameWithoutExtension(inputFile);
            ensureOutputDirectory(outputFolder);
            for (const [size, image] of exported) {
                await writeImageData(image, path.join(outputFolder, `${name}_${size}.png`));
            }
            logger.success(`Exported ${exported.size} size(s) to "${outputFolder}".`);
            process.exit(0);
        } catch (error) {
            progressBar?.stop();
            if (error instanceof ExportCancelledError) {
                logger.warn('Export cancelled, nothing was written.');
            } else {
                logger.error(`Export failed: ${failureMessage(error)}`);
            }
            process.exit(1);
        } finally {
            process.off('SIGINT', onInterrupt);
        }
    });

if (require.main === module) {
    console.clear();
    console.log(gradient.rainbow.multiline(
        figlet.textSync('Icon-Matte', {
            font: 'Standard',
            horizontalLayout: 'default',
            verticalLayout: 'default',
            width: 80,
            whitespaceBreak: true,
        }),
    ));
    console.log(gradient.rainbow('Alpha matting, compositing and export for app icons.\n'));
    program.parseAsync(process.argv).catch((error: unknown) => {
        console.error(failureMessage(error));
        process.exit(1);
    });
}
