// src/core/pipeline/stateMachine.ts

import type { IconSpecSet, IRenderOptions, RasterImage } from '../../@types';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine';
import { PipelineStates } from '../../stateMachine/definedStates';
import { composeOnSquare } from '../composition/compositionEngine';
import { applyMasking } from '../masking';
import { applyShapeWeight } from '../morphology/alphaMorphology';
import { liquidPolish } from '../polish/liquidPolisher';
import { refineEdges } from '../refine/edgeRefiner';
import { applyStroke } from '../stroke/strokeGenerator';

/**
 * One run of the icon pipeline. The working raster lives only inside this instance; every stage
 * replaces it with a new raster and the source is never written to.
 */
export class RenderStateMachine extends AbstractStateMachine<PipelineStates, IRenderOptions> {
    private working: RasterImage;
    private readonly specs: IconSpecSet;

    constructor(options: IRenderOptions) {
        super(PipelineStates.INIT, options);
        this.working = options.source;
        this.specs = options.specs;

        this.stateTransitions = [
            { state: PipelineStates.INIT, handler: this.init },
            { state: PipelineStates.APPLY_MASKING, handler: this.mask },
            { state: PipelineStates.COMPOSE_CANVAS, handler: this.compose },
            { state: PipelineStates.APPLY_SHAPE_WEIGHT, handler: this.shapeWeight },
            { state: PipelineStates.APPLY_STROKE, handler: this.stroke },
            { state: PipelineStates.LIQUID_POLISH, handler: this.polish },
            { state: PipelineStates.REFINE_EDGES, handler: this.refine },
        ];
    }

    get result(): RasterImage {
        if (this.state !== PipelineStates.COMPLETED) {
            throw new Error(`Pipeline has not completed (state "${this.state}")`);
        }
        return this.working;
    }

    protected getCompletionState(): PipelineStates {
        return PipelineStates.COMPLETED;
    }

    protected getErrorState(): PipelineStates {
        return PipelineStates.ERROR;
    }

    private init(): void {
        const { logger } = this.options;
        const { width, height, data } = this.working;
        if (width <= 0 || height <= 0 || data.length !== width * height * 4) {
            throw new Error(`Source raster is malformed (${width}x${height}, ${data.length} bytes)`);
        }
        logger.debug(`Rendering ${width}x${height} source to ${this.specs.composition.targetSize}px.`);
    }

    private mask(): void {
        this.working = applyMasking(this.working, this.specs.masking, this.options.logger);
    }

    private async compose(): Promise<void> {
        this.working = await composeOnSquare(this.working, this.specs.composition, this.options.logger);
    }

    private shapeWeight(): void {
        this.working = applyShapeWeight(this.working, this.specs.morphology);
    }

    private stroke(): void {
        if (this.specs.stroke) {
            this.working = applyStroke(this.working, this.specs.stroke);
        }
    }

    private async polish(): Promise<void> {
        this.working = await liquidPolish(this.working, this.specs.liquidPolish, this.options.logger);
    }

    private async refine(): Promise<void> {
        this.working = await refineEdges(this.working, this.specs.edgeRefine, this.options.logger);
    }
}
