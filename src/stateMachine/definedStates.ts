// src/stateMachine/definedStates.ts

export enum PipelineStates {
    INIT = 'INIT',
    APPLY_MASKING = 'APPLY_MASKING',
    COMPOSE_CANVAS = 'COMPOSE_CANVAS',
    APPLY_SHAPE_WEIGHT = 'APPLY_SHAPE_WEIGHT',
    APPLY_STROKE = 'APPLY_STROKE',
    LIQUID_POLISH = 'LIQUID_POLISH',
    REFINE_EDGES = 'REFINE_EDGES',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
