// src/stateMachine/AbstractStateMachine.ts

import type { IPipelineOptions } from '../@types';

export abstract class AbstractStateMachine<S, O extends IPipelineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: () => Promise<void> | void }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    /**
     * Executes the transitions in `stateTransitions` in order, moving to each state before running its handler.
     * Advances the progress bar when one is attached. A failing handler moves the machine to the error state
     * and the error is rethrown.
     */
    async run(): Promise<void> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.bind(this)();
            }
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.transitionTo(this.getErrorState(), failure);
            this.handleError(failure);
        }
    }

    getState(): S {
        return this.state;
    }

    /**
     * Moves to `nextState`. Entering the error state with an error logs which state failed; any other
     * transition is logged in verbose mode and ticks the progress bar.
     */
    protected transitionTo(nextState: S, error?: Error): void {
        const { logger } = this.options;
        if (nextState === this.getErrorState() && error) {
            logger.error(`Error occurred during "${this.state}": ${error.message}`);
            this.state = this.getErrorState();
        } else {
            if (this.options.verbose) {
                logger.debug(`STATE :: Transitioning from state "${this.state}" -> "${nextState}"`);
            }
            if (this.options.progressBar) {
                this.options.progressBar.increment({ state: nextState });
            }
            this.state = nextState;
        }
    }

    protected handleError(error: Error): never {
        const { logger } = this.options;
        logger.error(`${this.constructor.name} failed: ${error.message}`);
        throw error;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
