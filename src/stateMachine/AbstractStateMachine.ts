// src/stateMachine/AbstractStateMachine.ts

import type { ILogger, IProgressBar } from '../@types';
import { errorMessage } from '../core/errors';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
    progressBar?: IProgressBar;
}

export abstract class AbstractStateMachine<S, O extends IStateMachineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: () => Promise<void> | void }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    get currentState(): S {
        return this.state;
    }

    /**
     * Runs every transition in order, invoking its handler after entering the state.
     * On failure the machine moves to the error state, logs, and rethrows.
     */
    async run(): Promise<void> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.call(this);
            }
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            const failedState = this.state;
            this.transitionTo(this.getErrorState());
            this.handleError(failedState, error);
        }
    }

    /**
     * Moves to `nextState`, logging the transition when verbose and advancing the
     * progress bar on every state except the error state.
     */
    protected transitionTo(nextState: S): void {
        const { logger, progressBar, verbose } = this.options;
        if (verbose) {
            logger.debug(`STATE :: Transitioning from state "${this.state}" -> "${nextState}"`);
        }
        if (progressBar && nextState !== this.getErrorState()) {
            progressBar.increment({ state: nextState });
        }
        this.state = nextState;
    }

    /**
     * Logs which state failed and rethrows the error.
     */
    protected handleError(failedState: S, error: unknown): never {
        this.options.logger.error(`Error occurred during "${failedState}": ${errorMessage(error)}`);
        throw error;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
