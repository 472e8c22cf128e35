// src/stateMachine/AbstractStateMachine.ts

import type { ILogger, IProgressBar } from '../@types/index.ts';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
    progressBar?: IProgressBar;
}

interface IStateTransition<S> {
    state: S;
    handler: () => Promise<void> | void;
}

/**
 * Runs a fixed sequence of states, one handler each, and yields the result the
 * subclass assembled along the way.
 *
 * @typeParam S - State enumeration.
 * @typeParam O - Options; must carry the logger and verbosity.
 * @typeParam R - Result produced once every handler succeeded.
 */
export abstract class AbstractStateMachine<S, O extends IStateMachineOptions, R> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: IStateTransition<S>[];

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    /**
     * Executes every transition in order. A throwing handler moves the machine to the
     * error state, gets logged, and is rethrown to the caller.
     */
    async run(): Promise<R> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.call(this);
            }
            this.transitionTo(this.getCompletionState());
            return this.getResult();
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.fail(failure);
            throw failure;
        }
    }

    getState(): S {
        return this.state;
    }

    protected transitionTo(nextState: S): void {
        const { logger, verbose, progressBar } = this.options;
        if (verbose) {
            logger.debug(`STATE :: Transitioning from state "${this.state}" -> "${nextState}"`);
        }
        progressBar?.increment({ state: nextState });
        this.state = nextState;
    }

    private fail(error: Error): void {
        const { logger } = this.options;
        logger.error(`Error occurred during "${this.state}": ${error.message}`);
        this.state = this.getErrorState();
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
    protected abstract getResult(): R;
}
