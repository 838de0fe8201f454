import { DeadlineExceededError } from '../../utils/errors';
import { logger } from '../observability';

/**
 * hard: pre-emptive. The operation is abandoned (and its signal aborted) the moment the
 *       budget runs out, even mid-request.
 * soft: advisory. The operation always runs to completion; overrun is only visible to the
 *       caller afterwards, through `elapsedMs`.
 */
export type DeadlineMode = 'hard' | 'soft';

export type DeadlineOutcome<T> =
    | { status: 'completed'; value: T; elapsedMs: number }
    | { status: 'deadline_exceeded'; elapsedMs: number };

export type DeadlineOperation<T> = (signal: AbortSignal) => Promise<T>;

export interface Clock {
    now(): number;
}

export const systemClock: Clock = { now: () => performance.now() };

/** Wall-clock allowance for one entity: consumed monotonically, never replenished. */
export class Budget {
    private readonly startedAt: number;

    constructor(public readonly totalMs: number, private readonly clock: Clock = systemClock) {
        this.startedAt = clock.now();
    }

    elapsedMs(): number {
        return this.clock.now() - this.startedAt;
    }

    remainingMs(): number {
        return this.totalMs - this.elapsedMs();
    }

    exhausted(): boolean {
        return this.remainingMs() <= 0;
    }
}

export class DeadlineManager {
    // Only one hard deadline may be armed at a time
    private armed = false;

    constructor(readonly mode: DeadlineMode, private readonly clock: Clock = systemClock) { }

    async runWithDeadline<T>(seconds: number, operation: DeadlineOperation<T>, label = 'operation'): Promise<DeadlineOutcome<T>> {
        return this.mode === 'hard'
            ? this.runHard(seconds * 1000, operation, label)
            : this.runSoft(operation);
    }

    /** True when a soft-mode outcome took longer than the stage was allowed. */
    static overran(outcome: DeadlineOutcome<unknown>, seconds: number): boolean {
        return outcome.status === 'deadline_exceeded' || outcome.elapsedMs > seconds * 1000;
    }

    private async runSoft<T>(operation: DeadlineOperation<T>): Promise<DeadlineOutcome<T>> {
        const startedAt = this.clock.now();
        // Never aborted: soft mode has no way to interrupt the call
        const value = await operation(new AbortController().signal);
        return { status: 'completed', value, elapsedMs: this.clock.now() - startedAt };
    }

    private async runHard<T>(budgetMs: number, operation: DeadlineOperation<T>, label: string): Promise<DeadlineOutcome<T>> {
        if (this.armed) {
            throw new Error('A hard deadline is already armed; stages must not nest');
        }
        this.armed = true;

        const startedAt = this.clock.now();
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;

        const expiry = new Promise<'expired'>(resolve => {
            timer = setTimeout(() => resolve('expired'), Math.max(0, budgetMs));
        });

        try {
            const running = operation(controller.signal);
            const winner = await Promise.race([running.then(value => ({ value })), expiry]);
            if (winner === 'expired') {
                controller.abort(new DeadlineExceededError(budgetMs, label));
                // The abandoned call may still settle later; its outcome is dropped
                running.catch(e => logger.debug(`[Deadline] Abandoned ${label} settled with an error`, { error: String(e) }));
                logger.warn(`[Deadline] ${label} exceeded ${budgetMs}ms, aborted`);
                return { status: 'deadline_exceeded', elapsedMs: this.clock.now() - startedAt };
            }
            return { status: 'completed', value: winner.value, elapsedMs: this.clock.now() - startedAt };
        } finally {
            clearTimeout(timer);
            this.armed = false;
        }
    }
}
