import { signal } from '@angular/core';
import {
    Observable,
    ReplaySubject,
    Subject,
    Subscription,
    catchError,
    defer,
    firstValueFrom,
    map,
    of,
    repeat,
    switchMap,
    takeWhile,
    tap,
    timer,
} from 'rxjs';

import type { BuildTrackingConfig } from '@core/config/gallery-config';
import { GitHubApiError } from '@services/api/github/api-error';
import type { GitHubPagesStatus } from '@services/api/github/models';
import { errorMessage } from '@shared/utils/utils';

export type BuildState = 'not_started' | 'building' | 'succeeded' | 'failed' | 'unknown' | 'timed_out';

export type BuildOutcome =
    | { result: 'success'; url: string }
    | { result: 'failure'; state: 'failed' | 'timed_out'; reason: string };

export type BuildEvent =
    | { type: 'status'; state: BuildState; message: string; attempt: number }
    | { type: 'complete'; outcome: BuildOutcome };

export interface PagesStatusSource {
    getPagesStatus(repository: string): Observable<GitHubPagesStatus>;
    pagesUrl(repository: string): string;
}

interface Observation {
    state: BuildState;
    message: string;
    /** Only states the remote reported are surfaced as status events. */
    reported: boolean;
    outcome: BuildOutcome | null;
}

const TERMINAL_STATES: ReadonlySet<BuildState> = new Set(['succeeded', 'failed', 'timed_out']);

export function isTerminal(state: BuildState | null): boolean {
    return state !== null && TERMINAL_STATES.has(state);
}

/**
 * Polls the Pages build of one repository until it settles, fails, or runs out of attempts.
 *
 * Emits a `status` event whenever the observed state changes and exactly one `complete` event at the
 * end, unless cancelled first.
 */
export class BuildStatusPoller {
    private readonly eventsSubject = new Subject<BuildEvent>();
    private readonly outcomeSubject = new ReplaySubject<BuildOutcome | null>(1);
    private readonly stateSignal = signal<BuildState | null>(null);
    private readonly attemptSignal = signal(0);

    private subscription: Subscription | null = null;
    private started = false;
    private finished = false;
    private outcome: BuildOutcome | null = null;

    readonly events$ = this.eventsSubject.asObservable();
    readonly state = this.stateSignal.asReadonly();
    readonly attempt = this.attemptSignal.asReadonly();

    constructor(
        readonly repository: string,
        private readonly options: BuildTrackingConfig,
        private readonly source: PagesStatusSource,
    ) { }

    get active(): boolean {
        return this.started && !this.finished;
    }

    start(): void {
        if (this.started || this.finished) {
            return;
        }
        this.started = true;

        const subscription = timer(this.options.initialDelayMs).pipe(
            switchMap(() => defer(() => this.poll()).pipe(
                repeat({ count: this.options.maxAttempts, delay: this.options.pollIntervalMs }),
            )),
            tap(observation => this.observe(observation)),
            takeWhile(observation => !isTerminal(observation.state), true),
        ).subscribe({
            complete: () => this.complete(),
        });

        if (!this.finished) {
            this.subscription = subscription;
        }
    }

    /** Stops polling without a completion event; idempotent. */
    cancel(): void {
        if (this.finished) {
            return;
        }

        this.subscription?.unsubscribe();
        this.subscription = null;
        console.debug(`BuildStatusPoller: cancelled ${this.repository} after ${this.attemptSignal()} checks`);
        this.finalize(null);
    }

    /** Resolves with the outcome, or null when the poller was cancelled. */
    join(): Promise<BuildOutcome | null> {
        return firstValueFrom(this.outcomeSubject);
    }

    cancelAndJoin(): Promise<BuildOutcome | null> {
        this.cancel();
        return this.join();
    }

    private poll(): Observable<Observation> {
        const attempt = this.attemptSignal() + 1;
        this.attemptSignal.set(attempt);
        console.debug(`BuildStatusPoller: checking ${this.repository} (${attempt}/${this.options.maxAttempts})`);

        return this.source.getPagesStatus(this.repository).pipe(
            map(status => this.interpret(status)),
            catchError(error => of(this.interpretError(error))),
        );
    }

    private interpret(status: GitHubPagesStatus): Observation {
        switch (status.status) {
            case 'built': {
                const url = status.html_url || this.source.pagesUrl(this.repository);
                return { state: 'succeeded', message: `Site published at ${url}`, reported: true, outcome: { result: 'success', url } };
            }
            case 'building':
                return { state: 'building', message: 'Site is building', reported: true, outcome: null };
            case 'errored': {
                const reason = status.error?.message || 'Pages build failed';
                return { state: 'failed', message: reason, reported: true, outcome: { result: 'failure', state: 'failed', reason } };
            }
            case 'not_enabled':
                return this.notEnabled();
            case 'not_built':
            case null:
                return { state: 'not_started', message: 'Build has not started yet', reported: true, outcome: null };
            default:
                return { state: 'unknown', message: `Unknown build status: ${status.status}`, reported: true, outcome: null };
        }
    }

    private interpretError(error: unknown): Observation {
        if (error instanceof GitHubApiError && error.status === 404) {
            return this.notEnabled();
        }

        const reason = `Could not check build status: ${errorMessage(error)}`;
        return { state: 'failed', message: reason, reported: false, outcome: { result: 'failure', state: 'failed', reason } };
    }

    private notEnabled(): Observation {
        const reason = 'GitHub Pages is not enabled for this repository';
        return { state: 'failed', message: reason, reported: false, outcome: { result: 'failure', state: 'failed', reason } };
    }

    private observe(observation: Observation): void {
        if (observation.reported && observation.state !== this.stateSignal()) {
            this.eventsSubject.next({
                type: 'status',
                state: observation.state,
                message: observation.message,
                attempt: this.attemptSignal(),
            });
        }

        this.stateSignal.set(observation.state);
        this.outcome = observation.outcome;
    }

    private complete(): void {
        let outcome = this.outcome;
        if (outcome === null) {
            this.stateSignal.set('timed_out');
            outcome = {
                result: 'failure',
                state: 'timed_out',
                reason: `Build did not finish after ${this.attemptSignal()} checks`,
            };
        }

        if (outcome.result === 'failure') {
            console.warn(`BuildStatusPoller: ${this.repository} ${outcome.state}: ${outcome.reason}`);
        }

        this.eventsSubject.next({ type: 'complete', outcome });
        this.finalize(outcome);
    }

    private finalize(outcome: BuildOutcome | null): void {
        this.finished = true;
        this.subscription = null;
        this.eventsSubject.complete();
        this.outcomeSubject.next(outcome);
        this.outcomeSubject.complete();
    }
}
