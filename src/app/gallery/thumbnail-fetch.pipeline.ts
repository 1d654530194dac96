import { computed, signal } from '@angular/core';
import {
    Observable,
    ReplaySubject,
    Subject,
    TimeoutError,
    catchError,
    defaultIfEmpty,
    defer,
    firstValueFrom,
    from,
    map,
    mergeMap,
    of,
    switchMap,
    take,
    timeout,
} from 'rxjs';

import type { RepositoryCache } from '@core/cache/repository-cache.store';
import type { RateLimitTracker } from '@core/rate-limit/rate-limit.tracker';
import { errorMessage } from '@shared/utils/utils';

import type {
    DecodedThumbnail,
    PipelineSummary,
    ThumbnailEvent,
    ThumbnailFailureReason,
} from './gallery.types';
import { ThumbnailDecodeError, type ImageDecoder } from './thumbnail-decoder';

export interface ThumbnailSource {
    download(url: string): Observable<Uint8Array>;
}

export interface ThumbnailRequest {
    name: string;
    path: string;
    downloadUrl: string | null;
    isFile: boolean;
}

export interface ThumbnailPipelineOptions {
    repository: string;
    maxWorkers: number;
    fetchTimeoutMs: number;
}

export interface ThumbnailPipelineDeps {
    source: ThumbnailSource;
    decoder: ImageDecoder;
    cache?: RepositoryCache | null;
    rateLimit?: RateLimitTracker | null;
}

export type PipelineState = 'idle' | 'running' | 'cancelling' | 'done';

type TaskResult =
    | { kind: 'success'; index: number; name: string; thumbnail: DecodedThumbnail; fromCache: boolean }
    | { kind: 'failure'; index: number; name: string; reason: ThumbnailFailureReason; message: string }
    | { kind: 'cancelled'; index: number };

class EmptyDownloadError extends Error {
    constructor() {
        super('Download finished without content');
        this.name = 'EmptyDownloadError';
    }
}

function classifyFailure(error: unknown): ThumbnailFailureReason {
    if (error instanceof TimeoutError) {
        return 'timeout';
    }

    if (error instanceof ThumbnailDecodeError) {
        return 'decode';
    }

    return 'network';
}

/**
 * Downloads and decodes one batch of thumbnails on a bounded worker pool.
 *
 * Every submitted item yields exactly one `item` event (success or failure, in completion order), then
 * a single `done` event. After {@link cancel}, queued tasks skip their network call and decode, and no
 * further `item` events are emitted; the `done` summary still accounts for every task.
 */
export class ThumbnailFetchPipeline {
    private readonly eventsSubject = new Subject<ThumbnailEvent>();
    private readonly summarySubject = new ReplaySubject<PipelineSummary>(1);
    private readonly stateSignal = signal<PipelineState>('idle');
    private readonly settledSignal = signal(0);
    private readonly cancelledSignal = signal(false);

    private readonly counts = { succeeded: 0, failed: 0, cancelled: 0 };

    readonly events$ = this.eventsSubject.asObservable();
    readonly state = this.stateSignal.asReadonly();
    readonly cancelled = this.cancelledSignal.asReadonly();
    readonly progress = computed(() => ({ settled: this.settledSignal(), total: this.requests.length }));

    constructor(
        private readonly requests: readonly ThumbnailRequest[],
        private readonly options: ThumbnailPipelineOptions,
        private readonly deps: ThumbnailPipelineDeps,
    ) { }

    get workerCount(): number {
        return Math.max(1, Math.min(Math.floor(this.options.maxWorkers), this.requests.length));
    }

    start(): void {
        if (this.stateSignal() !== 'idle') {
            return;
        }

        this.stateSignal.set('running');
        if (this.deps.rateLimit?.level() === 'critical') {
            console.warn(`ThumbnailFetchPipeline: starting ${this.options.repository} with a critical rate limit`);
        }

        const tasks = this.requests.map((request, index) => ({ request, index }));
        from(tasks)
            .pipe(mergeMap(({ request, index }) => this.runTask(request, index), this.workerCount))
            .subscribe({
                next: result => this.settle(result),
                complete: () => this.finish(),
            });
    }

    /** Idempotent; the cancelled flag is never cleared. */
    cancel(): void {
        if (this.cancelledSignal()) {
            return;
        }

        this.cancelledSignal.set(true);

        if (this.stateSignal() === 'idle') {
            this.counts.cancelled = this.requests.length;
            this.settledSignal.set(this.requests.length);
            this.finish();
        } else if (this.stateSignal() === 'running') {
            this.stateSignal.set('cancelling');
        }
    }

    join(): Promise<PipelineSummary> {
        return firstValueFrom(this.summarySubject);
    }

    cancelAndJoin(): Promise<PipelineSummary> {
        this.cancel();
        return this.join();
    }

    private runTask(request: ThumbnailRequest, index: number): Observable<TaskResult> {
        return defer(() => {
            if (this.cancelledSignal()) {
                return of<TaskResult>({ kind: 'cancelled', index });
            }

            const { name, path, downloadUrl } = request;
            if (!request.isFile || !downloadUrl) {
                return of<TaskResult>({
                    kind: 'failure',
                    index,
                    name,
                    reason: 'not-a-file',
                    message: `${path} is not a downloadable file`,
                });
            }

            const cached = this.deps.cache?.getThumbnail(this.options.repository, path) ?? null;
            if (cached) {
                return of<TaskResult>({ kind: 'success', index, name, thumbnail: cached, fromCache: true });
            }

            return this.deps.source.download(downloadUrl).pipe(
                timeout(this.options.fetchTimeoutMs),
                take(1),
                defaultIfEmpty(null),
                switchMap(bytes => {
                    if (this.cancelledSignal()) {
                        return of<TaskResult>({ kind: 'cancelled', index });
                    }

                    if (bytes === null) {
                        throw new EmptyDownloadError();
                    }

                    return from(this.deps.decoder.decode(bytes)).pipe(
                        map((thumbnail): TaskResult => {
                            this.deps.cache?.setThumbnail(this.options.repository, path, thumbnail);
                            return { kind: 'success', index, name, thumbnail, fromCache: false };
                        }),
                    );
                }),
                catchError(error => {
                    const reason = classifyFailure(error);
                    const message = errorMessage(error);
                    console.warn(`ThumbnailFetchPipeline: ${path} failed (${reason}): ${message}`);
                    return of<TaskResult>({ kind: 'failure', index, name, reason, message });
                }),
            );
        });
    }

    private settle(result: TaskResult): void {
        this.settledSignal.update(settled => settled + 1);

        // Results that land after cancellation are discarded, whatever their outcome.
        if (result.kind === 'cancelled' || this.cancelledSignal()) {
            this.counts.cancelled += 1;
            return;
        }

        if (result.kind === 'success') {
            this.counts.succeeded += 1;
            this.eventsSubject.next({
                type: 'item',
                index: result.index,
                name: result.name,
                thumbnail: result.thumbnail,
                fromCache: result.fromCache,
            });
            return;
        }

        this.counts.failed += 1;
        this.eventsSubject.next({
            type: 'item',
            index: result.index,
            name: result.name,
            thumbnail: null,
            reason: result.reason,
            message: result.message,
        });
    }

    private finish(): void {
        if (this.stateSignal() === 'done') {
            return;
        }

        this.stateSignal.set('done');
        const summary: PipelineSummary = {
            total: this.requests.length,
            ...this.counts,
            rateLimitLevel: this.deps.rateLimit?.level() ?? 'unknown',
        };

        this.eventsSubject.next({ type: 'done', summary });
        this.eventsSubject.complete();
        this.summarySubject.next(summary);
        this.summarySubject.complete();
    }
}
