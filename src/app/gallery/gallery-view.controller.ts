import { computed, signal } from '@angular/core';
import { firstValueFrom, type Observable } from 'rxjs';

import type { RepositoryCache } from '@core/cache/repository-cache.store';
import type { GalleryConfig } from '@core/config/gallery-config';
import type { RateLimitTracker } from '@core/rate-limit/rate-limit.tracker';
import { describeApiError } from '@services/api/github/api-error';
import type { GitHubContentEntry } from '@services/api/github/models';

import {
    toGalleryItem,
    type GalleryItem,
    type GalleryLayout,
    type GalleryLayoutMode,
    type MasonryLayout,
    type PipelineSummary,
    type ThumbnailEvent,
} from './gallery.types';
import { justifyRows } from './justified-row-math';
import { packMasonryColumns } from './masonry-column-math';
import type { ImageDecoder } from './thumbnail-decoder';
import { ThumbnailFetchPipeline, type ThumbnailSource } from './thumbnail-fetch.pipeline';

export interface GalleryContentSource extends ThumbnailSource {
    listContents(repository: string, path?: string): Observable<GitHubContentEntry[]>;
}

export interface GalleryViewDeps {
    source: GalleryContentSource;
    decoder: ImageDecoder;
    cache?: RepositoryCache | null;
    rateLimit?: RateLimitTracker | null;
}

export type GalleryViewConfig = Pick<GalleryConfig, 'thumbnailDirectory' | 'gallery' | 'thumbnails'>;

/**
 * State behind one gallery view: the selected repository, its thumbnails, and their placements.
 *
 * Opening a repository cancels and joins the pipeline of the previous selection before the new
 * one starts, so results for a superseded selection never reach the current items.
 */
export class GalleryViewController {
    private readonly repositoryState = signal<string | null>(null);
    private readonly itemsState = signal<GalleryItem[]>([]);
    private readonly containerWidthState = signal(0);
    private readonly modeState = signal<GalleryLayoutMode>('justified');
    private readonly loadingState = signal(false);
    private readonly errorState = signal<string | null>(null);
    private readonly settledState = signal(0);

    private pipeline: ThumbnailFetchPipeline | null = null;
    /** Settles once every pipeline handed to {@link stopPipeline} so far has wound down. */
    private teardown: Promise<unknown> = Promise.resolve();
    private generation = 0;
    private disposed = false;

    readonly repository = this.repositoryState.asReadonly();
    readonly items = this.itemsState.asReadonly();
    readonly containerWidth = this.containerWidthState.asReadonly();
    readonly mode = this.modeState.asReadonly();
    readonly loading = this.loadingState.asReadonly();
    readonly error = this.errorState.asReadonly();

    readonly progress = computed(() => ({ settled: this.settledState(), total: this.itemsState().length }));
    readonly readyCount = computed(() => this.itemsState().filter(item => item.status === 'ready').length);

    readonly layout = computed((): GalleryLayout<GalleryItem> | MasonryLayout<GalleryItem> => {
        const { rowHeightPx, spacingPx, masonryColumns } = this.config.gallery;
        const containerWidthPx = this.containerWidthState();

        return this.modeState() === 'masonry'
            ? packMasonryColumns(this.itemsState(), { containerWidthPx, columns: masonryColumns, spacingPx })
            : justifyRows(this.itemsState(), { containerWidthPx, rowHeightPx, spacingPx });
    });

    constructor(
        private readonly config: GalleryViewConfig,
        private readonly deps: GalleryViewDeps,
    ) { }

    resize(containerWidthPx: number): void {
        this.containerWidthState.set(containerWidthPx);
    }

    setMode(mode: GalleryLayoutMode): void {
        this.modeState.set(mode);
    }

    /**
     * Lists the repository's thumbnail directory and fetches every thumbnail. Resolves with the
     * pipeline summary, or null when the listing failed or a later selection superseded this one.
     */
    async open(repository: string): Promise<PipelineSummary | null> {
        if (this.disposed) {
            return null;
        }

        const generation = ++this.generation;
        await this.stopPipeline();
        if (generation !== this.generation) {
            return null;
        }

        this.repositoryState.set(repository);
        this.itemsState.set([]);
        this.settledState.set(0);
        this.errorState.set(null);
        this.loadingState.set(true);

        let entries: GitHubContentEntry[];
        try {
            entries = await firstValueFrom(this.deps.source.listContents(repository, this.config.thumbnailDirectory));
        } catch (error) {
            if (generation === this.generation) {
                console.error(`GalleryViewController: failed to list ${repository}`, error);
                this.errorState.set(describeApiError(error, 'Load thumbnails'));
                this.loadingState.set(false);
            }
            return null;
        }

        if (generation !== this.generation) {
            return null;
        }

        const items = entries.map(toGalleryItem);
        this.itemsState.set(items);

        const pipeline = new ThumbnailFetchPipeline(
            items.map(({ name, path, downloadUrl, isFile }) => ({ name, path, downloadUrl, isFile })),
            {
                repository,
                maxWorkers: this.config.thumbnails.maxWorkers,
                fetchTimeoutMs: this.config.thumbnails.fetchTimeoutMs,
            },
            this.deps,
        );
        this.pipeline = pipeline;
        pipeline.events$.subscribe(event => this.apply(generation, event));
        pipeline.start();

        const summary = await pipeline.join();
        if (generation === this.generation) {
            this.loadingState.set(false);
            if (this.pipeline === pipeline) {
                this.pipeline = null;
            }
        }
        return summary;
    }

    /** Cancels the running fetch, if any, and leaves the items as they are. */
    async stop(): Promise<void> {
        this.generation++;
        await this.stopPipeline();
        this.loadingState.set(false);
    }

    async dispose(): Promise<void> {
        this.disposed = true;
        await this.stop();
        this.itemsState.set([]);
        this.repositoryState.set(null);
    }

    private stopPipeline(): Promise<unknown> {
        const pipeline = this.pipeline;
        this.pipeline = null;
        if (pipeline) {
            this.teardown = Promise.all([this.teardown, pipeline.cancelAndJoin()]);
        }
        return this.teardown;
    }

    private apply(generation: number, event: ThumbnailEvent): void {
        if (generation !== this.generation) {
            return;
        }

        if (event.type === 'done') {
            this.settledState.set(event.summary.total);
            return;
        }

        const { index, thumbnail } = event;
        this.settledState.update(settled => settled + 1);
        this.itemsState.update(items => items.map((item): GalleryItem => {
            if (item.index !== index) {
                return item;
            }
            if (thumbnail === null) {
                return { ...item, status: 'failed' };
            }
            const { sourceWidth, sourceHeight } = thumbnail;
            return {
                ...item,
                status: 'ready',
                thumbnail,
                aspectRatio: sourceHeight > 0 ? sourceWidth / sourceHeight : null,
            };
        }));
    }
}
