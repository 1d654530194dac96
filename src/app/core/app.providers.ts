import { InjectionToken, Injector, type StaticProvider } from '@angular/core';

import { GalleryViewController } from '@app/gallery/gallery-view.controller';
import { ThumbnailDecoder } from '@app/gallery/thumbnail-decoder';
import { BuildTracker } from '@app/publish/build-tracker';
import { UploadPreparer } from '@app/publish/upload-preparer';
import { GitHubService } from '@services/api/github/github.service';

import { RepositoryCache, type CachedPayload } from './cache/repository-cache.store';
import { TtlCache } from './cache/ttl-cache';
import { GALLERY_CONFIG, createConfig, type GalleryConfig, type GalleryConfigOverrides } from './config/gallery-config';
import { RateLimitTracker } from './rate-limit/rate-limit.tracker';

export const TTL_CACHE = new InjectionToken<TtlCache<CachedPayload>>('TTL_CACHE');

export function galleryProviders(config: GalleryConfig): StaticProvider[] {
    return [
        { provide: GALLERY_CONFIG, useValue: config },
        {
            provide: TTL_CACHE,
            useFactory: (c: GalleryConfig) => new TtlCache<CachedPayload>({
                defaultTtlMs: c.cache.defaultTtlMs,
                maxItems: c.cache.maxItems,
                enabled: c.cache.enabled,
            }),
            deps: [GALLERY_CONFIG],
        },
        {
            provide: RepositoryCache,
            useFactory: (cache: TtlCache<CachedPayload>) => new RepositoryCache(cache),
            deps: [TTL_CACHE],
        },
        {
            provide: RateLimitTracker,
            useFactory: (c: GalleryConfig) => new RateLimitTracker(c.rateLimit),
            deps: [GALLERY_CONFIG],
        },
        {
            provide: GitHubService,
            useFactory: (c: GalleryConfig, rateLimit: RateLimitTracker, cache: RepositoryCache) =>
                new GitHubService(c, rateLimit, cache),
            deps: [GALLERY_CONFIG, RateLimitTracker, RepositoryCache],
        },
        {
            provide: ThumbnailDecoder,
            useFactory: (c: GalleryConfig) => new ThumbnailDecoder(c.thumbnails),
            deps: [GALLERY_CONFIG],
        },
        {
            provide: BuildTracker,
            useFactory: (c: GalleryConfig, github: GitHubService) => new BuildTracker(c.buildTracking, github),
            deps: [GALLERY_CONFIG, GitHubService],
        },
        {
            provide: UploadPreparer,
            useFactory: (c: GalleryConfig) => new UploadPreparer(c.upload, c.thumbnailDirectory),
            deps: [GALLERY_CONFIG],
        },
    ];
}

/** One injector per application lifetime; every service it hands out is a singleton. */
export function createGalleryInjector(overrides: GalleryConfigOverrides = {}): Injector {
    return Injector.create({ providers: galleryProviders(createConfig(overrides)), name: 'gallery' });
}

/** Gallery views are not shared, so each call builds a new controller over the shared services. */
export function createGalleryView(injector: Injector): GalleryViewController {
    return new GalleryViewController(injector.get(GALLERY_CONFIG), {
        source: injector.get(GitHubService),
        decoder: injector.get(ThumbnailDecoder),
        cache: injector.get(RepositoryCache),
        rateLimit: injector.get(RateLimitTracker),
    });
}

/** Stops build polling and drops cached data. */
export async function shutdownGallery(injector: Injector): Promise<void> {
    await injector.get(BuildTracker).cancelAll();
    injector.get(TTL_CACHE).clear();
}
