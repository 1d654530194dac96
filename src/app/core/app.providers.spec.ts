import { describe, expect, it } from 'vitest';

import { GalleryViewController } from '@app/gallery/gallery-view.controller';
import { BuildTracker } from '@app/publish/build-tracker';
import { UploadPreparer } from '@app/publish/upload-preparer';
import { GitHubService } from '@services/api/github/github.service';

import { TTL_CACHE, createGalleryInjector, createGalleryView } from './app.providers';
import { RepositoryCache } from './cache/repository-cache.store';
import { ConfigValidationError, GALLERY_CONFIG } from './config/gallery-config';
import { RateLimitTracker } from './rate-limit/rate-limit.tracker';

describe('createGalleryInjector', () => {
    it('hands out one instance of each service', () => {
        const injector = createGalleryInjector({ organization: 'test-org' });

        expect(injector.get(GitHubService)).toBe(injector.get(GitHubService));
        expect(injector.get(RateLimitTracker)).toBe(injector.get(RateLimitTracker));
        expect(injector.get(BuildTracker)).toBe(injector.get(BuildTracker));
        expect(injector.get(UploadPreparer)).toBe(injector.get(UploadPreparer));
        expect(injector.get(GitHubService).organization).toBe('test-org');
    });

    it('builds the cache from the configuration', () => {
        const injector = createGalleryInjector({ cache: { enabled: false, maxItems: 5 } });

        const cache = injector.get(TTL_CACHE);
        expect(cache.enabled).toBe(false);
        expect(cache.getStats()).toMatchObject({ maxItems: 5, enabled: false });
        expect(injector.get(GALLERY_CONFIG).cache.defaultTtlMs).toBe(300_000);
    });

    it('keeps separate injectors apart', () => {
        expect(createGalleryInjector().get(RepositoryCache)).not.toBe(createGalleryInjector().get(RepositoryCache));
    });

    it('rejects an invalid configuration', () => {
        expect(() => createGalleryInjector({ thumbnails: { maxWorkers: 0 } })).toThrow(ConfigValidationError);
    });

    it('creates a fresh view controller per call', () => {
        const injector = createGalleryInjector();

        const view = createGalleryView(injector);

        expect(view).toBeInstanceOf(GalleryViewController);
        expect(createGalleryView(injector)).not.toBe(view);
    });
});
