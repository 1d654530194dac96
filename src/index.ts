export * from './app/core/app.providers';
export * from './app/core/cache/ttl-cache';
export * from './app/core/cache/repository-cache.store';
export * from './app/core/config/gallery-config';
export * from './app/core/rate-limit/rate-limit.tracker';

export * from './app/gallery/gallery.types';
export * from './app/gallery/justified-row-math';
export * from './app/gallery/masonry-column-math';
export * from './app/gallery/thumbnail-decoder';
export * from './app/gallery/thumbnail-fetch.pipeline';
export * from './app/gallery/gallery-view.controller';

export * from './app/publish/build-status.poller';
export * from './app/publish/build-tracker';
export * from './app/publish/upload-preparer';

export * from './app/services/api/github/api-error';
export * from './app/services/api/github/github.service';
export * from './app/services/api/github/models';
export * from './app/services/api/github/repository-name';

export * from './app/shared/utils/utils';
export { environment } from './environments/environment';
