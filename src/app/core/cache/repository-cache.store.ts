import type { DecodedThumbnail } from '@app/gallery/gallery.types';
import type {
    GitHubCommit,
    GitHubContentEntry,
    GitHubRepository,
    ImageMetadata,
} from '@services/api/github/models';

import { TtlCache } from './ttl-cache';

export type CachedPayload =
    | { namespace: 'repositories'; value: GitHubRepository[] }
    | { namespace: 'contents'; value: GitHubContentEntry[] }
    | { namespace: 'commits'; value: GitHubCommit[] }
    | { namespace: 'image-metadata'; value: ImageMetadata[] }
    | { namespace: 'thumbnails'; value: DecodedThumbnail };

export type CacheNamespace = CachedPayload['namespace'];

export interface CacheKeyParts {
    namespace: CacheNamespace;
    repository: string | null;
    id: string;
}

const NAMESPACES: readonly CacheNamespace[] = ['repositories', 'contents', 'commits', 'image-metadata', 'thumbnails'];

const SECOND_MS = 1000;

export const REPOSITORY_CACHE_TTL_MS = {
    repositories: 300 * SECOND_MS,
    contents: 180 * SECOND_MS,
    commits: 300 * SECOND_MS,
    imageMetadata: 600 * SECOND_MS,
} as const;

export function encodeCacheKey(parts: CacheKeyParts): string {
    return JSON.stringify([parts.namespace, parts.repository, parts.id]);
}

export function parseCacheKey(key: string): CacheKeyParts | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(key);
    } catch {
        return null;
    }

    if (!Array.isArray(parsed) || parsed.length !== 3) {
        return null;
    }

    const [namespace, repository, id]: unknown[] = parsed;
    const knownNamespace = NAMESPACES.find(candidate => candidate === namespace);
    if (!knownNamespace || typeof id !== 'string') {
        return null;
    }

    if (repository === null) {
        return { namespace: knownNamespace, repository: null, id };
    }

    return typeof repository === 'string' ? { namespace: knownNamespace, repository, id } : null;
}

/**
 * Namespaced view over the shared {@link TtlCache}. Keys are `(namespace, repository, path-or-id)`
 * tuples, so one repository's entries can be dropped without touching any other repository or the
 * global repository list.
 */
export class RepositoryCache {
    constructor(private readonly cache: TtlCache<CachedPayload>) { }

    getRepositories(): GitHubRepository[] | null {
        const payload = this.read('repositories', null, '');
        return payload?.namespace === 'repositories' ? payload.value : null;
    }

    setRepositories(repositories: GitHubRepository[], ttlMs: number = REPOSITORY_CACHE_TTL_MS.repositories): void {
        this.write({ namespace: 'repositories', value: repositories }, null, '', ttlMs);
    }

    getContents(repository: string, path = ''): GitHubContentEntry[] | null {
        const payload = this.read('contents', repository, path);
        return payload?.namespace === 'contents' ? payload.value : null;
    }

    setContents(repository: string, path: string, contents: GitHubContentEntry[], ttlMs: number = REPOSITORY_CACHE_TTL_MS.contents): void {
        this.write({ namespace: 'contents', value: contents }, repository, path, ttlMs);
    }

    getCommits(repository: string, path = ''): GitHubCommit[] | null {
        const payload = this.read('commits', repository, path);
        return payload?.namespace === 'commits' ? payload.value : null;
    }

    setCommits(repository: string, path: string, commits: GitHubCommit[], ttlMs: number = REPOSITORY_CACHE_TTL_MS.commits): void {
        this.write({ namespace: 'commits', value: commits }, repository, path, ttlMs);
    }

    getImageMetadata(repository: string): ImageMetadata[] | null {
        const payload = this.read('image-metadata', repository, '');
        return payload?.namespace === 'image-metadata' ? payload.value : null;
    }

    setImageMetadata(repository: string, metadata: ImageMetadata[], ttlMs: number = REPOSITORY_CACHE_TTL_MS.imageMetadata): void {
        this.write({ namespace: 'image-metadata', value: metadata }, repository, '', ttlMs);
    }

    getThumbnail(repository: string, path: string): DecodedThumbnail | null {
        const payload = this.read('thumbnails', repository, path);
        return payload?.namespace === 'thumbnails' ? payload.value : null;
    }

    /** Thumbnails live for the cache's default TTL. */
    setThumbnail(repository: string, path: string, thumbnail: DecodedThumbnail): void {
        this.write({ namespace: 'thumbnails', value: thumbnail }, repository, path);
    }

    invalidateRepository(repository: string): number {
        const removed = this.cache.deleteWhere(key => parseCacheKey(key)?.repository === repository);
        console.debug(`RepositoryCache: invalidated ${removed} entries for ${repository}`);
        return removed;
    }

    invalidateAll(): number {
        return this.cache.deleteWhere(key => parseCacheKey(key) !== null);
    }

    private read(namespace: CacheNamespace, repository: string | null, id: string): CachedPayload | null {
        const lookup = this.cache.get(encodeCacheKey({ namespace, repository, id }));
        return lookup.found ? lookup.value : null;
    }

    private write(payload: CachedPayload, repository: string | null, id: string, ttlMs?: number): void {
        this.cache.set(encodeCacheKey({ namespace: payload.namespace, repository, id }), payload, ttlMs);
    }
}
