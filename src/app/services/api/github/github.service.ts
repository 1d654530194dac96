import { Observable, concatMap, forkJoin, from, map, of, switchMap, tap, timeout, toArray } from 'rxjs';
import { fromFetch } from 'rxjs/fetch';

import type { GalleryConfig } from '@core/config/gallery-config';
import type { RepositoryCache } from '@core/cache/repository-cache.store';
import type { RateLimitTracker } from '@core/rate-limit/rate-limit.tracker';
import type { ThumbnailSource } from '@app/gallery/thumbnail-fetch.pipeline';

import { GitHubApiError } from './api-error';
import type {
    GitHubCommit,
    GitHubContentEntry,
    GitHubPagesStatus,
    GitHubRepository,
    GitHubUploadResponse,
    ImageMetadata,
    UploadFileRequest,
} from './models';

export type GitHubServiceConfig = Pick<GalleryConfig, 'apiBaseUrl' | 'organization' | 'authToken' | 'thumbnailDirectory' | 'thumbnails'>;

const ACCEPT_HEADER = 'application/vnd.github.v3+json';

/**
 * Hosting API collaborator. Listings are served from the shared cache when fresh; every response,
 * cached path excluded, refreshes the rate-limit tracker.
 */
export class GitHubService implements ThumbnailSource {
    private readonly baseUrl: string;

    constructor(
        private readonly config: GitHubServiceConfig,
        private readonly rateLimit: RateLimitTracker,
        private readonly cache: RepositoryCache,
    ) {
        this.baseUrl = config.apiBaseUrl.endsWith('/') ? config.apiBaseUrl.slice(0, -1) : config.apiBaseUrl;
    }

    get organization(): string {
        return this.config.organization;
    }

    getRepositories(): Observable<GitHubRepository[]> {
        const cached = this.cache.getRepositories();
        if (cached) {
            return of(cached);
        }

        return this.getJson<GitHubRepository[]>('List repositories', `/orgs/${this.organization}/repos?per_page=100`).pipe(
            tap(repositories => this.cache.setRepositories(repositories)),
        );
    }

    /** A missing directory lists as empty. */
    listContents(repository: string, path = ''): Observable<GitHubContentEntry[]> {
        const cached = this.cache.getContents(repository, path);
        if (cached) {
            return of(cached);
        }

        const url = `${this.repoPath(repository)}/contents/${encodePath(path)}`;
        return this.send('List contents', url).pipe(
            switchMap(async (response): Promise<GitHubContentEntry[]> => {
                if (response.status === 404) {
                    return [];
                }
                const body: unknown = await this.readJson(response, 'List contents');
                // A file path answers with a single object rather than an array.
                return Array.isArray(body) ? body : [];
            }),
            tap(contents => this.cache.setContents(repository, path, contents)),
        );
    }

    getCommits(repository: string, perPage = 100): Observable<GitHubCommit[]> {
        const cached = this.cache.getCommits(repository);
        if (cached) {
            return of(cached);
        }

        return this.getJson<GitHubCommit[]>('List commits', `${this.repoPath(repository)}/commits?per_page=${perPage}`).pipe(
            tap(commits => this.cache.setCommits(repository, '', commits)),
        );
    }

    /** Pairs each thumbnail with the original of the same name at the repository root. */
    getImageMetadata(repository: string): Observable<ImageMetadata[]> {
        const cached = this.cache.getImageMetadata(repository);
        if (cached) {
            return of(cached);
        }

        return forkJoin([
            this.listContents(repository, this.config.thumbnailDirectory),
            this.listContents(repository),
        ]).pipe(
            map(([thumbnails, originals]) => {
                const originalSizes = new Map(
                    originals.filter(entry => entry.type === 'file').map((entry): [string, number] => [entry.name, entry.size]),
                );
                return thumbnails
                    .filter(entry => entry.type === 'file')
                    .map((entry): ImageMetadata => ({
                        name: entry.name,
                        path: entry.path,
                        sha: entry.sha,
                        thumbnailSize: entry.size,
                        originalSize: originalSizes.get(entry.name) ?? null,
                        lastModified: null,
                    }));
            }),
            tap(metadata => this.cache.setImageMetadata(repository, metadata)),
        );
    }

    uploadFile(request: UploadFileRequest): Observable<GitHubUploadResponse> {
        const body = {
            message: request.message,
            content: request.content,
            ...(request.sha ? { sha: request.sha } : {}),
        };

        return this.getJson<GitHubUploadResponse>(
            'Upload file',
            `${this.repoPath(request.repository)}/contents/${encodePath(request.path)}`,
            { method: 'PUT', body: JSON.stringify(body) },
        ).pipe(
            tap(() => this.cache.invalidateRepository(request.repository)),
        );
    }

    /** Commits one file at a time, in order; the first failure stops the rest. */
    uploadFiles(requests: UploadFileRequest[]): Observable<GitHubUploadResponse[]> {
        return from(requests).pipe(
            concatMap(request => this.uploadFile(request)),
            toArray(),
        );
    }

    enablePages(repository: string, branch = 'gh-pages'): Observable<GitHubPagesStatus> {
        return this.getJson<GitHubPagesStatus>('Enable Pages', `${this.repoPath(repository)}/pages`, {
            method: 'POST',
            body: JSON.stringify({ source: { branch, path: '/' } }),
        });
    }

    /** Fails with a 404 {@link GitHubApiError} when Pages is not enabled. */
    getPagesStatus(repository: string): Observable<GitHubPagesStatus> {
        return this.getJson<GitHubPagesStatus>('Get Pages status', `${this.repoPath(repository)}/pages`);
    }

    download(url: string): Observable<Uint8Array> {
        return this.send('Download file', url, {}, false).pipe(
            timeout(this.config.thumbnails.fetchTimeoutMs),
            switchMap(async response => {
                if (!response.ok) {
                    throw await GitHubApiError.fromResponse(response, 'Download file');
                }
                return new Uint8Array(await response.arrayBuffer());
            }),
        );
    }

    pagesUrl(repository: string): string {
        return `https://${this.organization}.github.io/${repository}/`;
    }

    private repoPath(repository: string): string {
        return `/repos/${this.organization}/${encodeURIComponent(repository)}`;
    }

    private getJson<T>(operation: string, path: string, init: RequestInit = {}): Observable<T> {
        return this.send(operation, path, init).pipe(
            switchMap(response => this.readJson<T>(response, operation)),
        );
    }

    private async readJson<T>(response: Response, operation: string): Promise<T> {
        if (!response.ok) {
            const error = await GitHubApiError.fromResponse(response, operation);
            console.error(`GitHubService: ${error.message}`);
            throw error;
        }
        const body: T = await response.json();
        return body;
    }

    private send(operation: string, pathOrUrl: string, init: RequestInit = {}, api = true): Observable<Response> {
        const url = /^https?:\/\//.test(pathOrUrl) ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`;
        const headers = new Headers(init.headers);
        if (api) {
            headers.set('Accept', ACCEPT_HEADER);
        }
        if (init.body !== undefined) {
            headers.set('Content-Type', 'application/json');
        }
        if (this.config.authToken) {
            headers.set('Authorization', `token ${this.config.authToken}`);
        }

        return fromFetch(url, { ...init, headers }).pipe(
            tap({
                next: response => this.rateLimit.record(response.headers),
                error: (error: unknown) => console.error(`GitHubService: ${operation} request to ${url} failed`, error),
            }),
        );
    }
}

function encodePath(path: string): string {
    return path.split('/').filter(Boolean).map(encodeURIComponent).join('/');
}
