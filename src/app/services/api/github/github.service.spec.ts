import { firstValueFrom } from 'rxjs';
import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import { RepositoryCache, type CachedPayload } from '@core/cache/repository-cache.store';
import { TtlCache } from '@core/cache/ttl-cache';
import { RateLimitTracker } from '@core/rate-limit/rate-limit.tracker';

import { GitHubApiError } from './api-error';
import { GitHubService } from './github.service';
import type { GitHubCommit, GitHubContentEntry } from './models';

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

const entry = (name: string): GitHubContentEntry => ({
    name,
    path: `thumbnails/${name}`,
    sha: `sha-${name}`,
    size: 100,
    type: 'file',
    download_url: `https://raw.example.test/${name}`,
});

const json = (body: unknown, status = 200, headers: Record<string, string> = {}) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json', ...headers } });

describe('GitHubService', () => {
    let fetchMock: Mock<FetchFn>;
    let cache: RepositoryCache;
    let rateLimit: RateLimitTracker;
    let service: GitHubService;

    const requestAt = (call: number) => {
        const [input, init] = fetchMock.mock.calls[call];
        return { url: String(input), init, headers: new Headers(init?.headers) };
    };

    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        vi.spyOn(console, 'debug').mockImplementation(() => undefined);

        fetchMock = vi.fn<FetchFn>();
        vi.stubGlobal('fetch', fetchMock);

        cache = new RepositoryCache(new TtlCache<CachedPayload>({ defaultTtlMs: 60_000, maxItems: 100 }));
        rateLimit = new RateLimitTracker({ warningThreshold: 100, criticalThreshold: 10 });
        service = new GitHubService(
            {
                apiBaseUrl: 'https://api.example.test/',
                organization: 'test-org',
                thumbnailDirectory: 'thumbnails',
                authToken: 'test-token',
                thumbnails: { maxWorkers: 2, fetchTimeoutMs: 1_000, edgePx: 64, jpegQuality: 80 },
            },
            rateLimit,
            cache,
        );
    });

    it('lists repositories once and then serves them from the cache', async () => {
        fetchMock.mockResolvedValueOnce(json([{ id: 1, name: 'summer' }]));

        const first = await firstValueFrom(service.getRepositories());
        const second = await firstValueFrom(service.getRepositories());

        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(second).toEqual(first);
        const { url, headers } = requestAt(0);
        expect(url).toBe('https://api.example.test/orgs/test-org/repos?per_page=100');
        expect(headers.get('Authorization')).toBe('token test-token');
        expect(headers.get('Accept')).toBe('application/vnd.github.v3+json');
    });

    it('updates the rate-limit tracker from response headers', async () => {
        fetchMock.mockResolvedValueOnce(json([], 200, {
            'x-ratelimit-remaining': '42',
            'x-ratelimit-limit': '5000',
            'x-ratelimit-reset': '1700000000',
        }));

        await firstValueFrom(service.getRepositories());

        expect(rateLimit.snapshot()?.remaining).toBe(42);
        expect(rateLimit.level()).toBe('warning');
    });

    it('lists a directory and caches it per repository and path', async () => {
        fetchMock.mockResolvedValueOnce(json([entry('a.jpg'), entry('b.jpg')]));

        const contents = await firstValueFrom(service.listContents('summer', 'thumbnails'));

        expect(contents.map(item => item.name)).toEqual(['a.jpg', 'b.jpg']);
        expect(requestAt(0).url).toBe('https://api.example.test/repos/test-org/summer/contents/thumbnails');
        expect(cache.getContents('summer', 'thumbnails')).toEqual(contents);
    });

    it('lists a missing directory as empty', async () => {
        fetchMock.mockResolvedValueOnce(json({ message: 'Not Found' }, 404));

        expect(await firstValueFrom(service.listContents('summer', 'thumbnails'))).toEqual([]);
    });

    it('pairs thumbnails with their originals', async () => {
        fetchMock
            .mockResolvedValueOnce(json([entry('a.jpg'), entry('b.jpg')]))
            .mockResolvedValueOnce(json([
                { ...entry('a.jpg'), path: 'a.jpg', size: 4096 },
                { ...entry('thumbnails'), path: 'thumbnails', type: 'dir', size: 0 },
            ]));

        const metadata = await firstValueFrom(service.getImageMetadata('summer'));

        expect(metadata.map(item => [item.name, item.thumbnailSize, item.originalSize])).toEqual([
            ['a.jpg', 100, 4096],
            ['b.jpg', 100, null],
        ]);
        expect(requestAt(1).url).toBe('https://api.example.test/repos/test-org/summer/contents/');
        expect(cache.getImageMetadata('summer')).toEqual(metadata);
    });

    it('uploads with PUT and invalidates only that repository', async () => {
        cache.setContents('summer', 'thumbnails', [entry('a.jpg')]);
        cache.setContents('winter', 'thumbnails', [entry('b.jpg')]);
        fetchMock.mockResolvedValueOnce(json({ content: entry('c.jpg'), commit: { sha: 'c1', html_url: 'x' } }, 201));

        const result = await firstValueFrom(service.uploadFile({
            repository: 'summer',
            path: 'thumbnails/c.jpg',
            content: 'aGVsbG8=',
            message: 'Add c.jpg',
        }));

        const { url, init, headers } = requestAt(0);
        expect(url).toBe('https://api.example.test/repos/test-org/summer/contents/thumbnails/c.jpg');
        expect(init?.method).toBe('PUT');
        expect(init?.body).toBe('{"message":"Add c.jpg","content":"aGVsbG8="}');
        expect(headers.get('Content-Type')).toBe('application/json');
        expect(result.commit.sha).toBe('c1');
        expect(cache.getContents('summer', 'thumbnails')).toBeNull();
        expect(cache.getContents('winter', 'thumbnails')).toHaveLength(1);
    });

    it('uploads several files one after another', async () => {
        fetchMock
            .mockResolvedValueOnce(json({ content: entry('d.jpg'), commit: { sha: 'c1', html_url: 'x' } }, 201))
            .mockResolvedValueOnce(json({ content: entry('d.jpg'), commit: { sha: 'c2', html_url: 'y' } }, 201));

        const results = await firstValueFrom(service.uploadFiles([
            { repository: 'summer', path: 'd.jpg', content: 'b3JpZw==', message: 'Upload d.jpg' },
            { repository: 'summer', path: 'thumbnails/d.jpg', content: 'dGh1bWI=', message: 'Upload thumbnails/d.jpg' },
        ]));

        expect(results.map(result => result.commit.sha)).toEqual(['c1', 'c2']);
        expect(requestAt(0).url).toBe('https://api.example.test/repos/test-org/summer/contents/d.jpg');
        expect(requestAt(1).url).toBe('https://api.example.test/repos/test-org/summer/contents/thumbnails/d.jpg');
    });

    it('stops uploading after the first failure', async () => {
        fetchMock.mockResolvedValueOnce(json({ message: 'Conflict' }, 409));

        const error = await firstValueFrom(service.uploadFiles([
            { repository: 'summer', path: 'd.jpg', content: 'b3JpZw==', message: 'Upload d.jpg' },
            { repository: 'summer', path: 'thumbnails/d.jpg', content: 'dGh1bWI=', message: 'Upload thumbnails/d.jpg' },
        ])).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(GitHubApiError);
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('lists commits once and then serves them from the cache', async () => {
        const commits: GitHubCommit[] = [{
            sha: 'abc123',
            html_url: 'https://example.test/commit/abc123',
            commit: { message: 'Upload beach.jpg', committer: { name: 'Test', email: 'test@example.test', date: '2024-05-01T10:00:00Z' } },
        }];
        fetchMock.mockResolvedValueOnce(json(commits));

        const first = await firstValueFrom(service.getCommits('summer'));
        const second = await firstValueFrom(service.getCommits('summer'));

        expect(first).toEqual(commits);
        expect(second).toEqual(commits);
        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(requestAt(0).url).toBe('https://api.example.test/repos/test-org/summer/commits?per_page=100');
    });

    it('enables Pages from the gh-pages branch root', async () => {
        fetchMock.mockResolvedValueOnce(json({ status: null }, 201));

        await firstValueFrom(service.enablePages('summer'));

        const { url, init } = requestAt(0);
        expect(url).toBe('https://api.example.test/repos/test-org/summer/pages');
        expect(init?.method).toBe('POST');
        expect(init?.body).toBe('{"source":{"branch":"gh-pages","path":"/"}}');
    });

    it('fails with a 404 error when Pages is not enabled', async () => {
        fetchMock.mockResolvedValueOnce(json({ message: 'Not Found' }, 404));

        const error = await firstValueFrom(service.getPagesStatus('summer')).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(GitHubApiError);
        expect(error).toMatchObject({ status: 404, operation: 'Get Pages status', detail: 'Not Found' });
    });

    it('downloads raw bytes without the API accept header', async () => {
        fetchMock.mockResolvedValueOnce(new Response(new Uint8Array([1, 2, 3])));

        const bytes = await firstValueFrom(service.download('https://raw.example.test/a.jpg'));

        expect(Array.from(bytes)).toEqual([1, 2, 3]);
        const { url, headers } = requestAt(0);
        expect(url).toBe('https://raw.example.test/a.jpg');
        expect(headers.get('Accept')).toBeNull();
    });

    it('rejects a failed download', async () => {
        fetchMock.mockResolvedValueOnce(new Response('missing', { status: 404 }));

        await expect(firstValueFrom(service.download('https://raw.example.test/a.jpg')))
            .rejects.toMatchObject({ status: 404, operation: 'Download file' });
    });

    it('builds the default Pages address', () => {
        expect(service.pagesUrl('summer')).toBe('https://test-org.github.io/summer/');
    });
});
