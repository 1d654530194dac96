import { TimeoutError } from 'rxjs';

import { errorMessage } from '@shared/utils/utils';

/** Unexpected HTTP status from the hosting API. */
export class GitHubApiError extends Error {
    constructor(
        readonly status: number,
        readonly operation: string,
        readonly url: string,
        readonly detail: string | null = null,
    ) {
        super(`${operation} failed: HTTP ${status}${detail ? ` (${detail})` : ''}`);
        this.name = 'GitHubApiError';
    }

    get isRateLimited(): boolean {
        return this.status === 403 && (this.detail ?? '').toLowerCase().includes('rate limit');
    }

    static async fromResponse(response: Response, operation: string): Promise<GitHubApiError> {
        return new GitHubApiError(response.status, operation, response.url, await readErrorDetail(response));
    }
}

async function readErrorDetail(response: Response): Promise<string | null> {
    try {
        const body: unknown = await response.json();
        if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
            return body.message;
        }
        return null;
    } catch {
        // Error bodies are not always JSON.
        return null;
    }
}

function describeStatus(error: GitHubApiError): string | null {
    if (error.status === 401) {
        return 'Authentication failed. Please check your GitHub token.';
    }
    if (error.status === 403) {
        return error.isRateLimited
            ? 'GitHub API rate limit exceeded. Please try again later.'
            : 'Access denied. You may not have permission for this operation.';
    }
    if (error.status === 404) {
        return 'Resource not found. The repository or file may not exist.';
    }
    if (error.status === 422) {
        return 'Invalid request. Please check your input and try again.';
    }
    if (error.status >= 500) {
        return 'GitHub server error. Please try again later.';
    }
    return null;
}

/** Message shown to the user for a failed API call. */
export function describeApiError(error: unknown, operation: string): string {
    const message = errorMessage(error);
    let summary: string;

    if (error instanceof GitHubApiError) {
        summary = describeStatus(error) ?? `An unexpected error occurred: ${message}`;
    } else if (error instanceof TimeoutError || message.toLowerCase().includes('timeout')) {
        summary = 'Request timed out. Please check your internet connection.';
    } else if (/connection|fetch failed|network/i.test(message)) {
        summary = 'Network connection error. Please check your internet connection.';
    } else {
        summary = `An unexpected error occurred: ${message}`;
    }

    return `${summary}\nOperation: ${operation}`;
}
