export type ContentType = 'file' | 'dir' | 'symlink' | 'submodule';

/** One entry of a repository directory listing. */
export interface GitHubContentEntry {
    name: string;
    path: string;
    sha: string;
    size: number;
    type: ContentType;
    download_url: string | null;
    html_url?: string | null;
}

export interface GitHubRepository {
    id: number;
    name: string;
    full_name: string;
    description: string | null;
    html_url: string;
    private: boolean;
    has_pages?: boolean;
    updated_at: string;
}

export interface GitHubCommit {
    sha: string;
    html_url: string;
    commit: {
        message: string;
        committer: {
            name: string;
            email: string;
            date: string;
        } | null;
    };
}

export interface GitHubPagesStatus {
    status: string | null;
    html_url?: string | null;
    error?: { message: string | null } | null;
}

export interface GitHubUploadResponse {
    content: GitHubContentEntry | null;
    commit: {
        sha: string;
        html_url: string;
    };
}

export interface UploadFileRequest {
    repository: string;
    path: string;
    /** Base64 file body. */
    content: string;
    message: string;
    /** Blob sha of the file being replaced, when overwriting. */
    sha?: string;
}

/** Row of the repository image table: a thumbnail and, once known, its original's size. */
export interface ImageMetadata {
    name: string;
    path: string;
    sha: string;
    thumbnailSize: number;
    originalSize: number | null;
    lastModified: string | null;
}

/** Response headers the rate-limit tracker reads. */
export interface HeaderSource {
    get(name: string): string | null;
}
