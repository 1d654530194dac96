import type { RateLimitLevel } from '@core/rate-limit/rate-limit.tracker';
import type { GitHubContentEntry } from '@services/api/github/models';

export type FetchStatus = 'pending' | 'ready' | 'failed';

/** Anything the row packer can place; unknown or non-positive ratios render square. */
export interface AspectSized {
    aspectRatio?: number | null;
}

export interface DecodedThumbnail {
    /** Square JPEG cut from the centre of the source image. */
    data: Buffer;
    width: number;
    height: number;
    sourceWidth: number;
    sourceHeight: number;
}

export interface GalleryItem extends AspectSized {
    /** Position in the directory listing; results are matched back by this, never by arrival order. */
    index: number;
    name: string;
    path: string;
    size: number;
    downloadUrl: string | null;
    isFile: boolean;
    aspectRatio: number | null;
    thumbnail: DecodedThumbnail | null;
    status: FetchStatus;
}

export interface ItemPlacement<T> {
    item: T;
    index: number;
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface LayoutRow<T> {
    top: number;
    height: number;
    /** False only for the trailing row; an oversized item that is not last is scaled with the next one. */
    scaled: boolean;
    placements: ItemPlacement<T>[];
}

/** What a view needs to position every card and size its scroll viewport. */
export interface PlacedLayout<T> {
    placements: ItemPlacement<T>[];
    totalHeightPx: number;
}

export interface GalleryLayout<T> extends PlacedLayout<T> {
    rows: LayoutRow<T>[];
}

export interface MasonryLayout<T> extends PlacedLayout<T> {
    columnWidthPx: number;
    columns: ItemPlacement<T>[][];
}

export type GalleryLayoutMode = 'justified' | 'masonry';

export type ThumbnailFailureReason = 'not-a-file' | 'network' | 'timeout' | 'decode';

export type ThumbnailEvent =
    | {
        type: 'item';
        index: number;
        name: string;
        thumbnail: DecodedThumbnail;
        fromCache: boolean;
    }
    | {
        type: 'item';
        index: number;
        name: string;
        thumbnail: null;
        reason: ThumbnailFailureReason;
        message: string;
    }
    | {
        type: 'done';
        summary: PipelineSummary;
    };

export type ThumbnailItemEvent = Extract<ThumbnailEvent, { type: 'item' }>;

export interface PipelineSummary {
    total: number;
    succeeded: number;
    failed: number;
    cancelled: number;
    rateLimitLevel: RateLimitLevel;
}

export function toGalleryItem(entry: GitHubContentEntry, index: number): GalleryItem {
    return {
        index,
        name: entry.name,
        path: entry.path,
        size: entry.size,
        downloadUrl: entry.download_url,
        isFile: entry.type === 'file',
        aspectRatio: null,
        thumbnail: null,
        status: 'pending',
    };
}
