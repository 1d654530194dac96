import type { AspectSized, GalleryLayout, ItemPlacement, LayoutRow } from './gallery.types';

export interface JustifiedLayoutOptions {
    containerWidthPx: number;
    rowHeightPx: number;
    spacingPx: number;
}

interface PendingItem<T> {
    item: T;
    index: number;
    naturalWidthPx: number;
}

function emptyLayout<T>(): GalleryLayout<T> {
    return { rows: [], placements: [], totalHeightPx: 0 };
}

export function normalizeAspectRatio(aspectRatio: number | null | undefined): number {
    if (aspectRatio === null || aspectRatio === undefined || !Number.isFinite(aspectRatio) || aspectRatio <= 0) {
        return 1;
    }

    return aspectRatio;
}

export function getNaturalWidthPx(aspectRatio: number | null | undefined, rowHeightPx: number): number {
    return Math.max(1, Math.round(rowHeightPx * normalizeAspectRatio(aspectRatio)));
}

export function isValidJustifiedInput(options: JustifiedLayoutOptions): boolean {
    const { containerWidthPx, rowHeightPx, spacingPx } = options;
    return Number.isFinite(containerWidthPx) && containerWidthPx > 0
        && Number.isFinite(rowHeightPx) && rowHeightPx > 0
        && Number.isFinite(spacingPx) && spacingPx >= 0;
}

function layoutRow<T>(pending: PendingItem<T>[], top: number, options: JustifiedLayoutOptions, scale: number | null): LayoutRow<T> {
    const placements: ItemPlacement<T>[] = [];
    let x = 0;

    for (const { item, index, naturalWidthPx } of pending) {
        const width = scale === null ? naturalWidthPx : Math.max(1, Math.round(naturalWidthPx * scale));
        placements.push({ item, index, x, y: top, width, height: options.rowHeightPx });
        x += width + options.spacingPx;
    }

    return { top, height: options.rowHeightPx, scaled: scale !== null, placements };
}

/**
 * Packs items into rows of the configured height. A row closes as soon as its natural widths plus
 * spacing overflow the container and it holds at least two items; it is then scaled as a group to fill
 * the width. Each width is rounded on its own, so a scaled row may miss the container by up to a pixel
 * per item. The trailing row keeps natural widths.
 *
 * Pure: identical inputs give identical output, and every resize is a full recomputation.
 */
export function justifyRows<T extends AspectSized>(items: readonly T[], options: JustifiedLayoutOptions): GalleryLayout<T> {
    if (items.length === 0 || !isValidJustifiedInput(options)) {
        return emptyLayout();
    }

    const { containerWidthPx, rowHeightPx, spacingPx } = options;
    const rows: LayoutRow<T>[] = [];
    let pending: PendingItem<T>[] = [];
    let accumulatedWidthPx = 0;
    let top = 0;

    items.forEach((item, index) => {
        const naturalWidthPx = getNaturalWidthPx(item.aspectRatio, rowHeightPx);
        pending.push({ item, index, naturalWidthPx });
        accumulatedWidthPx += naturalWidthPx + spacingPx;

        if (accumulatedWidthPx - spacingPx > containerWidthPx && pending.length > 1) {
            const naturalSumPx = pending.reduce((sum, entry) => sum + entry.naturalWidthPx, 0);
            // Spacing alone can exceed a very narrow container; widths then bottom out at 1px.
            const scale = Math.max(0, containerWidthPx - spacingPx * (pending.length - 1)) / naturalSumPx;

            rows.push(layoutRow(pending, top, options, scale));
            top += rowHeightPx + spacingPx;
            pending = [];
            accumulatedWidthPx = 0;
        }
    });

    if (pending.length > 0) {
        rows.push(layoutRow(pending, top, options, null));
    }

    const lastRow = rows[rows.length - 1];
    return {
        rows,
        placements: rows.flatMap(row => row.placements),
        totalHeightPx: lastRow ? lastRow.top + rowHeightPx : 0,
    };
}
