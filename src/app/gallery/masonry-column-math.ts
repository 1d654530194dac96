import { normalizeAspectRatio } from './justified-row-math';
import type { AspectSized, ItemPlacement, MasonryLayout } from './gallery.types';

export interface MasonryLayoutOptions {
    containerWidthPx: number;
    columns: number;
    spacingPx: number;
}

export function getColumnWidthPx(options: MasonryLayoutOptions): number {
    const columns = Math.floor(options.columns);
    return Math.floor((options.containerWidthPx - (columns - 1) * options.spacingPx) / columns);
}

// Each item drops into the currently shortest column, leftmost on ties.
export function packMasonryColumns<T extends AspectSized>(items: readonly T[], options: MasonryLayoutOptions): MasonryLayout<T> {
    const columns = Math.floor(options.columns);
    const invalid = !Number.isFinite(options.containerWidthPx) || options.containerWidthPx <= 0
        || !Number.isFinite(columns) || columns < 1
        || !Number.isFinite(options.spacingPx) || options.spacingPx < 0;
    const columnWidthPx = invalid ? 0 : getColumnWidthPx(options);

    if (items.length === 0 || invalid || columnWidthPx <= 0) {
        return { columnWidthPx: Math.max(0, columnWidthPx), columns: [], placements: [], totalHeightPx: 0 };
    }

    const offsets = new Array<number>(columns).fill(0);
    const columnPlacements: ItemPlacement<T>[][] = Array.from({ length: columns }, () => []);
    const placements: ItemPlacement<T>[] = [];

    items.forEach((item, index) => {
        const height = Math.max(1, Math.round(columnWidthPx / normalizeAspectRatio(item.aspectRatio)));
        const column = offsets.indexOf(Math.min(...offsets));
        const placement: ItemPlacement<T> = {
            item,
            index,
            x: column * (columnWidthPx + options.spacingPx),
            y: offsets[column],
            width: columnWidthPx,
            height,
        };

        offsets[column] += height + options.spacingPx;
        columnPlacements[column].push(placement);
        placements.push(placement);
    });

    const totalHeightPx = Math.max(
        ...columnPlacements.map((column, index) => column.length > 0 ? offsets[index] - options.spacingPx : 0),
    );

    return { columnWidthPx, columns: columnPlacements, placements, totalHeightPx };
}
