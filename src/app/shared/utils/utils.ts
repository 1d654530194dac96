export function formatBytes(bytes: number, decimals = 1): string {
    if (!Number.isFinite(bytes) || bytes <= 0) {
        return '0 B';
    }

    const units = ['B', 'KB', 'MB', 'GB', 'TB'];
    const unitIndex = Math.min(
        Math.floor(Math.log(bytes) / Math.log(1024)),
        units.length - 1,
    );
    const value = bytes / Math.pow(1024, unitIndex);

    if (unitIndex === 0) {
        return `${Math.round(value)} ${units[unitIndex]}`;
    }

    return `${value.toFixed(decimals)} ${units[unitIndex]}`;
}

export function getFileNameFromPath(path: string): string {
    return path.split(/[/\\]/).pop() || path;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
