const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

export function formatBytes(bytes: number): string {
    if (!Number.isFinite(bytes) || bytes <= 0) {
        return "0 B";
    }

    let value = bytes;
    let unitIndex = 0;

    while (value >= 1024 && unitIndex < SIZE_UNITS.length - 1) {
        value /= 1024;
        unitIndex += 1;
    }

    return `${parseFloat(value.toFixed(2))} ${SIZE_UNITS[unitIndex]}`;
}

export function formatDuration(durationMs: number): string {
    if (durationMs < 1_000) {
        return `${durationMs}ms`;
    }

    return `${(durationMs / 1_000).toFixed(2)}s`;
}

export function formatRatio(ratio: number): string {
    return `${ratio.toFixed(2)}x`;
}
