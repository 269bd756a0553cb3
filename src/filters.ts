import { Categorizer } from './categorizer';
import { CONFIG } from './config';

export interface SkipRules {
    includeHidden: boolean;
    hiddenPrefixes: readonly string[];
    partialExtensions: readonly string[];
    maxFileSize: number;
}

export const DEFAULT_SKIP_RULES: SkipRules = {
    includeHidden: false,
    hiddenPrefixes: CONFIG.HIDDEN_PREFIXES,
    partialExtensions: CONFIG.PARTIAL_DOWNLOAD_EXTENSIONS,
    maxFileSize: CONFIG.MAX_FILE_SIZE,
};

// Checks that need only the name. Returns the reason to skip, if any.
export function skipReasonForName(filename: string, rules: SkipRules): string | undefined {
    if (!rules.includeHidden && rules.hiddenPrefixes.some(prefix => filename.startsWith(prefix))) {
        return 'Hidden or temporary file';
    }
    if (rules.partialExtensions.includes(Categorizer.extensionOf(filename))) {
        return 'File currently downloading';
    }
    return undefined;
}

export function skipReasonForSize(size: number, rules: SkipRules): string | undefined {
    if (size > rules.maxFileSize) {
        return `File too large (>${formatBytes(rules.maxFileSize)})`;
    }
    return undefined;
}

export function formatBytes(bytes: number): string {
    const units = ['B', 'KB', 'MB', 'GB', 'TB'];
    let value = bytes;
    let unit = 0;
    while (value >= 1024 && unit < units.length - 1) {
        value /= 1024;
        unit++;
    }
    return `${Number.isInteger(value) ? value : value.toFixed(1)}${units[unit]}`;
}
