import { CONFIG } from './config';

export type ExtensionTable = ReadonlyMap<string, string>;

function normalizeExtension(ext: string): string {
    const lower = ext.trim().toLowerCase();
    return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Flattens `{ category: extensions[] }` groups into an extension -> category table.
 * An extension listed under several categories goes to the last one.
 */
export function buildExtensionTable(groups: Record<string, readonly string[]>): ExtensionTable {
    const table = new Map<string, string>();
    for (const [category, extensions] of Object.entries(groups)) {
        for (const ext of extensions) {
            table.set(normalizeExtension(ext), category);
        }
    }
    return table;
}

export class Categorizer {
    constructor(
        private readonly table: ExtensionTable = buildExtensionTable(CONFIG.CATEGORY_GROUPS),
        readonly fallback: string = CONFIG.FALLBACK_CATEGORY,
    ) { }

    /**
     * Lowercased suffix from the last dot, dot included. Names without a dot,
     * dotfiles such as `.gitignore` and names ending in a dot have none ('').
     */
    static extensionOf(filename: string): string {
        const dot = filename.lastIndexOf('.');
        if (dot <= 0 || dot === filename.length - 1) {
            return '';
        }
        return filename.substring(dot).toLowerCase();
    }

    categorize(filename: string): string {
        const ext = Categorizer.extensionOf(filename);
        if (!ext) return this.fallback;
        return this.table.get(ext) ?? this.fallback;
    }

    get categories(): string[] {
        return [...new Set(this.table.values())];
    }
}
