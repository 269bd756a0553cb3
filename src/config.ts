import categories from './data/categories.json';

export type ConflictPolicy = 'rename' | 'skip' | 'overwrite';

export const CONFLICT_POLICIES: readonly ConflictPolicy[] = ['rename', 'skip', 'overwrite'];

const CATEGORY_GROUPS: Record<string, string[]> = categories;
const CONFLICT_POLICY: ConflictPolicy = 'rename';

export const CONFIG = {
    // Category groups. A later group wins an extension listed twice
    CATEGORY_GROUPS,
    FALLBACK_CATEGORY: 'misc',
    CONFLICT_POLICY,
    // Hidden and temporary files stay where they are unless --include-hidden is passed
    HIDDEN_PREFIXES: ['.', '~'],
    // Browsers keep these around while a download is still running
    PARTIAL_DOWNLOAD_EXTENSIONS: ['.crdownload', '.part', '.tmp'],
    MAX_FILE_SIZE: 10 * 1024 * 1024 * 1024, // 10GB
    LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};
