import type { Stats } from 'fs';
import fs from 'fs-extra';
import path from 'path';

export type EntryKind = 'file' | 'directory' | 'other';

export interface DirEntry {
    name: string;
    kind: EntryKind;
}

export interface EntryStat {
    kind: EntryKind;
    size: number;
}

/**
 * The file system operations the organizer needs. Errors carry Node's error
 * codes (ENOENT, EACCES, ...) so callers can tell what went wrong.
 */
export interface FileSystem {
    /** Direct children of `dir`. Symbolic links report the kind of their target. */
    readDir(dir: string): Promise<DirEntry[]>;
    stat(target: string): Promise<EntryStat>;
    pathExists(target: string): Promise<boolean>;
    /** Creates `dir` when missing; a no-op when it already exists. */
    ensureDir(dir: string): Promise<void>;
    move(src: string, dest: string, options: { overwrite: boolean }): Promise<void>;
}

function kindOf(stats: Stats): EntryKind {
    if (stats.isFile()) return 'file';
    if (stats.isDirectory()) return 'directory';
    return 'other';
}

export class NodeFileSystem implements FileSystem {
    async readDir(dir: string): Promise<DirEntry[]> {
        const dirents = await fs.readdir(dir, { withFileTypes: true });
        return Promise.all(dirents.map(async (dirent): Promise<DirEntry> => {
            if (dirent.isSymbolicLink()) {
                // Dangling links have no target to classify
                const target = await fs.stat(path.join(dir, dirent.name)).catch(() => undefined);
                return { name: dirent.name, kind: target ? kindOf(target) : 'other' };
            }
            if (dirent.isFile()) return { name: dirent.name, kind: 'file' };
            if (dirent.isDirectory()) return { name: dirent.name, kind: 'directory' };
            return { name: dirent.name, kind: 'other' };
        }));
    }

    async stat(target: string): Promise<EntryStat> {
        const stats = await fs.stat(target);
        return { kind: kindOf(stats), size: stats.size };
    }

    pathExists(target: string): Promise<boolean> {
        return fs.pathExists(target);
    }

    ensureDir(dir: string): Promise<void> {
        return fs.ensureDir(dir);
    }

    move(src: string, dest: string, options: { overwrite: boolean }): Promise<void> {
        return fs.move(src, dest, { overwrite: options.overwrite });
    }
}
