import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import type { Logger } from './logger';

export interface DownloadsPathEnv {
    platform: NodeJS.Platform;
    home: string;
    userProfile?: string;
    isDirectory: (candidate: string) => Promise<boolean>;
}

async function isDirectory(candidate: string): Promise<boolean> {
    if (!(await fs.pathExists(candidate))) return false;
    const stats = await fs.stat(candidate);
    return stats.isDirectory();
}

export function defaultDownloadsEnv(): DownloadsPathEnv {
    return {
        platform: process.platform,
        home: os.homedir(),
        userProfile: process.env.USERPROFILE,
        isDirectory,
    };
}

export function downloadsCandidates(env: Pick<DownloadsPathEnv, 'platform' | 'home' | 'userProfile'>): string[] {
    const { home } = env;
    switch (env.platform) {
        case 'win32': {
            const candidates = [path.join(home, 'Downloads'), path.join(home, 'Desktop')];
            if (env.userProfile) candidates.push(path.join(env.userProfile, 'Downloads'));
            return candidates;
        }
        case 'darwin':
            return [path.join(home, 'Downloads'), path.join(home, 'Desktop')];
        default:
            return [path.join(home, 'Downloads'), path.join(home, 'downloads'), path.join(home, 'Desktop')];
    }
}

/** First existing downloads-like folder for the platform, or the home directory. */
export async function resolveDownloadsDir(logger: Logger, env: DownloadsPathEnv = defaultDownloadsEnv()): Promise<string> {
    for (const candidate of downloadsCandidates(env)) {
        if (await env.isDirectory(candidate)) {
            return candidate;
        }
    }
    logger.warn(`Could not find a Downloads folder, using ${env.home}`);
    return env.home;
}
