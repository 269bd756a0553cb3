import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import pino from 'pino';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EXIT_FATAL, EXIT_FILE_ERRORS, EXIT_OK, main, run } from '../src/cli';
import { MemoryFileSystem } from './helpers/memory-fs';

const silent = () => pino({ level: 'silent' });

describe('tidy-downloads CLI', () => {
    let dir: string;
    let printed: string[];

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tidy-downloads-'));
        printed = [];
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    function cli(...args: string[]) {
        return run(['node', 'tidy-downloads', ...args], { createLogger: silent, print: line => printed.push(line) });
    }

    it('organizes a real directory', async () => {
        await fs.outputFile(path.join(dir, 'photo.JPG'), 'jpg');
        await fs.outputFile(path.join(dir, 'report.pdf'), 'pdf');
        await fs.outputFile(path.join(dir, 'notes'), 'text');
        await fs.outputFile(path.join(dir, 'old_stuff', 'keep.txt'), 'keep');

        const code = await cli(dir);

        expect(code).toBe(EXIT_OK);
        expect(await fs.readFile(path.join(dir, 'images', 'photo.JPG'), 'utf-8')).toBe('jpg');
        expect(await fs.pathExists(path.join(dir, 'documents', 'report.pdf'))).toBe(true);
        expect(await fs.pathExists(path.join(dir, 'misc', 'notes'))).toBe(true);
        expect(await fs.pathExists(path.join(dir, 'old_stuff', 'keep.txt'))).toBe(true);
        expect((await fs.readdir(dir)).sort()).toEqual(['documents', 'images', 'misc', 'old_stuff']);
        expect(printed[4]).toBe('  Total files processed: 3');
    });

    it('renames on conflict and honours a custom fallback', async () => {
        await fs.outputFile(path.join(dir, 'documents', 'report.pdf'), 'old');
        await fs.outputFile(path.join(dir, 'report.pdf'), 'new');
        await fs.outputFile(path.join(dir, 'mystery.xyz'), '?');

        const code = await cli(dir, '--fallback', 'other');

        expect(code).toBe(EXIT_OK);
        expect(await fs.readFile(path.join(dir, 'documents', 'report.pdf'), 'utf-8')).toBe('old');
        expect(await fs.readFile(path.join(dir, 'documents', 'report_1.pdf'), 'utf-8')).toBe('new');
        expect(await fs.pathExists(path.join(dir, 'other', 'mystery.xyz'))).toBe(true);
    });

    it('leaves everything in place on a dry run', async () => {
        await fs.outputFile(path.join(dir, 'song.mp3'), 'mp3');

        const code = await cli(dir, '--dry-run');

        expect(code).toBe(EXIT_OK);
        expect(await fs.readdir(dir)).toEqual(['song.mp3']);
        expect(printed[1]).toBe('DRY RUN COMPLETE (nothing was moved)');
    });

    it('exits with 1 when the directory does not exist', async () => {
        const code = await cli(path.join(dir, 'missing'));

        expect(code).toBe(EXIT_FATAL);
        expect(printed).toEqual([]);
    });

    it('exits with 2 on file errors only when asked to', async () => {
        const memory = new MemoryFileSystem('/downloads').addFile('/downloads/report.pdf').addFile('/downloads/song.mp3');
        memory.failMove.set('report.pdf', 'EPERM');
        const deps = { createLogger: silent, print: (line: string) => printed.push(line), fs: memory };

        expect(await run(['node', 'tidy-downloads', '/downloads'], deps)).toBe(EXIT_OK);
        expect(memory.has('/downloads/audio/song.mp3')).toBe(true);

        expect(await run(['node', 'tidy-downloads', '/downloads', '--fail-on-error'], deps)).toBe(EXIT_FILE_ERRORS);
    });

    it('rejects an unknown conflict policy', async () => {
        const code = await run(
            ['node', 'tidy-downloads', dir, '--on-conflict', 'merge'],
            { createLogger: silent, print: line => printed.push(line) },
        );

        expect(code).toBe(EXIT_FATAL);
    });

    it('includes hidden files, applies the size limit and writes a JSON log file', async () => {
        const log = path.join(dir, 'logs', 'run.log');
        await fs.outputFile(path.join(dir, '.env'), 'KEY=test');
        await fs.outputFile(path.join(dir, 'big.zip'), '0123456789');
        await fs.outputFile(path.join(dir, 'tiny.zip'), 'zip');

        const code = await run(
            ['node', 'tidy-downloads', dir, '--include-hidden', '--max-size', '5', '--log-file', log],
            { print: line => printed.push(line) },
        );

        expect(code).toBe(EXIT_OK);
        expect(await fs.pathExists(path.join(dir, 'misc', '.env'))).toBe(true);
        expect(await fs.pathExists(path.join(dir, 'archives', 'tiny.zip'))).toBe(true);
        expect(await fs.pathExists(path.join(dir, 'big.zip'))).toBe(true);
        expect(printed).toContain('  - big.zip: File too large (>5B)');

        // The file target is written from a worker thread
        await vi.waitFor(async () => {
            const lines = (await fs.readFile(log, 'utf-8')).trim().split('\n');
            const messages = lines.map(line => JSON.parse(line).msg);
            expect(messages).toContain('Skipped big.zip: File too large (>5B)');
        }, { timeout: 5000, interval: 50 });
    });

    it('logs anything run throws and exits with 1', async () => {
        const logger = silent();
        const error = vi.spyOn(logger, 'error');
        await fs.outputFile(path.join(dir, 'song.mp3'), 'mp3');

        const code = await main(['node', 'tidy-downloads', dir], {
            createLogger: () => logger,
            print: () => {
                throw new Error('stdout closed');
            },
        });

        expect(code).toBe(EXIT_FATAL);
        expect(error).toHaveBeenCalledWith(new Error('stdout closed'), 'Unhandled exception in main loop');
    });
});
