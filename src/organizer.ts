import path from 'path';
import pino from 'pino';
import { Categorizer } from './categorizer';
import { CONFIG, ConflictPolicy } from './config';
import { errorMessage, OrganizerError, toOrganizerError } from './errors';
import { FileSystem, NodeFileSystem } from './file-system';
import { DEFAULT_SKIP_RULES, SkipRules, skipReasonForName, skipReasonForSize } from './filters';
import type { Logger } from './logger';

export interface MovedFile {
    name: string;
    destination: string;
}

export interface FileIssue {
    name: string;
    reason: string;
}

export interface OrganizeStats {
    total: number;
    moved: number;
    skipped: number;
    errors: number;
    durationMs: number;
}

export interface OrganizeResult {
    sourceDir: string;
    dryRun: boolean;
    moved: Record<string, MovedFile[]>;
    skipped: FileIssue[];
    errors: FileIssue[];
    stats: OrganizeStats;
}

export interface OrganizerOptions {
    sourceDir: string;
    categorizer?: Categorizer;
    fs?: FileSystem;
    logger?: Logger;
    conflict?: ConflictPolicy;
    skipRules?: SkipRules;
    dryRun?: boolean;
}

type FileOutcome =
    | { status: 'moved'; category: string; destination: string }
    | { status: 'skipped'; reason: string };

export class Organizer {
    readonly sourceDir: string;
    private readonly categorizer: Categorizer;
    private readonly fs: FileSystem;
    private readonly logger: Logger;
    private readonly conflict: ConflictPolicy;
    private readonly skipRules: SkipRules;
    private readonly dryRun: boolean;
    // Destinations claimed during the current pass; matters for dry runs, where nothing lands on disk
    private readonly claimed = new Set<string>();
    // Sources already moved (or planned to move) during the current pass
    private readonly departed = new Set<string>();

    constructor(options: OrganizerOptions) {
        this.sourceDir = path.resolve(options.sourceDir);
        this.categorizer = options.categorizer ?? new Categorizer();
        this.fs = options.fs ?? new NodeFileSystem();
        this.logger = options.logger ?? pino({ level: 'silent' });
        this.conflict = options.conflict ?? CONFIG.CONFLICT_POLICY;
        this.skipRules = options.skipRules ?? DEFAULT_SKIP_RULES;
        this.dryRun = options.dryRun ?? false;
    }

    /**
     * Moves every regular file of the source directory into `<source>/<category>/`.
     *
     * Throws an {@link OrganizerError} before touching anything when the source
     * directory cannot be read. Failures on single files are recorded in the
     * result and the pass carries on with the next file.
     */
    async organize(): Promise<OrganizeResult> {
        const start = Date.now();
        this.claimed.clear();
        this.departed.clear();

        const names = this.moveOrder(await this.listFiles());
        this.logger.info(`Found ${names.length} files to process in ${this.sourceDir}`);

        const result: OrganizeResult = {
            sourceDir: this.sourceDir,
            dryRun: this.dryRun,
            moved: {},
            skipped: [],
            errors: [],
            stats: { total: names.length, moved: 0, skipped: 0, errors: 0, durationMs: 0 },
        };

        for (const name of names) {
            try {
                const outcome = await this.processFile(name);
                if (outcome.status === 'moved') {
                    (result.moved[outcome.category] ??= []).push({ name, destination: outcome.destination });
                    result.stats.moved++;
                } else {
                    this.logger.info(`Skipped ${name}: ${outcome.reason}`);
                    result.skipped.push({ name, reason: outcome.reason });
                    result.stats.skipped++;
                }
            } catch (err) {
                const reason = errorMessage(err);
                this.logger.error(`Failed to organize ${name}: ${reason}`);
                result.errors.push({ name, reason });
                result.stats.errors++;
            }
        }

        result.stats.durationMs = Date.now() - start;
        return result;
    }

    private async listFiles(): Promise<string[]> {
        try {
            const stat = await this.fs.stat(this.sourceDir);
            if (stat.kind !== 'directory') {
                throw new OrganizerError('NotADirectory', `Source path is not a directory: ${this.sourceDir}`);
            }
            const entries = await this.fs.readDir(this.sourceDir);
            return entries
                .filter(entry => entry.kind === 'file')
                .map(entry => entry.name)
                .sort();
        } catch (err) {
            throw toOrganizerError(err, this.sourceDir);
        }
    }

    /**
     * Files named like a category this pass may create go first, so they are out
     * of the way before that category's directory is needed.
     */
    private moveOrder(names: string[]): string[] {
        const categories = new Set(names.map(name => this.categorizer.categorize(name)));
        const blocking = names.filter(name => categories.has(name));
        return [...blocking, ...names.filter(name => !categories.has(name))];
    }

    // A dry run creates nothing, so it checks what ensureDir would trip over
    private async checkCategoryDir(dir: string): Promise<void> {
        if (this.departed.has(dir) || !(await this.fs.pathExists(dir))) return;
        const { kind } = await this.fs.stat(dir);
        if (kind !== 'directory') {
            throw new Error(`Category path is taken by a file: ${path.relative(this.sourceDir, dir)}`);
        }
    }

    private async processFile(name: string): Promise<FileOutcome> {
        const source = path.join(this.sourceDir, name);

        const nameReason = skipReasonForName(name, this.skipRules);
        if (nameReason) return { status: 'skipped', reason: nameReason };

        const { size } = await this.fs.stat(source);
        const sizeReason = skipReasonForSize(size, this.skipRules);
        if (sizeReason) return { status: 'skipped', reason: sizeReason };

        const category = this.categorizer.categorize(name);
        const categoryDir = path.join(this.sourceDir, category);
        if (this.dryRun) {
            await this.checkCategoryDir(categoryDir);
        } else {
            await this.fs.ensureDir(categoryDir);
        }

        const destination = await this.resolveDestination(categoryDir, name);
        if (!destination) {
            return { status: 'skipped', reason: `Destination exists: ${path.join(category, name)}` };
        }

        if (this.dryRun) {
            this.logger.info(`[DRY-RUN] Would move ${name} -> ${path.relative(this.sourceDir, destination)}`);
        } else {
            await this.fs.move(source, destination, { overwrite: this.conflict === 'overwrite' });
            this.logger.debug(`Moved ${name} -> ${path.relative(this.sourceDir, destination)}`);
        }
        this.claimed.add(destination);
        this.departed.add(source);
        return { status: 'moved', category, destination };
    }

    // Returns undefined when the file must stay where it is
    private async resolveDestination(dir: string, name: string): Promise<string | undefined> {
        const wanted = path.join(dir, name);
        if (!(await this.isTaken(wanted)) || this.conflict === 'overwrite') {
            return wanted;
        }
        if (this.conflict === 'skip') {
            return undefined;
        }

        const ext = path.extname(name);
        const stem = path.basename(name, ext);
        for (let counter = 1; ; counter++) {
            const candidate = path.join(dir, `${stem}_${counter}${ext}`);
            if (!(await this.isTaken(candidate))) {
                return candidate;
            }
        }
    }

    private async isTaken(target: string): Promise<boolean> {
        return this.claimed.has(target) || this.fs.pathExists(target);
    }
}
