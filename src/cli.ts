import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import path from 'path';
import { Categorizer } from './categorizer';
import { CONFIG, CONFLICT_POLICIES, ConflictPolicy } from './config';
import { resolveDownloadsDir } from './downloads-path';
import { OrganizerError } from './errors';
import { FileSystem } from './file-system';
import { DEFAULT_SKIP_RULES } from './filters';
import { createLogger, Logger, LoggerOptions } from './logger';
import { OrganizeResult, Organizer } from './organizer';
import { formatReport } from './report';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_FILE_ERRORS = 2;

interface CliOptions {
    dryRun?: boolean;
    fallback: string;
    onConflict: ConflictPolicy;
    includeHidden?: boolean;
    maxSize: number;
    logFile?: string;
    failOnError?: boolean;
}

export interface CliDeps {
    createLogger?: (options: LoggerOptions) => Logger;
    print?: (line: string) => void;
    fs?: FileSystem;
}

function parseCategory(value: string): string {
    const name = value.trim();
    if (!name || name === '.' || name === '..' || /[\\/]/.test(name)) {
        throw new InvalidArgumentError('Category must be a plain directory name.');
    }
    return name;
}

function parseSize(value: string): number {
    const size = Number(value);
    if (!Number.isSafeInteger(size) || size < 0) {
        throw new InvalidArgumentError('Size must be a whole number of bytes.');
    }
    return size;
}

export function buildProgram(): Command {
    return new Command()
        .name('tidy-downloads')
        .description('Sort the files of a downloads folder into category subdirectories by extension')
        .version('1.0.0')
        .argument('[directory]', 'directory to organize (defaults to your Downloads folder)')
        .option('-n, --dry-run', 'show where files would go without moving anything')
        .option('-f, --fallback <category>', 'category for unknown or missing extensions', parseCategory, CONFIG.FALLBACK_CATEGORY)
        .addOption(
            new Option('-c, --on-conflict <policy>', 'what to do when the destination name is taken')
                .choices(CONFLICT_POLICIES)
                .default(CONFIG.CONFLICT_POLICY),
        )
        .option('--include-hidden', 'also organize dotfiles and files starting with ~')
        .option('--max-size <bytes>', 'leave files larger than this in place', parseSize, CONFIG.MAX_FILE_SIZE)
        .option('--log-file <path>', 'also write JSON logs to this file')
        .option('--fail-on-error', `exit with code ${EXIT_FILE_ERRORS} when any file could not be moved`)
        .exitOverride();
}

export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
    const program = buildProgram();
    try {
        await program.parseAsync(argv);
    } catch (err) {
        // Help, version and bad options; commander has already printed them
        if (err instanceof CommanderError) return err.exitCode;
        throw err;
    }

    const options = program.opts<CliOptions>();
    const directory: string | undefined = program.args[0];
    const logger = (deps.createLogger ?? createLogger)({ file: options.logFile });
    const print = deps.print ?? ((line: string) => console.log(line));

    logger.info('Starting downloads organizer...');
    if (options.dryRun) logger.info('Running in DRY-RUN mode');

    const sourceDir = directory ? path.resolve(directory) : await resolveDownloadsDir(logger);
    const organizer = new Organizer({
        sourceDir,
        categorizer: new Categorizer(undefined, options.fallback),
        fs: deps.fs,
        logger,
        conflict: options.onConflict,
        skipRules: {
            ...DEFAULT_SKIP_RULES,
            includeHidden: options.includeHidden ?? false,
            maxFileSize: options.maxSize,
        },
        dryRun: options.dryRun ?? false,
    });

    logger.info(`Starting organization of ${organizer.sourceDir}`);
    let result: OrganizeResult;
    try {
        result = await organizer.organize();
    } catch (err) {
        if (err instanceof OrganizerError) {
            logger.error(err, `Critical error: ${err.message}`);
            return EXIT_FATAL;
        }
        throw err;
    }

    for (const line of formatReport(result)) {
        print(line);
    }

    if (result.stats.errors > 0) {
        logger.warn(`${result.stats.errors} file(s) could not be organized`);
        if (options.failOnError) return EXIT_FILE_ERRORS;
    }
    return EXIT_OK;
}

/** {@link run}, with anything it throws logged as a last resort. */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
    try {
        return await run(argv, deps);
    } catch (err) {
        (deps.createLogger ?? createLogger)({}).error(err, 'Unhandled exception in main loop');
        return EXIT_FATAL;
    }
}
