import { OrganizeResult } from './organizer';

const RULE = '='.repeat(60);

function listWithOverflow(items: string[], limit: number, shown: number): string[] {
    if (items.length <= limit) return items;
    return [...items.slice(0, shown), `... and ${items.length - shown} more`];
}

/** Summary printed after a pass, one line per entry. */
export function formatReport(result: OrganizeResult): string[] {
    const { stats } = result;
    if (stats.total === 0) {
        return [`No files found to organize in ${result.sourceDir}`];
    }

    const lines: string[] = [
        RULE,
        result.dryRun ? 'DRY RUN COMPLETE (nothing was moved)' : 'ORGANIZATION COMPLETE',
        RULE,
        'Summary:',
        `  Total files processed: ${stats.total}`,
        `  ${result.dryRun ? 'Would move' : 'Moved'}: ${stats.moved}`,
        `  Skipped: ${stats.skipped}`,
        `  Errors: ${stats.errors}`,
        `  Execution time: ${(stats.durationMs / 1000).toFixed(2)}s`,
    ];

    const categories = Object.keys(result.moved).sort();
    if (categories.length > 0) {
        lines.push('', 'Files by category:');
        for (const category of categories) {
            const files = result.moved[category];
            lines.push(`  ${category.toUpperCase()}: ${files.length} file${files.length === 1 ? '' : 's'}`);
            // All names up to five, otherwise the first three
            for (const line of listWithOverflow(files.map(f => f.name), 5, 3)) {
                lines.push(`    - ${line}`);
            }
        }
    }

    if (result.skipped.length > 0) {
        lines.push('', 'Skipped files:');
        const entries = result.skipped.map(s => `${s.name}: ${s.reason}`);
        for (const line of listWithOverflow(entries, 5, 5)) lines.push(`  - ${line}`);
    }

    if (result.errors.length > 0) {
        lines.push('', 'Errors:');
        const entries = result.errors.map(e => `${e.name}: ${e.reason}`);
        for (const line of listWithOverflow(entries, 5, 5)) lines.push(`  - ${line}`);
    }

    lines.push('', `Organized files location: ${result.sourceDir}`, RULE);
    return lines;
}
