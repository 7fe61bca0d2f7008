import {
    RunResult,
} from './engine';

const NAME_WIDTH = 40;

/**
 * Renders the per-task duration table printed after a run.
 */
export function formatSummary(result: RunResult): string {
    const lines = [
        `${'Task'.padEnd(NAME_WIDTH)}Duration`,
        '-'.repeat(NAME_WIDTH + 16),
    ];
    for (const record of result.records) {
        const duration = record.status === 'skipped' ? 'Skipped' : formatDuration(record.durationMs);
        lines.push(`${record.name.padEnd(NAME_WIDTH)}${duration}`);
    }
    lines.push('-'.repeat(NAME_WIDTH + 16));
    lines.push(`${'Total:'.padEnd(NAME_WIDTH)}${formatDuration(result.durationMs)}`);
    return lines.join('\n') + '\n';
}

/**
 * Formats `ms` as `hh:mm:ss.fff`.
 */
export function formatDuration(ms: number): string {
    const hours = Math.floor(ms / 3600000);
    const minutes = Math.floor(ms / 60000) % 60;
    const seconds = Math.floor(ms / 1000) % 60;
    const millis = ms % 1000;
    return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`;
}

function pad(x: number, width: number): string {
    return String(x).padStart(width, '0');
}
