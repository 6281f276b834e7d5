/**
 * Fields of a log entry that reach the printed line
 */
export interface LogLine {
    timestamp?: unknown;
    level: string;
    message: unknown;
    stack?: unknown;
}

/**
 * One log line; an error's stack follows on the next lines.
 * File logs upper-case the level, the console keeps winston's colorized one.
 */
export function formatLogLine(line: LogLine, upperCaseLevel: boolean = false): string {
    const level = upperCaseLevel ? `[${line.level.toUpperCase()}]` : line.level;
    const head = `${String(line.timestamp)} ${level}: ${String(line.message)}`;
    return typeof line.stack === 'string' && line.stack ? `${head}\n${line.stack}` : head;
}
