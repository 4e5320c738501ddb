// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import chalk from 'chalk';

export enum LogLevel {
    SILENT = 0,
    STANDARD = 1,
    VERBOSE = 2,
}

export enum LogCategory {
    VAULT = 'VAULT',
    ROTATE = 'ROTATE',
    AUTHZ = 'AUTHZ',
    PERF = 'PERF',
    ERROR = 'ERROR',
    INFO = 'INFO',
}

export class Logger {
    private level: LogLevel;
    private startTime: number;

    constructor(level: LogLevel = LogLevel.STANDARD) {
        this.level = level;
        this.startTime = Date.now();
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    isVerbose(): boolean {
        return this.level >= LogLevel.VERBOSE;
    }

    /**
     * Log standard message (always shown unless silent)
     */
    info(message: string): void {
        if (this.level >= LogLevel.STANDARD) {
            console.log(message);
        }
    }

    success(message: string): void {
        if (this.level >= LogLevel.STANDARD) {
            console.log(chalk.green('✅ ' + message));
        }
    }

    warn(message: string): void {
        if (this.level >= LogLevel.STANDARD) {
            console.log(chalk.yellow('⚠️  ' + message));
        }
    }

    /**
     * Log error message. The stack trace is only printed in verbose mode.
     */
    error(message: string, error?: Error): void {
        if (this.level >= LogLevel.STANDARD) {
            console.error(chalk.red('❌ ' + message));

            if (error && this.isVerbose()) {
                console.error(chalk.red('   Stack trace:'));
                console.error(chalk.gray(error.stack || error.message));
            }
        }
    }

    /**
     * Log verbose message (only in verbose mode)
     */
    verbose(category: LogCategory, message: string): void {
        if (this.level >= LogLevel.VERBOSE) {
            console.log(`${chalk.gray(this.getTimestamp())} ${this.formatCategory(category)} ${message}`);
        }
    }

    verboseIndent(category: LogCategory, message: string, indent: number = 1): void {
        if (this.level >= LogLevel.VERBOSE) {
            const spaces = '  '.repeat(indent);
            console.log(`${chalk.gray(this.getTimestamp())} ${this.formatCategory(category)}${spaces}${message}`);
        }
    }

    /**
     * Elapsed time since logger start, as [ss.mmm]
     */
    private getTimestamp(): string {
        const elapsed = Date.now() - this.startTime;
        const seconds = Math.floor(elapsed / 1000);
        const ms = elapsed % 1000;
        return `[${String(seconds).padStart(2, '0')}.${String(ms).padStart(3, '0')}]`;
    }

    private formatCategory(category: LogCategory): string {
        return chalk.bold(this.getCategoryColor(category)(`[${category}]`));
    }

    private getCategoryColor(category: LogCategory): chalk.Chalk {
        switch (category) {
            case LogCategory.VAULT:
                return chalk.blue;
            case LogCategory.ROTATE:
                return chalk.cyan;
            case LogCategory.AUTHZ:
                return chalk.magenta;
            case LogCategory.PERF:
                return chalk.yellow;
            case LogCategory.ERROR:
                return chalk.red;
            default:
                return chalk.white;
        }
    }

    /**
     * Format duration in milliseconds
     */
    formatDuration(ms: number): string {
        if (ms < 1000) {
            return `${ms}ms`;
        }
        return `${(ms / 1000).toFixed(2)}s`;
    }
}

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
    if (!globalLogger) {
        globalLogger = new Logger();
    }
    return globalLogger;
}

export function setLogLevel(level: LogLevel): void {
    getLogger().setLevel(level);
}
