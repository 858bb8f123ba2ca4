/**
 * Application logging system
 * Provides a global AppLog singleton that stores messages and forwards them to the console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
}

export interface LogEntry {
    timestamp: number
    level: LogLevel
    message: string
}

type LogListener = (entry: LogEntry) => void

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value)
}

export class Logger {
    private entries: LogEntry[] = []
    private listeners: Set<LogListener> = new Set()
    private maxEntries = 500

    /** Entries below this level are dropped */
    level: LogLevel = 'info'

    debug(message: string): void {
        if (this.add('debug', message)) {
            console.debug(`[DEBUG] ${message}`)
        }
    }

    info(message: string): void {
        if (this.add('info', message)) {
            console.log(`[INFO] ${message}`)
        }
    }

    warn(message: string): void {
        if (this.add('warn', message)) {
            console.warn(`[WARN] ${message}`)
        }
    }

    error(message: string): void {
        if (this.add('error', message)) {
            console.error(`[ERROR] ${message}`)
        }
    }

    getEntries(): readonly LogEntry[] {
        return this.entries
    }

    clear(): void {
        this.entries = []
    }

    onEntry(listener: LogListener): () => void {
        this.listeners.add(listener)
        return () => this.listeners.delete(listener)
    }

    private add(level: LogLevel, message: string): boolean {
        if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return false

        const entry: LogEntry = { timestamp: Date.now(), level, message }
        this.entries.push(entry)
        if (this.entries.length > this.maxEntries) {
            this.entries.shift()
        }
        for (const listener of this.listeners) {
            listener(entry)
        }
        return true
    }
}

/** Global application logger */
export const AppLog = new Logger()
