/**
 * @fileoverview Logging utility with timestamps and timing support.
 * Provides structured, colorful console output for the stages of a script audit.
 * Optionally writes logs to a timestamped file when WRITE_LOG_TO_FILE is set,
 * and drops lines below LOG_LEVEL (default: debug).
 */

import * as fs from 'fs'
import * as path from 'path'

// ============================================================================
// Types
// ============================================================================

/** Log level for categorizing messages */
export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug' | 'timing'

/** Structured data appended to a log line as key=value pairs */
export type LogData = Record<string, unknown>

/** Severity rank used for LOG_LEVEL filtering */
const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  timing: 1,
  info: 2,
  success: 2,
  warn: 3,
  error: 4,
}

/**
 * Parse the LOG_LEVEL environment variable.
 * 'silent' suppresses everything, unknown values fall back to debug.
 */
function resolveThreshold(value: string | undefined): number {
  if (value === 'silent') return Number.POSITIVE_INFINITY
  return value && isLogLevel(value) ? LEVEL_RANK[value] : LEVEL_RANK.debug
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value)
}

const threshold = resolveThreshold(process.env.LOG_LEVEL)

// ============================================================================
// File Logging Setup
// ============================================================================

/** Whether to write logs to file */
const writeToFile = process.env.WRITE_LOG_TO_FILE === 'true'

/** Log file write stream */
let logFileStream: fs.WriteStream | null = null

/**
 * Open the timestamped log file if file logging is enabled.
 */
function initFileLogging(): void {
  if (!writeToFile || logFileStream) return

  const logsDir = path.resolve(process.cwd(), 'logs')
  fs.mkdirSync(logsDir, { recursive: true })

  const now = new Date()
  const timestamp = now.toISOString()
    .replace(/[:.]/g, '-')
    .replace('T', '_')
    .slice(0, 19)
  const logFilePath = path.join(logsDir, `script-audit_${timestamp}.log`)

  logFileStream = fs.createWriteStream(logFilePath, { flags: 'a' })
  logFileStream.write(`=== Script Audit Log - Started ${now.toISOString()} ===\n`)

  console.log(`\x1b[36mℹ [Logger] Writing logs to: ${logFilePath}\x1b[0m`)
}

/**
 * Write a line to the log file (without ANSI colors).
 */
function writeToLogFile(line: string): void {
  if (!logFileStream) return
  // eslint-disable-next-line no-control-regex
  logFileStream.write(line.replace(/\x1b\[[0-9;]*m/g, '') + '\n')
}

initFileLogging()

// ============================================================================
// ANSI Colors
// ============================================================================

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
}

const LEVEL_STYLE: Record<LogLevel, { color: string; symbol: string }> = {
  info: { color: colors.cyan, symbol: 'ℹ' },
  success: { color: colors.green, symbol: '✓' },
  warn: { color: colors.yellow, symbol: '⚠' },
  error: { color: colors.red, symbol: '✗' },
  debug: { color: colors.gray, symbol: '•' },
  timing: { color: colors.magenta, symbol: '⏱' },
}

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Get current timestamp in HH:MM:SS.mmm format.
 */
function getTimestamp(): string {
  const now = new Date()
  const pad = (n: number, width = 2) => n.toString().padStart(width, '0')
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`
}

/**
 * Format duration in milliseconds to human-readable string.
 *
 * @example
 * formatDuration(850)   // '850ms'
 * formatDuration(2500)  // '2.50s'
 * formatDuration(90000) // '1m 30.0s'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`
  }
  const minutes = Math.floor(ms / 60000)
  const seconds = ((ms % 60000) / 1000).toFixed(1)
  return `${minutes}m ${seconds}s`
}

/**
 * Format a value for display.
 */
function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return `${colors.dim}null${colors.reset}`
  }
  if (typeof value === 'number') {
    return `${colors.yellow}${value}${colors.reset}`
  }
  if (typeof value === 'boolean') {
    return value ? `${colors.green}true${colors.reset}` : `${colors.red}false${colors.reset}`
  }
  if (typeof value === 'string') {
    // URLs carry vendor IDs in the query, so allow more than a short label
    const display = value.length > 80 ? value.substring(0, 77) + '...' : value
    return `${colors.green}"${display}"${colors.reset}`
  }
  if (Array.isArray(value)) {
    return `${colors.cyan}[${value.length} items]${colors.reset}`
  }
  if (typeof value === 'object') {
    return `${colors.cyan}{${Object.keys(value).length} keys}${colors.reset}`
  }
  return String(value)
}

// ============================================================================
// Core Logger
// ============================================================================

/**
 * Logger class for structured console output.
 * Warnings and errors go to stderr so CLI reports on stdout stay clean.
 */
export class Logger {
  private context: string
  /** Start times of running timers, per logger instance */
  private readonly timers = new Map<string, number>()

  constructor(context: string = 'Server') {
    this.context = context
  }

  /**
   * Create a child logger whose context is nested under this one.
   *
   * @example
   * createLogger('Scan').child('example.com') // logs as [Scan:example.com]
   */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`)
  }

  private log(level: LogLevel, message: string, data?: LogData): void {
    if (LEVEL_RANK[level] < threshold) return

    const { color, symbol } = LEVEL_STYLE[level]
    const prefix = `${colors.gray}[${getTimestamp()}]${colors.reset} ${color}${symbol}${colors.reset} ${colors.bright}[${this.context}]${colors.reset}`

    let logLine = `${prefix} ${message}`
    if (data && Object.keys(data).length > 0) {
      const dataStr = Object.entries(data)
        .map(([k, v]) => `${colors.dim}${k}=${colors.reset}${formatValue(v)}`)
        .join(' ')
      logLine = `${logLine} ${dataStr}`
    }

    if (level === 'warn' || level === 'error') {
      console.error(logLine)
    } else {
      console.log(logLine)
    }
    writeToLogFile(logLine)
  }

  info(message: string, data?: LogData): void {
    this.log('info', message, data)
  }

  success(message: string, data?: LogData): void {
    this.log('success', message, data)
  }

  warn(message: string, data?: LogData): void {
    this.log('warn', message, data)
  }

  error(message: string, data?: LogData): void {
    this.log('error', message, data)
  }

  debug(message: string, data?: LogData): void {
    this.log('debug', message, data)
  }

  /**
   * Start a timer for an operation.
   * @param label - Unique label for the timer
   */
  startTimer(label: string): void {
    this.timers.set(label, Date.now())
    this.log('timing', `Starting: ${label}`)
  }

  /**
   * End a timer and log the duration.
   * @param label - The timer label (must match startTimer)
   * @param message - Optional completion message
   * @returns Duration in milliseconds, 0 if the timer was never started
   */
  endTimer(label: string, message?: string): number {
    const start = this.timers.get(label)

    if (start === undefined) {
      this.warn(`Timer "${label}" was not started`)
      return 0
    }

    const duration = Date.now() - start
    this.timers.delete(label)

    const durationStr = `${colors.magenta}${formatDuration(duration)}${colors.reset}`
    this.log('timing', `${message || `Completed: ${label}`} ${colors.dim}took${colors.reset} ${durationStr}`)

    return duration
  }

  /**
   * Drop a timer without logging, e.g. when the timed operation failed.
   */
  clearTimer(label: string): void {
    this.timers.delete(label)
  }

  /**
   * Log a section header for visual separation.
   */
  section(title: string): void {
    if (LEVEL_RANK.info < threshold) return
    const line = '─'.repeat(60)
    for (const l of ['', `${colors.blue}${line}${colors.reset}`, `${colors.blue}${colors.bright}  ${title}${colors.reset}`, `${colors.blue}${line}${colors.reset}`]) {
      console.log(l)
      writeToLogFile(l)
    }
  }
}

// ============================================================================
// Exports
// ============================================================================

/** Main logger instance */
export const logger = new Logger('Server')

/** Create a logger for a specific module */
export function createLogger(context: string): Logger {
  return new Logger(context)
}
