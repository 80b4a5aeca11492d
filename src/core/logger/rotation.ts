/**
 * Log Rotation
 *
 * Size-based rotating file sink. When a write would push the active file
 * past maxSize, the file is renamed to a timestamped backup, a fresh file
 * is opened at the original path, and backups beyond maxBackups are
 * removed oldest first.
 *
 * All file work is synchronous, so a rotate-then-write sequence finishes
 * before any other write on the same rotator can start.
 */
import {
    closeSync,
    fstatSync,
    mkdirSync,
    openSync,
    readdirSync,
    renameSync,
    unlinkSync,
    writeSync,
} from 'node:fs'
import { basename, dirname, join } from 'node:path'
import { attemptSync } from '@logosdx/utils'

import { logEvents } from '../observer.js'
import { SinkClosedError, SinkOpenError } from './errors.js'
import type { ClosableSink, RotationResult } from './types.js'


/**
 * Parse a size string (e.g., '10mb', '1gb') to bytes.
 *
 * @param size - Size string with unit suffix
 * @returns Size in bytes
 *
 * @example
 * ```typescript
 * parseSize('10mb')  // 10485760
 * parseSize('1gb')   // 1073741824
 * parseSize('512kb') // 524288
 * ```
 */
export function parseSize(size: string): number {

    const match = size.trim().toLowerCase().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/)

    if (!match || !match[1]) {

        throw new Error(`Invalid size format: ${size}`)
    }

    const value = parseFloat(match[1])
    const unit = match[2] ?? 'b'

    const multipliers: Record<string, number> = {
        b: 1,
        kb: 1024,
        mb: 1024 * 1024,
        gb: 1024 * 1024 * 1024,
    }

    const multiplier = multipliers[unit]

    if (multiplier === undefined) {

        throw new Error(`Invalid size unit: ${unit}`)
    }

    return Math.floor(value * multiplier)
}


/**
 * Format a rotation timestamp (UTC, second resolution).
 *
 * @example
 * ```typescript
 * formatRotationTimestamp(new Date('2024-01-15T10:30:45.123Z'))
 * // '20240115T103045'
 * ```
 */
export function formatRotationTimestamp(date: Date): string {

    return date
        .toISOString()
        .replace(/[-:]/g, '')
        .replace(/\.\d+Z$/, '')
}


/**
 * Generate a backup filename for the given file.
 *
 * The first backup within a second gets the bare timestamp. Later ones
 * in the same second get a zero-padded counter one past the highest
 * already on disk, so no backup is overwritten and names still sort
 * chronologically after older ones are cleaned up.
 *
 * @example
 * ```typescript
 * generateRotatedName('/logs/app.log', new Date('2024-01-15T10:30:45Z'))
 * // '/logs/app.log.20240115T103045'
 * // '/logs/app.log.20240115T103045.001' if that already exists
 * ```
 */
export function generateRotatedName(filepath: string, date: Date = new Date()): string {

    const candidate = `${filepath}.${formatRotationTimestamp(date)}`
    const stamp = basename(candidate)

    const counters = listRotatedFiles(filepath)
        .map((f) => basename(f))
        .filter((f) => f === stamp || f.startsWith(`${stamp}.`))
        .map((f) => (f === stamp ? 0 : Number(f.slice(stamp.length + 1))))

    if (counters.length === 0) {

        return candidate
    }

    const next = Math.max(...counters) + 1

    return `${candidate}.${String(next).padStart(3, '0')}`
}


/**
 * List rotated backups of a file.
 *
 * @param filepath - Active log file path
 * @returns Backup paths, oldest first
 */
export function listRotatedFiles(filepath: string): string[] {

    const dir = dirname(filepath)
    const base = basename(filepath)

    // Pattern: base.YYYYMMDDTHHMMSS[.NNN]
    const pattern = new RegExp(`^${escapeRegex(base)}\\.\\d{8}T\\d{6}(?:\\.\\d{3,})?$`)

    const [files, err] = attemptSync(() => readdirSync(dir))

    if (err) {

        return []
    }

    return files
        .filter((f) => pattern.test(f))
        .sort((a, b) => a.localeCompare(b, 'en', { numeric: true }))
        .map((f) => join(dir, f))
}


/**
 * Delete the oldest backups beyond maxBackups.
 *
 * @param filepath - Active log file path
 * @param maxBackups - Backups to keep (0 keeps all)
 * @returns Deleted file paths
 */
export function cleanupRotatedFiles(filepath: string, maxBackups: number): string[] {

    if (maxBackups <= 0) {

        return []
    }

    const rotated = listRotatedFiles(filepath)
    const toDelete = rotated.slice(0, Math.max(0, rotated.length - maxBackups))
    const deleted: string[] = []

    for (const file of toDelete) {

        const [, err] = attemptSync(() => unlinkSync(file))

        if (!err) {

            deleted.push(file)
        }
    }

    return deleted
}


/**
 * Create parent directories and open a file for appending.
 */
function openAppend(filepath: string): number {

    mkdirSync(dirname(filepath), { recursive: true })

    return openSync(filepath, 'a', 0o644)
}


/**
 * Size-bounded append-only file sink.
 *
 * @example
 * ```typescript
 * const rotator = new FileRotator('logs/app.log', 10 * 1024 * 1024, 5)
 * rotator.write('hello\n')
 * rotator.close()
 * ```
 */
export class FileRotator implements ClosableSink {

    #fd: number | null
    #size: number
    #closed = false

    /**
     * @param path - Active log file
     * @param maxSize - Rotate when a write would exceed this many bytes (0 disables)
     * @param maxBackups - Backups to keep (0 keeps all)
     * @throws SinkOpenError when the file cannot be created or opened
     */
    constructor(
        public readonly path: string,
        public readonly maxSize: number,
        public readonly maxBackups: number,
    ) {

        const [fd, err] = attemptSync(() => openAppend(path))

        if (err) {

            throw new SinkOpenError(path, { cause: err })
        }

        this.#fd = fd

        // Resume accounting from whatever a previous run left behind
        this.#size = fstatSync(fd).size
    }

    /**
     * Bytes written to the active file since it was opened or rotated.
     */
    get size(): number {

        return this.#size
    }

    get closed(): boolean {

        return this.#closed
    }

    /**
     * Write a chunk, rotating first when it would exceed maxSize.
     *
     * A failed rotation never blocks the write; the chunk lands in
     * whichever file is open.
     */
    write(chunk: string | Uint8Array): number {

        if (this.#closed) {

            throw new SinkClosedError(this.path)
        }

        const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk
        let rotation: RotationResult | null = null

        if (this.maxSize > 0 && this.#size + bytes.byteLength > this.maxSize) {

            rotation = this.#rotate()
        }

        try {

            const fd = this.#fd ?? this.#reopen()
            const written = writeSync(fd, bytes)

            this.#size += written

            return written
        }
        finally {

            if (rotation) {

                this.#report(rotation)
            }
        }
    }

    /**
     * Close the active file. Repeated calls are no-ops.
     */
    close(): void {

        if (this.#closed) {

            return
        }

        this.#closed = true

        const fd = this.#fd
        this.#fd = null

        if (fd !== null) {

            closeSync(fd)
        }
    }

    /**
     * Rename the active file to a backup and start a fresh one.
     */
    #rotate(): RotationResult {

        let closeErr: Error | null = null

        if (this.#fd !== null) {

            const fd = this.#fd
            this.#fd = null

            closeErr = attemptSync(() => closeSync(fd))[1]
        }

        const backup = generateRotatedName(this.path)
        const [, renameErr] = attemptSync(() => renameSync(this.path, backup))

        if (renameErr) {

            // Keep writing to the active path; it may have been removed underneath us
            const [fd, openErr] = attemptSync(() => openAppend(this.path))

            if (openErr) {

                return { rotated: false, error: openErr }
            }

            this.#fd = fd
            this.#size = fstatSync(fd).size

            return { rotated: false, error: renameErr }
        }

        const [fd, openErr] = attemptSync(() => openAppend(this.path))

        if (openErr) {

            return { rotated: true, oldFile: this.path, newFile: backup, error: openErr }
        }

        this.#fd = fd
        this.#size = 0

        const deletedFiles = cleanupRotatedFiles(this.path, this.maxBackups)

        const result: RotationResult = {
            rotated: true,
            oldFile: this.path,
            newFile: backup,
            deletedFiles,
        }

        return closeErr ? { ...result, error: closeErr } : result
    }

    /**
     * Open the active path again after a failed rotation left no file open.
     */
    #reopen(): number {

        const [fd, err] = attemptSync(() => openAppend(this.path))

        if (err) {

            throw new SinkOpenError(this.path, { cause: err })
        }

        this.#fd = fd
        this.#size = fstatSync(fd).size

        return fd
    }

    #report(result: RotationResult): void {

        if (result.rotated && result.oldFile && result.newFile) {

            logEvents.emit('logger:rotated', {
                oldFile: result.oldFile,
                newFile: result.newFile,
                deletedFiles: result.deletedFiles ?? [],
            })
        }

        if (result.error) {

            logEvents.emit('logger:rotation-failed', { file: this.path, error: result.error })
        }
    }
}


/**
 * Escape special regex characters in a string.
 */
function escapeRegex(str: string): string {

    return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
