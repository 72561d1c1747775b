// services/monitor/src/core/status/StatusReporter.ts

import type { TextDestination } from '../sink/destinations.js'

/** Scoped to one process run; passed explicitly to whatever reports status. */
export interface StatusOptions {
    /** Print nothing but device output */
    quiet: boolean
    color: boolean
}

const GREEN = '\x1b[1;32m'
const RED = '\x1b[1;31m'
const RESET = '\x1b[1;m'

/**
 * Operator-facing status text (connect progress, failures). Goes to the
 * primary destination but never to the log mirror.
 */
export class StatusReporter {
    constructor(
        private readonly out: TextDestination,
        private readonly opts: StatusOptions
    ) {}

    info(message: string): void {
        this.line(message, GREEN)
    }

    error(message: string): void {
        this.line(message, RED)
    }

    /** One dot per failed attempt while waiting for a device. */
    progress(): void {
        if (this.opts.quiet) return
        this.out.write('.')
    }

    blank(): void {
        if (this.opts.quiet) return
        this.out.write('\n')
    }

    private line(message: string, color: string): void {
        if (this.opts.quiet) return
        if (this.opts.color && message.length > 0) {
            this.out.write(`${color}${message}${RESET}\n`)
        } else {
            this.out.write(`${message}\n`)
        }
    }
}
