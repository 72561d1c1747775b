// services/monitor/src/core/sink/destinations.ts

import { closeSync, openSync, writeSync } from 'node:fs'

export interface TextDestination {
    write(text: string): void
}

export interface LogDestination extends TextDestination {
    readonly closed: boolean
}

/**
 * Wraps a writable stream such as process.stdout. Stream errors arrive as
 * events; the first one is kept and thrown from the next write.
 */
export class StreamDestination implements TextDestination {
    private error: Error | null = null

    constructor(private readonly stream: NodeJS.WritableStream) {
        stream.on('error', (err: Error) => {
            this.error ??= err
        })
    }

    write(text: string): void {
        if (this.error) throw this.error
        this.stream.write(text)
    }
}

/**
 * Log file written with synchronous fs calls, so each write is on disk
 * (in the page cache) before it returns. Opened with 'w': truncated.
 */
export class FileLogDestination implements LogDestination {
    private fd: number | null

    constructor(readonly path: string) {
        this.fd = openSync(path, 'w')
    }

    get closed(): boolean {
        return this.fd === null
    }

    write(text: string): void {
        if (this.fd === null) throw new Error(`log file ${this.path} is closed`)
        writeSync(this.fd, text)
    }

    close(): void {
        if (this.fd === null) return
        const fd = this.fd
        this.fd = null
        closeSync(fd)
    }
}
