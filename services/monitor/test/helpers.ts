import type { ChannelLogger } from '@serialwatch/logging'
import { StreamFailure } from '../src/core/errors.js'
import type { LogDestination, TextDestination } from '../src/core/sink/destinations.js'
import { ChunkQueue } from '../src/core/stream/ChunkQueue.js'
import type { ByteChunk, DeviceStream } from '../src/core/stream/types.js'

export const TEST_PATH = '/dev/ttyTEST0'

/** 1700000000.5 s: exact in binary, so toFixed(7) is stable. */
export const FIXED_EPOCH_MS = 1700000000500
export const PLAIN_STAMP = '1700000000.5000000 | '
export const fixedClock = (): number => FIXED_EPOCH_MS

export class MemoryDestination implements TextDestination {
    readonly writes: string[] = []

    get text(): string {
        return this.writes.join('')
    }

    write(text: string): void {
        this.writes.push(text)
    }
}

export class MemoryLogDestination implements LogDestination {
    closed = false
    failWith: Error | null = null
    text = ''

    write(text: string): void {
        if (this.failWith) throw this.failWith
        this.text += text
    }
}

export class ThrowingDestination implements TextDestination {
    constructor(private readonly error: Error) {}

    write(): void {
        throw this.error
    }
}

export function bytes(input: string | number[]): Buffer {
    return typeof input === 'string' ? Buffer.from(input, 'latin1') : Buffer.from(input)
}

/** In-process device: the test pushes chunks and failures. */
export class FakeDeviceStream implements DeviceStream {
    private readonly queue = new ChunkQueue()
    closeCalls = 0

    constructor(readonly path: string = TEST_PATH) {}

    push(input: string | number[]): void {
        this.queue.push(bytes(input))
    }

    fail(message: string): void {
        this.queue.fail(new StreamFailure(message))
    }

    read(): Promise<ByteChunk> {
        return this.queue.read()
    }

    async close(): Promise<void> {
        this.closeCalls += 1
        this.queue.fail(new StreamFailure('closed by owner'))
    }
}

export interface LogEntry {
    level: 'debug' | 'info' | 'warn' | 'error' | 'fatal'
    msg: string
    extra?: Record<string, unknown>
}

export function recordingLogger(): ChannelLogger & { entries: LogEntry[] } {
    const entries: LogEntry[] = []
    const at = (level: LogEntry['level']) => (msg: string, extra?: Record<string, unknown>): void => {
        entries.push({ level, msg, extra })
    }
    return {
        entries,
        debug: at('debug'),
        info: at('info'),
        warn: at('warn'),
        error: at('error'),
        fatal: at('fatal'),
    }
}

export function tick(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve))
}
