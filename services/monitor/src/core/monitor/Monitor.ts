// services/monitor/src/core/monitor/Monitor.ts

import type { ChannelLogger } from '@serialwatch/logging'
import { StreamFailure, toStreamFailure } from '../errors.js'
import { writeChunk } from '../format/formatter.js'
import type { Formatter } from '../format/types.js'
import type { Reader } from '../stream/Reader.js'

export type MonitorOutcome =
    | { kind: 'failed'; error: StreamFailure }
    | { kind: 'interrupted' }

export interface MonitorStats {
    chunks: number
    bytes: number
}

const INTERRUPTED: unique symbol = Symbol('interrupted')

/**
 * Reads chunks and feeds them to the formatter until the stream fails or the
 * signal aborts. There is no other way out: a device stream does not "end".
 *
 * Each chunk is fully formatted and written before the next read starts.
 */
export class Monitor {
    private readonly stats: MonitorStats = { chunks: 0, bytes: 0 }

    constructor(
        private readonly reader: Reader,
        private readonly formatter: Formatter,
        private readonly log: ChannelLogger
    ) {}

    getStats(): MonitorStats {
        return { ...this.stats }
    }

    async monitor(signal: AbortSignal): Promise<MonitorOutcome> {
        if (signal.aborted) return { kind: 'interrupted' }

        let resolveAbort: () => void = () => {}
        const aborted = new Promise<typeof INTERRUPTED>((resolve) => {
            resolveAbort = () => resolve(INTERRUPTED)
        })
        const onAbort = (): void => resolveAbort()
        signal.addEventListener('abort', onAbort, { once: true })

        try {
            for (;;) {
                let next: Buffer | typeof INTERRUPTED
                try {
                    next = await Promise.race([this.reader.read(), aborted])
                } catch (err) {
                    if (signal.aborted) return { kind: 'interrupted' }
                    return this.failed('read', err)
                }

                if (next === INTERRUPTED) return { kind: 'interrupted' }

                // Empty read: nothing arrived yet.
                if (next.length === 0) continue

                try {
                    writeChunk(this.formatter, next)
                } catch (err) {
                    return this.failed('write', err)
                }

                this.stats.chunks += 1
                this.stats.bytes += next.length
            }
        } finally {
            signal.removeEventListener('abort', onAbort)
        }
    }

    private failed(stage: 'read' | 'write', err: unknown): MonitorOutcome {
        const error = toStreamFailure(err)
        this.log.debug(`monitor ${stage} failed`, { error: error.message, ...this.stats })
        return { kind: 'failed', error }
    }
}
