// services/monitor/src/core/stream/ChunkQueue.ts

import { StreamFailure } from '../errors.js'
import type { ByteChunk } from './types.js'

interface PendingRead {
    resolve: (chunk: ByteChunk) => void
    reject: (err: StreamFailure) => void
}

/**
 * Bridges push-style device events ('data', 'error', 'close') to the
 * pull-style read() the monitor loop expects.
 *
 * Chunks are handed out in arrival order. Once failed, buffered chunks are
 * still drained before read() starts rejecting.
 */
export class ChunkQueue {
    private readonly chunks: ByteChunk[] = []
    private pending: PendingRead | null = null
    private failure: StreamFailure | null = null

    get failed(): boolean {
        return this.failure !== null
    }

    get size(): number {
        return this.chunks.length
    }

    push(chunk: ByteChunk): void {
        if (this.failure) return

        const pending = this.pending
        if (pending) {
            this.pending = null
            pending.resolve(chunk)
            return
        }
        this.chunks.push(chunk)
    }

    /** First failure wins; later ones are ignored. */
    fail(err: StreamFailure): void {
        if (this.failure) return
        this.failure = err

        const pending = this.pending
        if (pending) {
            this.pending = null
            pending.reject(err)
        }
    }

    read(): Promise<ByteChunk> {
        const next = this.chunks.shift()
        if (next) return Promise.resolve(next)
        if (this.failure) return Promise.reject(this.failure)
        if (this.pending) {
            return Promise.reject(new StreamFailure('concurrent read on device stream'))
        }

        return new Promise<ByteChunk>((resolve, reject) => {
            this.pending = { resolve, reject }
        })
    }
}
