// services/monitor/src/core/sink/OutputSink.ts

import { errorMessage, SinkWriteError, StreamFailure } from '../errors.js'
import type { TextSink } from '../format/types.js'
import type { LogDestination, TextDestination } from './destinations.js'

export interface OutputSinkHooks {
    /** Called once, on the first mirror failure; mirroring stops afterwards. */
    onMirrorError?: (err: SinkWriteError) => void
}

/**
 * Writes formatted text to the primary destination, then mirrors the
 * uncolored form to the log destination when there is one.
 *
 * A primary failure is a StreamFailure and ends the session. A mirror
 * failure never interrupts primary output.
 */
export class OutputSink implements TextSink {
    private mirroring: boolean

    constructor(
        private readonly primary: TextDestination,
        private readonly log: LogDestination | null = null,
        private readonly hooks: OutputSinkHooks = {}
    ) {
        this.mirroring = log !== null
    }

    get isMirroring(): boolean {
        return this.mirroring
    }

    write(text: string, plain: string = text): void {
        try {
            this.primary.write(text)
        } catch (err) {
            throw new StreamFailure(`output write failed: ${errorMessage(err)}`, { cause: err })
        }

        this.mirror(plain)
    }

    private mirror(plain: string): void {
        const log = this.log
        if (!log || !this.mirroring) return

        if (log.closed) {
            this.stopMirroring(new SinkWriteError('log destination is closed'))
            return
        }

        try {
            log.write(plain)
        } catch (err) {
            this.stopMirroring(new SinkWriteError(`log write failed: ${errorMessage(err)}`, { cause: err }))
        }
    }

    private stopMirroring(err: SinkWriteError): void {
        this.mirroring = false
        this.hooks.onMirrorError?.(err)
    }
}
