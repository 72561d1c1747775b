// services/monitor/src/core/monitor/session.ts

import { performance } from 'node:perf_hooks'
import type { ChannelLogger } from '@serialwatch/logging'
import { errorMessage } from '../errors.js'
import { createFormatter, finalizeFormatter } from '../format/formatter.js'
import type { FormatterOptions, OutputConfig } from '../format/types.js'
import type { LogDestination, TextDestination } from '../sink/destinations.js'
import { OutputSink } from '../sink/OutputSink.js'
import { Reader } from '../stream/Reader.js'
import type { DeviceStream } from '../stream/types.js'
import { Monitor, type MonitorOutcome } from './Monitor.js'

export interface SessionOptions {
    formatter: FormatterOptions
    output: OutputConfig
    primary: TextDestination
    logDestination: LogDestination | null
    log: ChannelLogger
    /** Epoch ms; defaults to epochClock */
    clock?: () => number
}

/** Epoch milliseconds with sub-millisecond precision. */
export const epochClock = (): number => performance.timeOrigin + performance.now()

export type RunSession = (stream: DeviceStream, signal: AbortSignal) => Promise<MonitorOutcome>

/**
 * One connection's worth of monitoring. Reader, formatter and sink are built
 * fresh here and dropped when the session ends. Whatever way the loop exits,
 * the formatter is finalized (partial hex row flushed) and the device
 * stream is closed.
 */
export async function runSession(
    stream: DeviceStream,
    opts: SessionOptions,
    signal: AbortSignal
): Promise<MonitorOutcome> {
    const { log } = opts

    const sink = new OutputSink(opts.primary, opts.logDestination, {
        onMirrorError: (err) => {
            log.warn('log mirroring stopped', { error: err.message })
        },
    })

    const formatter = createFormatter(opts.formatter, {
        sink,
        output: opts.output,
        clock: opts.clock ?? epochClock,
    })

    const monitor = new Monitor(new Reader(stream), formatter, log)
    log.info(`session started path=${stream.path} format=${formatter.kind}`)

    try {
        return await monitor.monitor(signal)
    } finally {
        try {
            finalizeFormatter(formatter)
        } catch (err) {
            log.warn('final flush failed', { error: errorMessage(err) })
        }

        try {
            await stream.close()
        } catch (err) {
            log.warn('device close failed', { path: stream.path, error: errorMessage(err) })
        }

        log.info(`session ended path=${stream.path}`, { ...monitor.getStats() })
    }
}

export function sessionRunner(opts: SessionOptions): RunSession {
    return (stream, signal) => runSession(stream, opts, signal)
}
