// services/monitor/src/core/format/formatter.ts

import type { ByteChunk } from '../stream/types.js'
import { createHexFormatter, finalizeHex, writeHex } from './hex.js'
import { createLineFormatter, finalizeLine, writeLine } from './line.js'
import { createRawFormatter, finalizeRaw, writeRaw } from './raw.js'
import type { Formatter, FormatterContext, FormatterOptions } from './types.js'

function assertNever(value: never): never {
    throw new Error(`unhandled formatter variant: ${JSON.stringify(value)}`)
}

export function createFormatter(opts: FormatterOptions, ctx: FormatterContext): Formatter {
    switch (opts.format) {
        case 'raw':
            return createRawFormatter(ctx)
        case 'line':
            return createLineFormatter(ctx)
        case 'hex':
            return createHexFormatter(ctx, { maxColumns: opts.maxColumns, showAscii: opts.showAscii })
        default:
            return assertNever(opts.format)
    }
}

/** Formats one chunk and hands the result to the sink. Sink errors propagate. */
export function writeChunk(f: Formatter, chunk: ByteChunk): void {
    if (f.finalized) {
        throw new Error(`${f.kind} formatter used after finalize`)
    }

    switch (f.kind) {
        case 'raw':
            writeRaw(f, chunk)
            return
        case 'line':
            writeLine(f, chunk)
            return
        case 'hex':
            writeHex(f, chunk)
            return
        default:
            assertNever(f)
    }
}

/**
 * End-of-session step: flushes whatever the variant still holds (a partial
 * hex row, an incomplete UTF-8 sequence). Runs at most once; later calls are
 * no-ops.
 */
export function finalizeFormatter(f: Formatter): void {
    if (f.finalized) return
    f.finalized = true

    switch (f.kind) {
        case 'raw':
            finalizeRaw(f)
            return
        case 'line':
            finalizeLine(f)
            return
        case 'hex':
            finalizeHex(f)
            return
        default:
            assertNever(f)
    }
}
