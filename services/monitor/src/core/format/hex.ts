// services/monitor/src/core/format/hex.ts

import type { ByteChunk } from '../stream/types.js'
import { asciiGutter, hexByte, OutputBuffer } from './markers.js'
import type { FormatterContext, HexFormatter } from './types.js'

export const DEFAULT_HEX_COLUMNS = 16

const COLUMN_PAD = '   '

export function createHexFormatter(
    ctx: FormatterContext,
    opts: { maxColumns: number; showAscii: boolean }
): HexFormatter {
    if (!Number.isInteger(opts.maxColumns) || opts.maxColumns < 1) {
        throw new RangeError(`maxColumns must be a positive integer, got ${opts.maxColumns}`)
    }

    return {
        kind: 'hex',
        ctx,
        pendingLineBytes: [],
        columnCount: 0,
        maxColumns: opts.maxColumns,
        showAscii: opts.showAscii,
        finalized: false,
    }
}

/**
 * Ends the current row. With the ASCII gutter a short row is padded so the
 * gutter lines up with full rows.
 */
function flushRow(f: HexFormatter, out: OutputBuffer): void {
    if (f.showAscii) {
        if (f.columnCount < f.maxColumns) {
            out.text(COLUMN_PAD.repeat(f.maxColumns - f.columnCount))
        }
        out.metaLine(asciiGutter(f.pendingLineBytes))
    } else {
        out.text('\n')
    }

    f.columnCount = 0
    f.pendingLineBytes = []
}

export function writeHex(f: HexFormatter, chunk: ByteChunk): void {
    const out = new OutputBuffer(f.ctx.output, f.ctx.clock)

    for (const byte of chunk) {
        if (f.columnCount === 0) {
            out.timestamp()
        }

        out.text(`${hexByte(byte)} `)

        if (f.showAscii) {
            f.pendingLineBytes.push(byte)
        }

        f.columnCount += 1

        if (f.columnCount === f.maxColumns) {
            flushRow(f, out)
        }
    }

    out.flushTo(f.ctx.sink)
}

/** Flushes a trailing partial row, if any. */
export function finalizeHex(f: HexFormatter): void {
    if (f.columnCount === 0) return
    const out = new OutputBuffer(f.ctx.output, f.ctx.clock)
    flushRow(f, out)
    out.flushTo(f.ctx.sink)
}
