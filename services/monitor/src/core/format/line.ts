// services/monitor/src/core/format/line.ts

import type { ByteChunk } from '../stream/types.js'
import { OutputBuffer } from './markers.js'
import type { FormatterContext, LineFormatter } from './types.js'

export function createLineFormatter(ctx: FormatterContext): LineFormatter {
    return {
        kind: 'line',
        ctx,
        decoder: new TextDecoder('utf-8', { ignoreBOM: true }),
        atLineStart: true,
        finalized: false,
    }
}

/**
 * Timestamps are front-loaded: the marker for the next line is written right
 * after each `\n`, before any byte of that line has arrived. Only the very
 * first line gets its marker lazily, in front of its first character.
 */
function emitText(f: LineFormatter, text: string): void {
    const out = new OutputBuffer(f.ctx.output, f.ctx.clock)

    for (const ch of text) {
        if (f.atLineStart) {
            out.timestamp()
            f.atLineStart = false
        }

        out.text(ch)

        if (ch === '\n') {
            out.timestamp()
        }
    }

    out.flushTo(f.ctx.sink)
}

export function writeLine(f: LineFormatter, chunk: ByteChunk): void {
    emitText(f, f.decoder.decode(chunk, { stream: true }))
}

export function finalizeLine(f: LineFormatter): void {
    emitText(f, f.decoder.decode())
}
