import type { ByteChunk } from '../stream/types.js'
import type { FormatterContext, RawFormatter } from './types.js'

export function createRawFormatter(ctx: FormatterContext): RawFormatter {
    return {
        kind: 'raw',
        ctx,
        // Invalid UTF-8 becomes U+FFFD; a sequence split across chunks is held back.
        // A leading BOM is device data too.
        decoder: new TextDecoder('utf-8', { ignoreBOM: true }),
        finalized: false,
    }
}

export function writeRaw(f: RawFormatter, chunk: ByteChunk): void {
    const text = f.decoder.decode(chunk, { stream: true })
    if (text.length > 0) f.ctx.sink.write(text)
}

export function finalizeRaw(f: RawFormatter): void {
    const rest = f.decoder.decode()
    if (rest.length > 0) f.ctx.sink.write(rest)
}
