import { describe, it } from 'node:test'
import assert from 'node:assert'
import { PassThrough } from 'node:stream'
import { SinkWriteError, StreamFailure } from '../src/core/errors.js'
import { StreamDestination } from '../src/core/sink/destinations.js'
import { OutputSink } from '../src/core/sink/OutputSink.js'
import { MemoryDestination, MemoryLogDestination, ThrowingDestination } from './helpers.js'

describe('OutputSink', () => {
    it('writes styled text to the primary and plain text to the log', () => {
        const out = new MemoryDestination()
        const log = new MemoryLogDestination()
        const sink = new OutputSink(out, log)

        sink.write('\x1b[0;32mok\x1b[0;m', 'ok')
        sink.write('same')

        assert.strictEqual(out.text, '\x1b[0;32mok\x1b[0;msame')
        assert.strictEqual(log.text, 'oksame')
    })

    it('works without a log destination', () => {
        const out = new MemoryDestination()
        const sink = new OutputSink(out)

        sink.write('x')

        assert.strictEqual(out.text, 'x')
        assert.strictEqual(sink.isMirroring, false)
    })

    it('reports a closed log once and keeps writing the primary', () => {
        const out = new MemoryDestination()
        const log = new MemoryLogDestination()
        const errors: SinkWriteError[] = []
        const sink = new OutputSink(out, log, { onMirrorError: (err) => errors.push(err) })

        sink.write('a')
        log.closed = true
        sink.write('b')
        sink.write('c')

        assert.strictEqual(out.text, 'abc')
        assert.strictEqual(log.text, 'a')
        assert.strictEqual(errors.length, 1)
        assert.strictEqual(errors[0]?.message, 'log destination is closed')
        assert.strictEqual(sink.isMirroring, false)
    })

    it('turns a throwing log write into a soft SinkWriteError', () => {
        const out = new MemoryDestination()
        const log = new MemoryLogDestination()
        log.failWith = new Error('ENOSPC')
        const errors: SinkWriteError[] = []
        const sink = new OutputSink(out, log, { onMirrorError: (err) => errors.push(err) })

        sink.write('a')
        sink.write('b')

        assert.strictEqual(out.text, 'ab')
        assert.strictEqual(errors.length, 1)
        assert.ok(errors[0] instanceof SinkWriteError)
        assert.strictEqual(errors[0].message, 'log write failed: ENOSPC')
    })

    it('raises StreamFailure when the primary destination fails', () => {
        const cause = new Error('EPIPE')
        const log = new MemoryLogDestination()
        const sink = new OutputSink(new ThrowingDestination(cause), log)

        assert.throws(
            () => sink.write('lost'),
            (err: unknown) =>
                err instanceof StreamFailure &&
                err.message === 'output write failed: EPIPE' &&
                err.cause === cause
        )
        assert.strictEqual(log.text, '')
    })
})

describe('StreamDestination', () => {
    it('keeps the first stream error and survives later ones', () => {
        const stream = new PassThrough()
        const dest = new StreamDestination(stream)

        stream.emit('error', new Error('EPIPE'))
        stream.emit('error', new Error('ECONNRESET'))

        assert.throws(() => dest.write('x'), { message: 'EPIPE' })
    })
})
