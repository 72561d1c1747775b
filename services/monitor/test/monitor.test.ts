import { describe, it } from 'node:test'
import assert from 'node:assert'
import { createFormatter } from '../src/core/format/formatter.js'
import { Monitor } from '../src/core/monitor/Monitor.js'
import { epochClock, runSession, type SessionOptions } from '../src/core/monitor/session.js'
import { OutputSink } from '../src/core/sink/OutputSink.js'
import { Reader } from '../src/core/stream/Reader.js'
import {
    FakeDeviceStream,
    fixedClock,
    MemoryDestination,
    MemoryLogDestination,
    recordingLogger,
    tick,
} from './helpers.js'

describe('Monitor', () => {
    it('formats chunks in order, skips empty reads and stops on stream failure', async () => {
        const stream = new FakeDeviceStream()
        const out = new MemoryDestination()
        const formatter = createFormatter(
            { format: 'line', showAscii: false, maxColumns: 16 },
            { sink: new OutputSink(out), output: { addTimestamp: false, useColor: false }, clock: fixedClock }
        )
        const monitor = new Monitor(new Reader(stream), formatter, recordingLogger())

        stream.push('one\n')
        stream.push([])
        stream.push('two')
        stream.fail('device unplugged')

        const outcome = await monitor.monitor(new AbortController().signal)

        assert.strictEqual(outcome.kind, 'failed')
        assert.ok(outcome.kind === 'failed')
        assert.strictEqual(outcome.error.name, 'StreamFailure')
        assert.strictEqual(outcome.error.message, 'device unplugged')
        assert.deepStrictEqual(out.writes, ['one\n', 'two'])
        assert.deepStrictEqual(monitor.getStats(), { chunks: 2, bytes: 7 })
    })

    it('fails when the sink cannot write', async () => {
        const stream = new FakeDeviceStream()
        const formatter = createFormatter(
            { format: 'raw', showAscii: false, maxColumns: 16 },
            {
                sink: new OutputSink({ write: () => { throw new Error('EPIPE') } }),
                output: { addTimestamp: false, useColor: false },
                clock: fixedClock,
            }
        )
        const monitor = new Monitor(new Reader(stream), formatter, recordingLogger())
        stream.push('x')

        const outcome = await monitor.monitor(new AbortController().signal)

        assert.ok(outcome.kind === 'failed')
        assert.strictEqual(outcome.error.message, 'output write failed: EPIPE')
    })

    it('returns interrupted when the signal aborts while waiting for data', async () => {
        const stream = new FakeDeviceStream()
        const out = new MemoryDestination()
        const formatter = createFormatter(
            { format: 'raw', showAscii: false, maxColumns: 16 },
            { sink: new OutputSink(out), output: { addTimestamp: false, useColor: false }, clock: fixedClock }
        )
        const monitor = new Monitor(new Reader(stream), formatter, recordingLogger())
        const controller = new AbortController()

        const running = monitor.monitor(controller.signal)
        stream.push('hi')
        await tick()
        controller.abort()

        assert.deepStrictEqual(await running, { kind: 'interrupted' })
        assert.strictEqual(out.text, 'hi')
    })

    it('does not read at all when already aborted', async () => {
        const stream = new FakeDeviceStream()
        stream.push('never')
        const out = new MemoryDestination()
        const formatter = createFormatter(
            { format: 'raw', showAscii: false, maxColumns: 16 },
            { sink: new OutputSink(out), output: { addTimestamp: false, useColor: false }, clock: fixedClock }
        )
        const controller = new AbortController()
        controller.abort()

        const outcome = await new Monitor(new Reader(stream), formatter, recordingLogger()).monitor(controller.signal)

        assert.deepStrictEqual(outcome, { kind: 'interrupted' })
        assert.strictEqual(out.text, '')
    })
})

describe('runSession', () => {
    function sessionOptions(out: MemoryDestination, log: MemoryLogDestination | null = null): SessionOptions & {
        log: ReturnType<typeof recordingLogger>
    } {
        return {
            formatter: { format: 'hex', showAscii: true, maxColumns: 4 },
            output: { addTimestamp: false, useColor: false },
            primary: out,
            logDestination: log,
            log: recordingLogger(),
            clock: fixedClock,
        }
    }

    it('flushes the partial hex row and closes the stream after a failure', async () => {
        const stream = new FakeDeviceStream()
        const out = new MemoryDestination()
        const file = new MemoryLogDestination()

        stream.push('ABCDE')
        stream.fail('read error')

        const outcome = await runSession(stream, sessionOptions(out, file), new AbortController().signal)

        assert.ok(outcome.kind === 'failed')
        assert.strictEqual(outcome.error.message, 'read error')
        assert.strictEqual(out.text, '41 42 43 44 | ABCD\n45          | E\n')
        assert.strictEqual(file.text, out.text)
        assert.strictEqual(stream.closeCalls, 1)
    })

    it('flushes the partial hex row on interrupt', async () => {
        const stream = new FakeDeviceStream()
        const out = new MemoryDestination()
        const controller = new AbortController()

        const running = runSession(stream, sessionOptions(out), controller.signal)
        stream.push([0x30, 0x31])
        await tick()
        controller.abort()

        assert.deepStrictEqual(await running, { kind: 'interrupted' })
        assert.strictEqual(out.text, '30 31       | 01\n')
        assert.strictEqual(stream.closeCalls, 1)
    })

    it('warns once when the log mirror goes away mid-session', async () => {
        const stream = new FakeDeviceStream()
        const out = new MemoryDestination()
        const file = new MemoryLogDestination()
        file.failWith = new Error('disk gone')
        const opts = sessionOptions(out, file)

        stream.push('WXYZ')
        stream.push('WXYZ')
        stream.fail('done')
        await runSession(stream, opts, new AbortController().signal)

        assert.strictEqual(out.text, '57 58 59 5A | WXYZ\n57 58 59 5A | WXYZ\n')
        const warnings = opts.log.entries.filter((e) => e.level === 'warn')
        assert.deepStrictEqual(warnings, [
            { level: 'warn', msg: 'log mirroring stopped', extra: { error: 'log write failed: disk gone' } },
        ])
    })
})

describe('epochClock', () => {
    it('tracks wall-clock time with sub-millisecond precision', () => {
        const before = Date.now()
        const samples = Array.from({ length: 10 }, () => epochClock())
        const after = Date.now()

        for (const t of samples) {
            assert.ok(t >= before - 50 && t <= after + 50, `${t} outside ${before}..${after}`)
        }
        assert.ok(samples.some((t) => !Number.isInteger(t)))
    })
})
