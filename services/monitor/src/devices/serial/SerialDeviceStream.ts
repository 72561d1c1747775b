// services/monitor/src/devices/serial/SerialDeviceStream.ts

import type { SerialPort } from 'serialport'
import type { ChannelLogger } from '@serialwatch/logging'
import { StreamFailure } from '../../core/errors.js'
import { ChunkQueue } from '../../core/stream/ChunkQueue.js'
import type { ByteChunk, DeviceStream } from '../../core/stream/types.js'

/**
 * DeviceStream over an already-open SerialPort. 'data' events feed the queue;
 * 'error' and 'close' (USB yank, explicit close) fail it.
 */
export class SerialDeviceStream implements DeviceStream {
    private readonly queue = new ChunkQueue()
    private chunkIndex = 0

    constructor(
        private readonly port: SerialPort,
        readonly path: string,
        private readonly log: ChannelLogger
    ) {
        port.on('data', (chunk: Buffer) => {
            this.chunkIndex += 1
            this.log.debug('data event received from serial port', {
                chunkLength: chunk.length,
                chunkIndex: this.chunkIndex,
            })
            this.queue.push(chunk)
        })

        port.on('error', (err: Error) => {
            this.log.debug('serial port error event', { path, error: err.message })
            this.queue.fail(new StreamFailure(`serial port error: ${err.message}`, { cause: err }))
        })

        port.on('close', () => {
            this.log.debug('serial port close event', { path })
            this.queue.fail(new StreamFailure(`serial port ${path} closed`))
        })
    }

    read(): Promise<ByteChunk> {
        return this.queue.read()
    }

    close(): Promise<void> {
        const port = this.port
        if (!port.isOpen) return Promise.resolve()

        return new Promise<void>((resolve, reject) => {
            port.close((err) => {
                if (err) reject(err)
                else resolve()
            })
        })
    }
}
