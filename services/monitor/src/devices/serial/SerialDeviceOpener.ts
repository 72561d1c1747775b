// services/monitor/src/devices/serial/SerialDeviceOpener.ts

import { SerialPort } from 'serialport'
import type { ChannelLogger } from '@serialwatch/logging'
import type { DeviceOpener, DeviceStream } from '../../core/stream/types.js'
import { classifyOpenError } from './errors.js'
import { SerialDeviceStream } from './SerialDeviceStream.js'
import { toCalloutPath } from './utils.js'

export class SerialDeviceOpener implements DeviceOpener {
    constructor(private readonly log: ChannelLogger) {}

    open(path: string, baudRate: number): Promise<DeviceStream> {
        const effectivePath = toCalloutPath(path)
        if (effectivePath !== path) {
            this.log.debug('translating macOS tty.* → cu.*', { originalPath: path, translatedPath: effectivePath })
        }

        return new Promise<DeviceStream>((resolve, reject) => {
            const port = new SerialPort({
                path: effectivePath,
                baudRate,
                autoOpen: false,
                dataBits: 8,
                parity: 'none',
                stopBits: 1,
            })

            port.open((err) => {
                if (err) {
                    this.log.debug('open failed', { path: effectivePath, error: err.message })
                    reject(classifyOpenError(path, err))
                    return
                }
                resolve(new SerialDeviceStream(port, path, this.log))
            })
        })
    }
}
