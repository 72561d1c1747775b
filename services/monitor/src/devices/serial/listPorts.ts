import { SerialPort } from 'serialport'
import { describePort, type PortListing } from './utils.js'

export async function listPorts(): Promise<PortListing> {
    const ports = await SerialPort.list()
    return {
        ports: ports.map((p) => ({ device: p.path, description: describePort(p) })),
    }
}
