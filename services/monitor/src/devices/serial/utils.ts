// services/monitor/src/devices/serial/utils.ts

export interface PortSummary {
    device: string
    description: string
}

export interface PortListing {
    ports: PortSummary[]
}

/**
 * On macOS, SerialPort.list() reports /dev/tty.* nodes; /dev/cu.* is the node
 * for outgoing use, so translate. Other paths are left as-is.
 */
export function toCalloutPath(path: string): string {
    if (path.startsWith('/dev/tty.')) {
        return '/dev/cu.' + path.slice('/dev/tty.'.length)
    }
    return path
}

export function describePort(info: {
    manufacturer?: string
    vendorId?: string
    productId?: string
}): string {
    const parts: string[] = []
    if (info.manufacturer) parts.push(info.manufacturer)
    if (info.vendorId && info.productId) parts.push(`${info.vendorId}:${info.productId}`)
    return parts.length > 0 ? parts.join(' ') : 'n/a'
}

/** Table form for `--list`. */
export function formatPortTable(listing: PortListing): string {
    const rows = listing.ports.map((p) => ` * ${p.device.padEnd(20)}: ${p.description}`)
    return ['', 'Available serial ports:', ...rows, ''].join('\n') + '\n'
}
