import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.cli]:        { emoji: '⌨️', color: 'blue' },
    [LogChannel.connection]: { emoji: '🔌', color: 'yellow' },
    [LogChannel.session]:    { emoji: '📟', color: 'cyan' },
    // Log-file mirroring
    [LogChannel.sink]:       { emoji: '📝', color: 'purple' },
    [LogChannel.device]:     { emoji: '🛠️', color: 'red' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'
