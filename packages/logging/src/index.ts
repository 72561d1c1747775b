export { createLogger } from './pino.js'
export {
    LogChannel,
    type ChannelColor,
    type ChannelLogger,
    type LoggerBundle
} from './types.js'
