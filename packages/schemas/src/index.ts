export {LogEventSchema, type LogEvent} from './logEvent'
export * from './portal'
export * from './auth'
