export {
  JsonlQueryLogger,
  MemoryQueryLogger,
  createQueryLogger,
  type QueryLogger,
  type QueryEvent,
} from './query-log.js'
export { canonicalize, toLoggable } from './serialize.js'
