export { SystemError } from './system-error';
export type { ErrorSeverity } from './system-error';
export {
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from './system-health-error';
export {
  PersistenceError,
  PERSISTENCE_ERROR_CODES,
} from './persistence-error';
