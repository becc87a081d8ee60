export { logger, createLogger, type Logger } from './logger.js';
export {
  ContactNotFoundError,
  StoreError,
  PermissionDeniedError,
  InvalidArgumentError,
  InvalidEthAddressError,
  ConfigError,
  describeError,
  errnoCode,
} from './errors.js';
