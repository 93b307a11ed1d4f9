export {
  ConnectorError,
  isTransientError,
  wrapError,
  type ErrorCode,
  type ConnectorErrorDetails,
} from './connector-error.js';
