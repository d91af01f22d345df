export { RequestLoggingMiddleware } from './request-logging.middleware';
export type { RequestLogExtra } from './request-logging.middleware';
