/**
 * HTTP Middleware Exports
 */

export { requestLogging, REQUEST_ID_HEADER } from "./request-logging.js";
export {
  errorHandler,
  notFoundHandler,
  HttpError,
  badRequest,
  notFound,
  internalError,
} from "./error-handler.js";
export type { ErrorResponse } from "./error-handler.js";
