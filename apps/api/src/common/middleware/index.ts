/**
 * Middleware Module Exports
 *
 * @module common/middleware
 */

export {
  CorrelationIdMiddleware,
  correlationIdOf,
  generateCorrelationId,
} from "./correlation-id.middleware";
