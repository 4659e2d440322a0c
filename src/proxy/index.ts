export {
  AlertDeliveryError,
  CompositeAlertChannel,
  LogAlertChannel,
  WebhookAlertChannel,
  type AlertChannel,
  type AlertSeverity,
  type OperationalAlert,
  type WebhookAlertOptions
} from './alerts.js';
export { CallState, IllegalTransitionError, type CallStage } from './call-state.js';
export {
  Interceptor,
  type AuditOutcome,
  type ClientDisconnectPolicy,
  type InterceptorDeps,
  type InterceptorOptions,
  type ProxyCall,
  type ProxyResult
} from './interceptor.js';
export { ResponseTee, type TeeResult } from './tee.js';
