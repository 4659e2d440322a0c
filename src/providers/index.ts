export {
  ProviderAdapter,
  endpointsFromConfig,
  type FetchLike,
  type ForwardRequest,
  type ProviderAdapterOptions,
  type ProviderEndpoint,
  type RetryPolicy,
  type UpstreamResponse
} from './adapter.js';
export { buildUpstreamHeaders, errorPayload, headerValue, relayHeaders, type InboundHeaders, type ProviderShape } from './shapes.js';
