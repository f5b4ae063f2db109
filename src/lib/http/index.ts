export {
  bearerAuthorization,
  buildUrl,
  createThrottledHttpClient,
  releaseResponse,
  type HttpMethod,
  type HttpRequestOptions,
  type QueryParams,
  type ThrottledHttpClient,
  type ThrottledHttpClientConfig,
} from "./client";
