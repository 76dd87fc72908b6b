/**
 * SDK public exports.
 */

export {
  PriorSDK,
  SDK_VERSION,
  USER_AGENT,
  REGISTRATION_HOST,
  extractCredentials,
  generateAgentName,
} from "./core.js";
export type { PriorSDKOptions, RegistrationEvent, RequestOptions } from "./core.js";
export { createClient } from "./client.js";
export type { PriorClient } from "./client.js";
export {
  DEFAULT_BASE_URL,
  PRIOR_BASE_URL,
  PRIOR_API_KEY,
  PRIOR_AGENT_ID,
  PRIOR_CONFIG_DIR,
  FileConfigStore,
  MemoryConfigStore,
  applyEnvOverrides,
  defaultConfigPath,
  defaultCredentials,
} from "./config.js";
export type { ConfigProvider, Env } from "./config.js";
export { DEFAULT_TIMEOUT } from "./http.js";
export type { Timeout } from "./http.js";
export {
  DEFAULT_RUNTIME,
  DEFAULT_VISIBILITY,
  FEEDBACK_OUTCOMES,
  fromFetchResponse,
  isEnvelope,
  isFeedbackOutcome,
  isRecord,
} from "./types.js";
export type {
  APIResponse,
  ContributeOptions,
  Correction,
  CredentialRecord,
  Effort,
  Envelope,
  Environment,
  FeedbackOptions,
  FeedbackOutcome,
  SearchContext,
  SearchOptions,
} from "./types.js";
export {
  PriorError,
  NetworkError,
  RequestTimeoutError,
  APIError,
  ResponseParseError,
  RegistrationError,
  ToolInputError,
} from "./exceptions.js";
export type { ToolInputIssue } from "./exceptions.js";
export {
  AgentsResource,
  KnowledgeResource,
  DEFAULT_MAX_RESULTS,
  buildSearchPayload,
  buildContributePayload,
  buildFeedbackPayload,
} from "./resources/index.js";
export {
  MAX_TAGS,
  TTL_VALUES,
  validateSearchInput,
  validateContributeInput,
  validateFeedbackInput,
} from "./validation.js";
export type { LocalValidationIssue } from "./validation.js";
export { adaptTools, createPriorTools } from "./tools.js";
export type { InvocableTool, JsonSchemaProperty, ToolAdapter, ToolInputSchema } from "./tools.js";
