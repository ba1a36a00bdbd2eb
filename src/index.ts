/**
 * PAM OAuth2 Device Authorization
 *
 * Local login through the OAuth 2.0 Device Authorization Grant with token
 * introspection and identity binding.
 *
 * @packageDocumentation
 */

// Types
export {
  SecretString,
  parseScopes,
  DEVICE_CODE_GRANT_TYPE,
  isDeviceGrantSuccess,
  isTokenActive,
  audiencesOf,
  DEFAULT_CONFIG,
} from "./types";
export type {
  TokenResponse,
  DeviceCodeParams,
  DeviceAuthorizationResponse,
  DeviceTokenResult,
  DeviceGrantState,
  TerminalDeviceGrantState,
  PollingSummary,
  DeviceGrantResult,
  IntrospectionParams,
  IntrospectionResponse,
  ClientAuthMethod,
  IdentityClaim,
  ProviderConfig,
  ClientCredentials,
  IdentityConfig,
  DeviceAuthConfig,
} from "./types";

// Errors
export {
  OAuth2Error,
  ConfigurationError,
  TransportError,
  ProtocolError,
  OtherError,
  ValidationError,
  PollingError,
  isOAuth2Error,
  getUserMessage,
  parseErrorResponse,
  createErrorFromResponse,
  formatErrorChain,
} from "./error";
export type { OAuth2ErrorKind, ValidationErrorCode, OAuth2ErrorResponse } from "./error";

// Core
export {
  FetchHttpTransport,
  MockHttpTransport,
  createTransport,
  createMockTransport,
  jsonResponse,
  SystemClock,
  MockClock,
  systemClock,
  createMockClock,
} from "./core";
export type { HttpRequest, HttpResponse, HttpTransport, Clock } from "./core";

// Device grant engine
export { DeviceAuthorizationFlowImpl, initialPollingState, advancePolling } from "./flows";
export type {
  DeviceAuthorizationFlow,
  AwaitAuthorizationOptions,
  PollingState,
  PollingStep,
} from "./flows";

// Introspection
export { TokenIntrospectionImpl } from "./token";
export type { TokenIntrospection } from "./token";

// Identity validation
export {
  IdentityValidatorImpl,
  remoteUsernameOf,
  validationErrorFor,
  exactMatch,
  caseInsensitiveMatch,
  stripDomainSuffix,
  aliasMap,
  anyOf,
  ruleFromIdentityConfig,
} from "./validation";
export type {
  IdentityValidator,
  IdentityBindingRule,
  ValidationResult,
  ValidationFailure,
} from "./validation";

// Client
export {
  DeviceAuthClientImpl,
  DeviceAuthConfigBuilder,
  DeviceAuthClientBuilder,
  configBuilder,
  clientBuilder,
} from "./client";
export type { DeviceAuthClient } from "./client";

// Telemetry
export {
  noOpLogger,
  InMemoryLogger,
  ConsoleLogger,
  PinoLogger,
  parseLogLevel,
  createPinoLogger,
  createFileLogger,
  createInMemoryLogger,
  createConsoleLogger,
} from "./telemetry";
export type { Logger, LogLevel, LogLevelSetting, LogContext, LogEntry } from "./telemetry";

// Configuration file
export {
  DEFAULT_CONFIG_PATH,
  configFileSchema,
  toDeviceAuthConfig,
  parseConfigFile,
  loadConfigFile,
} from "./config";
export type { ConfigFile } from "./config";

// Prompt
export {
  ENTER_PROMPT,
  utf8QrRenderer,
  renderUserPrompt,
  StreamConversation,
  MockConversation,
  createTerminalConversation,
  createMockConversation,
} from "./prompt";
export type { QrRenderer, UserPromptOptions, Conversation } from "./prompt";

// Adapter
export { authenticate } from "./adapter";
export type {
  AuthenticationDecision,
  AuthenticationOutcome,
  AuthenticateOptions,
} from "./adapter";

// Command line
export { runCli, parsePamArgs, DEFAULT_LOG_PATH } from "./cli";
export type { CliOptions } from "./cli";
