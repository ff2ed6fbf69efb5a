export {
  createFakeTwilioClient,
  type FakeTwilioClient,
  type FakeTwilioClientOptions,
} from "./clients/twilio.fake.js";
export { createTwilioClient } from "./clients/twilio.js";
export type { CallRecord } from "./clients/fake/callLedger.js";
export {
  ApiRequestError,
  CallAssertionError,
  FakeClientError,
  InvalidArgumentError,
  MissingArgumentError,
  MissingConfigurationError,
  UnsupportedOperationError,
  type ApiFailure,
  type FakeClientErrorCode,
} from "./clients/fake/errors.js";
export type {
  CallsResource,
  MessagesResource,
  ResourceProxy,
} from "./clients/fake/resourceProxy.js";
export type {
  CallCreateParams,
  CallResource,
  CallUpdateParams,
  ConfiguredResponse,
  FetchParams,
  MessageCreateParams,
  MessageResource,
  MessageUpdateParams,
  ResourceMethodKey,
  ResourceName,
} from "./clients/fake/resources.js";
export { validateCall, validationRules } from "./clients/fake/validationRules.js";
export type { CallerParams, WireParams } from "./clients/fake/wireParams.js";
export {
  createNotificationService,
  type NotificationService,
} from "./services/notifications.js";
export type { MessagingClient, OutboundMessage, SentMessage } from "./types/index.js";
