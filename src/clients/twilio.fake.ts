import { isDeepStrictEqual } from "node:util";
import { logger as rootLogger, type Logger } from "../logger.js";
import { createCallLedger, type CallRecord } from "./fake/callLedger.js";
import {
  CallAssertionError,
  UnsupportedOperationError,
  type ApiFailure,
} from "./fake/errors.js";
import {
  createCallsResource,
  createMessagesResource,
  type CallsResource,
  type MessagesResource,
  type ResourceProxy,
} from "./fake/resourceProxy.js";
import {
  isResourceName,
  resourceDefinitions,
  type CallResource,
  type ConfiguredResponse,
  type MessageResource,
  type ResourceMethodKey,
  type ResponseFor,
} from "./fake/resources.js";
import { createResponseResolver } from "./fake/responseResolver.js";

export interface FakeTwilioClientOptions {
  accountSid?: string;
  authToken?: string;
  logger?: Logger;
  /** Override SID generation, e.g. for stable identifiers in tests. */
  generateSid?: (prefix: string) => string;
}

export interface FakeTwilioClient {
  readonly accountSid: string;
  readonly authToken: string;
  readonly messages: MessagesResource;
  readonly calls: CallsResource;
  resource: (
    name: string
  ) => ResourceProxy<MessageResource> | ResourceProxy<CallResource>;
  configureResponse: <K extends ResourceMethodKey>(
    resourceMethod: K,
    payload: ConfiguredResponse<ResponseFor<K>>
  ) => void;
  clearResponse: (resourceMethod: ResourceMethodKey) => void;
  resetResponses: () => void;
  /** The next call to pass validation for this key is recorded, then throws. */
  failNext: (resourceMethod: ResourceMethodKey, failure: ApiFailure) => void;
  getCalls: () => readonly CallRecord[];
  getCallsByResource: (resourceMethod: ResourceMethodKey) => readonly CallRecord[];
  getLastCall: (resourceMethod?: ResourceMethodKey) => CallRecord | undefined;
  clearCalls: () => void;
  reset: () => void;
  assertCalledWith: (
    resourceMethod: ResourceMethodKey,
    expected: Readonly<Record<string, unknown>>
  ) => void;
  assertNotCalled: (resourceMethod: ResourceMethodKey) => void;
}

function mismatchedKeys(
  record: CallRecord,
  expected: Readonly<Record<string, unknown>>
): string[] {
  return Object.entries(expected)
    .filter(([key, value]) => !isDeepStrictEqual(record.data[key], value))
    .map(([key]) => key);
}

function describeMismatch(
  record: CallRecord,
  keys: readonly string[],
  expected: Readonly<Record<string, unknown>>
): string {
  return keys
    .map(
      (key) =>
        `${key} (expected ${JSON.stringify(expected[key])}, received ${key in record.data ? JSON.stringify(record.data[key]) : "nothing"})`
    )
    .join(", ");
}

export function createFakeTwilioClient(
  options: FakeTwilioClientOptions = {}
): FakeTwilioClient {
  const accountSid = options.accountSid ?? "ACtest123";
  const authToken = options.authToken ?? "test_token";
  const clientLogger = (options.logger ?? rootLogger).child({
    module: "fake-twilio-client",
  });

  const ledger = createCallLedger();
  const resolver = createResponseResolver({
    accountSid,
    ...(options.generateSid ? { generateSid: options.generateSid } : {}),
  });
  const context = { ledger, resolver, logger: clientLogger };

  const messages = createMessagesResource(resourceDefinitions.messages, context);
  const calls = createCallsResource(resourceDefinitions.calls, context);

  const registry: {
    readonly messages: MessagesResource;
    readonly calls: CallsResource;
  } = { messages, calls };

  const resource = (name: string) => {
    if (!isResourceName(name)) {
      throw new UnsupportedOperationError(name);
    }
    return registry[name];
  };

  const assertCalledWith = (
    resourceMethod: ResourceMethodKey,
    expected: Readonly<Record<string, unknown>>
  ) => {
    const recorded = ledger.byResourceMethod(resourceMethod);

    if (recorded.length === 0) {
      throw new CallAssertionError(
        `No calls recorded for ${resourceMethod}`,
        expected
      );
    }

    const ranked = recorded.map((record) => ({
      record,
      mismatched: mismatchedKeys(record, expected),
    }));

    if (ranked.some(({ mismatched }) => mismatched.length === 0)) {
      return;
    }

    // Fewest differing keys wins; the earliest call on ties.
    const closest = ranked.reduce((best, candidate) =>
      candidate.mismatched.length < best.mismatched.length ? candidate : best
    );

    throw new CallAssertionError(
      `No call to ${resourceMethod} matched ${JSON.stringify(expected)}. ` +
        `Closest call #${closest.record.sequence} differs on ${describeMismatch(closest.record, closest.mismatched, expected)}`,
      expected,
      closest.record.data
    );
  };

  return {
    accountSid,
    authToken,
    messages,
    calls,
    resource,
    configureResponse: (resourceMethod, payload) => {
      resolver.configure(resourceMethod, payload);
      clientLogger.debug({ resourceMethod }, "fake.response.configured");
    },
    clearResponse: (resourceMethod) => resolver.clear(resourceMethod),
    resetResponses: () => resolver.reset(),
    failNext: (resourceMethod, failure) => {
      resolver.queueFailure(resourceMethod, failure);
    },
    getCalls: () => ledger.all(),
    getCallsByResource: (resourceMethod) =>
      ledger.byResourceMethod(resourceMethod),
    getLastCall: (resourceMethod) => ledger.last(resourceMethod),
    clearCalls: () => ledger.clear(),
    reset: () => {
      ledger.clear();
      resolver.reset();
    },
    assertCalledWith,
    assertNotCalled: (resourceMethod) => {
      const recorded = ledger.byResourceMethod(resourceMethod);
      if (recorded.length > 0) {
        throw new CallAssertionError(
          `Expected no calls to ${resourceMethod}, found ${recorded.length}`,
          {}
        );
      }
    },
  };
}
