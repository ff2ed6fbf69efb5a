import type { Logger } from "../../logger.js";
import type { CallLedger } from "./callLedger.js";
import { ApiRequestError, UnsupportedOperationError } from "./errors.js";
import {
  isResourceMethodKey,
  resourceMethodTable,
  type CallCreateParams,
  type CallResource,
  type CallUpdateParams,
  type FetchParams,
  type MessageCreateParams,
  type MessageResource,
  type MessageUpdateParams,
  type ResourceDefinition,
  type ResourceName,
} from "./resources.js";
import type { ResponseResolver } from "./responseResolver.js";
import { validateCall } from "./validationRules.js";
import { toWireParams, type CallerParams } from "./wireParams.js";

export interface ResourceProxyContext {
  ledger: CallLedger;
  resolver: ResponseResolver;
  logger: Logger;
}

export interface ResourceProxy<T> {
  readonly name: ResourceName;
  /**
   * Untyped dispatch by method name. Throws UnsupportedOperationError when
   * the resource has no such method.
   */
  invoke: (method: string, params?: CallerParams) => T;
}

export interface MessagesResource extends ResourceProxy<MessageResource> {
  create: (params: MessageCreateParams) => MessageResource;
  fetch: (params: FetchParams) => MessageResource;
  update: (params: MessageUpdateParams) => MessageResource;
}

export interface CallsResource extends ResourceProxy<CallResource> {
  create: (params: CallCreateParams) => CallResource;
  fetch: (params: FetchParams) => CallResource;
  update: (params: CallUpdateParams) => CallResource;
}

function withoutUndefined(params: CallerParams): CallerParams {
  return Object.fromEntries(
    Object.entries(params).filter(([, value]) => value !== undefined)
  );
}

export function createResourceProxy<T extends object>(
  name: ResourceName,
  definition: ResourceDefinition<T>,
  context: ResourceProxyContext
): ResourceProxy<T> {
  const { ledger, resolver } = context;
  const proxyLogger = context.logger.child({ resource: name });

  const invoke = (method: string, params: CallerParams = {}): T => {
    const resourceMethod = `${name}.${method}`;

    if (!isResourceMethodKey(resourceMethod)) {
      proxyLogger.debug({ method }, "fake.call.unsupported");
      throw new UnsupportedOperationError(name, method);
    }

    const data = toWireParams(params);
    const validation = validateCall(resourceMethod, data);

    if (!validation.ok) {
      proxyLogger.debug(
        { resourceMethod, code: validation.error.code },
        "fake.call.rejected"
      );
      throw validation.error;
    }

    const entry = {
      ...resourceMethodTable[resourceMethod],
      resourceMethod,
      params: withoutUndefined(params),
      data,
    };

    const failure = resolver.takeFailure(resourceMethod);
    if (failure) {
      const record = ledger.append(entry);
      proxyLogger.debug(
        { resourceMethod, sequence: record.sequence, apiCode: failure.code },
        "fake.call.failed"
      );
      throw new ApiRequestError(resourceMethod, failure);
    }

    const response = resolver.resolve(resourceMethod, definition, data);
    Object.freeze(response);
    const record = ledger.append(entry);

    proxyLogger.debug(
      { resourceMethod, sequence: record.sequence },
      "fake.call.recorded"
    );

    return response;
  };

  return { name, invoke };
}

export function createMessagesResource(
  definition: ResourceDefinition<MessageResource>,
  context: ResourceProxyContext
): MessagesResource {
  const proxy = createResourceProxy("messages", definition, context);

  return {
    ...proxy,
    create: (params) => proxy.invoke("create", params),
    fetch: (params) => proxy.invoke("fetch", params),
    update: (params) => proxy.invoke("update", params),
  };
}

export function createCallsResource(
  definition: ResourceDefinition<CallResource>,
  context: ResourceProxyContext
): CallsResource {
  const proxy = createResourceProxy("calls", definition, context);

  return {
    ...proxy,
    create: (params) => proxy.invoke("create", params),
    fetch: (params) => proxy.invoke("fetch", params),
    update: (params) => proxy.invoke("update", params),
  };
}
