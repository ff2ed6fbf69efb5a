import { randomUUID } from "node:crypto";
import type { ApiFailure } from "./errors.js";
import {
  resourceMethodTable,
  type ResourceDefinition,
  type ResourceMethodKey,
} from "./resources.js";
import { toFieldName, type WireParams } from "./wireParams.js";

export type ConfiguredPayload = Readonly<Record<string, unknown>>;

export interface ResponseResolver {
  resolve: <T extends object>(
    resourceMethod: ResourceMethodKey,
    definition: ResourceDefinition<T>,
    data: WireParams
  ) => T;
  configure: (resourceMethod: ResourceMethodKey, payload: ConfiguredPayload) => void;
  clear: (resourceMethod: ResourceMethodKey) => void;
  queueFailure: (resourceMethod: ResourceMethodKey, failure: ApiFailure) => void;
  takeFailure: (resourceMethod: ResourceMethodKey) => ApiFailure | undefined;
  reset: () => void;
}

export interface ResponseResolverOptions {
  accountSid: string;
  generateSid?: (prefix: string) => string;
  now?: () => Date;
}

/** Prefix plus 32 hex characters, the shape of a real resource SID. */
export function generateSid(prefix: string): string {
  return `${prefix}${randomUUID().replace(/-/g, "")}`;
}

export function createResponseResolver(
  options: ResponseResolverOptions
): ResponseResolver {
  const { accountSid } = options;
  const nextSid = options.generateSid ?? generateSid;
  const now = options.now ?? (() => new Date());

  const configured = new Map<ResourceMethodKey, ConfiguredPayload>();
  const failures = new Map<ResourceMethodKey, ApiFailure[]>();

  function resolve<T extends object>(
    resourceMethod: ResourceMethodKey,
    definition: ResourceDefinition<T>,
    data: WireParams
  ): T {
    const { method } = resourceMethodTable[resourceMethod];
    const requestedSid =
      method !== "create" && typeof data.Sid === "string" ? data.Sid : undefined;

    const synthesized = definition.synthesize({
      sid: requestedSid ?? nextSid(definition.sidPrefix),
      accountSid,
      now: now(),
    });
    const fallback = method === "create" ? {} : definition.fallback;
    const echoed = method === "fetch" ? {} : definition.echo(data);
    const overrides = configured.get(resourceMethod) ?? {};

    // Shallow merge: configured fields win, everything else keeps the default.
    return { ...synthesized, ...fallback, ...echoed, ...overrides };
  }

  return {
    resolve,
    configure: (resourceMethod, payload) => {
      // Payloads may use the REST field spelling (`error_code`).
      configured.set(
        resourceMethod,
        Object.fromEntries(
          Object.entries(payload).map(([field, value]): [string, unknown] => [
            toFieldName(field),
            value,
          ])
        )
      );
    },
    clear: (resourceMethod) => {
      configured.delete(resourceMethod);
    },
    queueFailure: (resourceMethod, failure) => {
      const queue = failures.get(resourceMethod) ?? [];
      queue.push(failure);
      failures.set(resourceMethod, queue);
    },
    takeFailure: (resourceMethod) => failures.get(resourceMethod)?.shift(),
    reset: () => {
      configured.clear();
      failures.clear();
    },
  };
}
