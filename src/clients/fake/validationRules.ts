import { z } from "zod";
import {
  FakeClientError,
  InvalidArgumentError,
  MissingArgumentError,
  MissingConfigurationError,
} from "./errors.js";
import type { ResourceMethodKey } from "./resources.js";
import {
  isPresent,
  toCallerName,
  type WireParams,
} from "./wireParams.js";

export interface AlternativeGroup {
  /** Named in the error, e.g. "sender identity". */
  purpose: string;
  anyOf: readonly string[];
}

export interface ValidationRule {
  required: readonly string[];
  alternatives: readonly AlternativeGroup[];
  schema: z.ZodTypeAny;
}

export type ValidationResult =
  | { ok: true }
  | { ok: false; error: FakeClientError };

const sid = z.string().min(2);
const mediaUrl = z.union([z.string(), z.array(z.string())]);

const sidOnly: ValidationRule = {
  required: ["Sid"],
  alternatives: [],
  schema: z.object({ Sid: sid }).passthrough(),
};

// Keys are wire names; values have already been serialized.
export const validationRules: Readonly<
  Record<ResourceMethodKey, ValidationRule>
> = {
  "messages.create": {
    required: ["To"],
    alternatives: [
      { purpose: "sender identity", anyOf: ["From", "MessagingServiceSid"] },
      { purpose: "message content", anyOf: ["Body", "MediaUrl", "ContentSid"] },
    ],
    schema: z
      .object({
        To: z.string(),
        From: z.string().nullish(),
        MessagingServiceSid: sid.nullish(),
        Body: z.string().max(1600).nullish(),
        MediaUrl: mediaUrl.nullish(),
        ContentSid: sid.nullish(),
        ContentVariables: z.string().nullish(),
        StatusCallback: z.string().url().nullish(),
      })
      .passthrough(),
  },
  "messages.fetch": sidOnly,
  "messages.update": {
    ...sidOnly,
    schema: z
      .object({
        Sid: sid,
        Body: z.string().nullish(),
        Status: z.literal("canceled").nullish(),
      })
      .passthrough(),
  },
  "calls.create": {
    required: ["To", "From"],
    alternatives: [
      {
        purpose: "call instructions",
        anyOf: ["Url", "Twiml", "ApplicationSid"],
      },
    ],
    schema: z
      .object({
        To: z.string(),
        From: z.string(),
        Url: z.string().url().nullish(),
        Twiml: z.string().nullish(),
        ApplicationSid: sid.nullish(),
        StatusCallback: z.string().url().nullish(),
        Timeout: z.number().int().positive().nullish(),
      })
      .passthrough(),
  },
  "calls.fetch": sidOnly,
  "calls.update": {
    ...sidOnly,
    schema: z
      .object({
        Sid: sid,
        Status: z.enum(["canceled", "completed"]).nullish(),
        Url: z.string().url().nullish(),
        Twiml: z.string().nullish(),
      })
      .passthrough(),
  },
};

export function validateCall(
  resourceMethod: ResourceMethodKey,
  data: WireParams
): ValidationResult {
  const rule = validationRules[resourceMethod];

  for (const wireName of rule.required) {
    if (!isPresent(data[wireName])) {
      return {
        ok: false,
        error: new MissingArgumentError(
          resourceMethod,
          toCallerName(wireName),
          wireName
        ),
      };
    }
  }

  for (const group of rule.alternatives) {
    if (!group.anyOf.some((wireName) => isPresent(data[wireName]))) {
      return {
        ok: false,
        error: new MissingConfigurationError(
          resourceMethod,
          group.purpose,
          group.anyOf.map(toCallerName)
        ),
      };
    }
  }

  const parsed = rule.schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const wireName = String(issue?.path[0] ?? "params");
    return {
      ok: false,
      error: new InvalidArgumentError(
        resourceMethod,
        toCallerName(wireName),
        issue?.message ?? "invalid value"
      ),
    };
  }

  return { ok: true };
}
